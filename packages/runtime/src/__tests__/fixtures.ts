/**
 * Handle kinds shared by the runtime tests
 */

import { Handle, HandleRegistry } from '../handles';

export class TestBuffer extends Handle {
  readonly kind = 'Buffer';
}

export class TestWindow extends Handle {
  readonly kind = 'Window';
}

export class TestTabpage extends Handle {
  readonly kind = 'Tabpage';
}

export function createRegistry(): HandleRegistry {
  return new HandleRegistry()
    .register('Buffer', 0, id => new TestBuffer(id))
    .register('Window', 1, id => new TestWindow(id))
    .register('Tabpage', 2, id => new TestTabpage(id));
}

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

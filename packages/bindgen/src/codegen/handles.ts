/**
 * Handle kinds of generated bindings
 */

import type { HandleTypeEntry } from '../manifest/types';
import { commentSafe, constantCase, quote } from './identifiers';
import { handleClassName } from './type-map';

export function handleTagConstant(kind: string): string {
  return `${constantCase(kind)}_TYPE_ID`;
}

/**
 * Per kind, in the order given: the tag constant and a `Handle` subclass.
 * Then the `handles` registry the session decodes them with.
 */
export function emitHandleKinds(kinds: readonly HandleTypeEntry[]): string[] {
  const lines: string[] = [];

  for (const kind of kinds) {
    const className = handleClassName(kind.name);
    const constant = handleTagConstant(kind.name);
    lines.push(`export const ${constant} = ${kind.id};`);
    lines.push('');
    lines.push(`/** Remote handle; methods are prefixed \`${commentSafe(kind.prefix)}\` */`);
    lines.push(`export class ${className} extends Handle {`);
    lines.push(`  static readonly TYPE_ID = ${constant};`);
    lines.push(`  readonly kind = ${quote(kind.name)};`);
    lines.push('}');
    lines.push('');
  }

  if (kinds.length === 0) {
    lines.push('export const handles = new HandleRegistry();');
    return lines;
  }

  lines.push('export const handles = new HandleRegistry()');
  kinds.forEach((kind, index) => {
    const className = handleClassName(kind.name);
    const end = index === kinds.length - 1 ? ';' : '';
    lines.push(
      `  .register(${quote(kind.name)}, ${handleTagConstant(kind.name)}, (id) => new ${className}(id))${end}`
    );
  });
  return lines;
}

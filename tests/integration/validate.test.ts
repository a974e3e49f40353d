/**
 * Integration tests for structural validation of generated bindings
 */

import { ErrorCode } from '../../packages/runtime/src';
import { analyzeBindings } from '../../packages/bindgen/src/codegen/validate';
import { generateBindings } from '../../packages/bindgen/src/generate';
import { fixtureBytes } from '../fixtures/manifest';

describe('analyzeBindings', () => {
  it('should parse generated bindings and list their exports', () => {
    const result = generateBindings(fixtureBytes());
    const summary = analyzeBindings(result.source, 'nvim.ts');

    expect(summary.functions).toEqual(result.stubs);
    expect(summary.classes).toEqual(['Buffer', 'Tabpage', 'Window']);
    expect(summary.enums).toEqual(['ErrorType', 'UiOption']);
    expect(summary.constants).toEqual([
      'API_VERSION',
      'BUFFER_TYPE_ID',
      'TABPAGE_TYPE_ID',
      'WINDOW_TYPE_ID',
      'handles',
      'UI_OPTIONS',
      'UI_EVENTS',
    ]);
  });

  it('should only count async functions as stubs', () => {
    const summary = analyzeBindings(
      'export function helper(): void {}\nexport async function nvim_eval(): Promise<void> {}\n'
    );
    expect(summary.functions).toEqual(['nvim_eval']);
  });

  it('should report source that does not parse', () => {
    expect(() => analyzeBindings('export async function (', 'broken.ts')).toThrow(
      expect.objectContaining({ code: ErrorCode.BINDINGS_INVALID })
    );
  });
});

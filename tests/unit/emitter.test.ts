/**
 * Unit tests for the bindings emitter
 */

import { StubEmitter } from '../../packages/bindgen/src/codegen/emitter';
import { projectManifest } from '../../packages/bindgen/src/manifest/project';
import { toValue } from '../../packages/runtime/src';
import { fn, manifestWith } from '../fixtures/manifest';

function emit(data: Record<string, unknown>, digest?: string, runtimeModule?: string) {
  const result = new StubEmitter().emit(projectManifest(toValue(data)), { digest, runtimeModule });
  return { ...result, lines: result.source.split('\n') };
}

describe('StubEmitter', () => {
  it('should emit a complete stub for a tuple-returning function', () => {
    const { source, stubs } = emit(
      manifestWith([fn('nvim_win_get_cursor', [['Window', 'window']], 'ArrayOf(Integer, 2)')])
    );

    expect(stubs).toEqual(['nvim_win_get_cursor']);
    expect(source).toContain(
      [
        '/**',
        ' * `nvim_win_get_cursor`',
        ' *',
        ' * @since 1',
        ' */',
        'export async function nvim_win_get_cursor(client: RpcClient, window: Window): Promise<[bigint, bigint]> {',
        '  return client.call<[bigint, bigint]>(',
        '    "nvim_win_get_cursor",',
        '    (writer) => {',
        '      writer.writeArrayHeader(1);',
        '      writer.writeHandle(window);',
        '    },',
        '    (reader) => {',
        '      reader.readFixedArrayHeader(2);',
        '      return [reader.readInteger(), reader.readInteger()];',
        '    }',
        '  );',
        '}',
      ].join('\n')
    );
  });

  it('should write tuple parameters element by element', () => {
    const { lines } = emit(
      manifestWith([fn('nvim_win_set_cursor', [['Window', 'window'], ['ArrayOf(Integer, 2)', 'pos']], 'void')])
    );

    const start = lines.indexOf('      writer.writeArrayHeader(2);');
    expect(lines.slice(start - 1, start + 3)).toEqual([
      '      writer.writeHandle(window);',
      '      writer.writeArrayHeader(2);',
      '      writer.writeInteger(pos[0]);',
      '      writer.writeInteger(pos[1]);',
    ]);
    expect(lines).toContain('    (reader) => reader.skipValue()');
  });

  it('should narrow Object results to a handle class by function name', () => {
    const { lines } = emit(manifestWith([fn('window_get_cursor', [['Window', 'window']], 'Object')]));

    expect(lines).toContain(
      'export async function window_get_cursor(client: RpcClient, window: Window): Promise<Window> {'
    );
    expect(lines).toContain('    (reader) => reader.readHandleOf(Window)');
  });

  it('should keep Value for other Object results', () => {
    const { lines } = emit(manifestWith([fn('nvim_get_mode', [], 'Object')]));

    expect(lines).toContain('export async function nvim_get_mode(client: RpcClient): Promise<Value> {');
    expect(lines).toContain('    (reader) => reader.readValue()');
    expect(lines).toContain('import type { ApiVersion, RpcClient, UiEventInfo, Value } from "@nvrpc/runtime";');
  });

  it('should skip functions taking a LuaRef', () => {
    const { source, stubs, skipped } = emit(
      manifestWith([
        fn('nvim_buf_call', [['Buffer', 'buffer'], ['LuaRef', 'fun']], 'Object'),
        fn('nvim_buf_line_count', [['Buffer', 'buffer']], 'Integer'),
      ])
    );

    expect(skipped).toEqual([{ name: 'nvim_buf_call', reason: "parameter 'fun' is a LuaRef" }]);
    expect(stubs).toEqual(['nvim_buf_line_count']);
    expect(source).not.toContain('"nvim_buf_call"');
  });

  it('should skip functions with unparsable types and keep the rest', () => {
    const { source, stubs, skipped } = emit(
      manifestWith([
        fn('nvim_get_thing', [['Dict(String)', 'opts']], 'void'),
        fn('nvim_get_other', [], 'ArrayOf('),
        fn('nvim_buf_line_count', [['Buffer', 'buffer']], 'Integer'),
      ])
    );

    expect(skipped).toEqual([
      { name: 'nvim_get_thing', reason: 'parameter \'opts\' has unparsable type "Dict(String)"' },
      { name: 'nvim_get_other', reason: 'return type "ArrayOf(" is unparsable' },
    ]);
    expect(stubs).toEqual(['nvim_buf_line_count']);
    expect(source).not.toContain('"nvim_get_thing"');
  });

  it('should rename parameters that clash with reserved words, stub locals and each other', () => {
    const { lines } = emit(
      manifestWith([
        fn('nvim_exec', [['String', 'function'], ['Integer', 'client'], ['Integer', 'a'], ['Integer', 'a']], 'void'),
      ])
    );

    expect(lines).toContain(
      'export async function nvim_exec(client: RpcClient, function_: string, client_: bigint, a: bigint, a2: bigint): Promise<void> {'
    );
    expect(lines).toContain('      writer.writeArrayHeader(4);');
    expect(lines).toContain('      writer.writeString(function_);');
    expect(lines).toContain('      writer.writeInteger(a2);');
  });

  it('should rename stubs that clash with generated names', () => {
    const { stubs } = emit(manifestWith([fn('handles', [], 'void'), fn('Buffer', [], 'void')]));
    expect(stubs).toEqual(['handles2', 'Buffer2']);
  });

  it('should mark deprecated functions', () => {
    const { lines } = emit(manifestWith([fn('buffer_get_line', [['Buffer', 'buffer']], 'String', { since: 0, deprecated_since: 1 })]));

    const start = lines.indexOf(' * `buffer_get_line`');
    expect(lines.slice(start, start + 5)).toEqual([
      ' * `buffer_get_line`',
      ' *',
      ' * @since 0',
      ' * @deprecated since API level 1',
      ' */',
    ]);
  });

  it('should emit the header, imports and version constant', () => {
    const { lines } = emit(manifestWith([fn('nvim_buf_line_count', [['Buffer', 'buffer']], 'Integer')]), 'abc123');

    expect(lines.slice(0, 13)).toEqual([
      '/**',
      ' * Neovim API bindings, API level 12.',
      ' *',
      ' * Generated by nvrpc-bindgen; regenerate instead of editing.',
      ' * Manifest sha256: abc123',
      ' */',
      '',
      'import { Handle, HandleRegistry } from "@nvrpc/runtime";',
      'import type { ApiVersion, RpcClient, UiEventInfo } from "@nvrpc/runtime";',
      '',
      'export const API_VERSION: ApiVersion = Object.freeze({',
      '  apiCompatible: 0,',
      '  apiLevel: 12,',
    ]);
    expect(lines).toContain('  prerelease: true,');
  });

  it('should import from the configured runtime module', () => {
    const { lines } = emit(manifestWith([]), undefined, '../runtime');

    expect(lines).toContain('import { Handle, HandleRegistry } from "../runtime";');
    expect(lines).toContain('import type { ApiVersion, UiEventInfo } from "../runtime";');
  });

  it('should emit error types and handle kinds', () => {
    const { source, lines } = emit(manifestWith([]));

    expect(source).toContain(['export enum ErrorType {', '  Exception = 0,', '  Validation = 1,', '}'].join('\n'));
    expect(source).toContain(
      [
        'export const BUFFER_TYPE_ID = 0;',
        '',
        '/** Remote handle; methods are prefixed `nvim_buf_` */',
        'export class Buffer extends Handle {',
        '  static readonly TYPE_ID = BUFFER_TYPE_ID;',
        '  readonly kind = "Buffer";',
        '}',
      ].join('\n')
    );
    expect(source).toContain(
      [
        'export const handles = new HandleRegistry()',
        '  .register("Buffer", BUFFER_TYPE_ID, (id) => new Buffer(id))',
        '  .register("Tabpage", TABPAGE_TYPE_ID, (id) => new Tabpage(id))',
        '  .register("Window", WINDOW_TYPE_ID, (id) => new Window(id));',
      ].join('\n')
    );
    expect(lines).not.toContain('import { HandleRegistry } from "@nvrpc/runtime";');
  });

  it('should emit an empty registry when there are no handle kinds', () => {
    const { lines } = emit(manifestWith([], { types: {} }));

    expect(lines).toContain('import { HandleRegistry } from "@nvrpc/runtime";');
    expect(lines).toContain('export const handles = new HandleRegistry();');
  });

  it('should emit the UI event table', () => {
    const withEvents = emit(
      manifestWith([], {
        ui_events: [
          { name: 'grid_resize', parameters: [['Integer', 'grid'], ['ArrayOf(Integer, 2)', 'size']], since: 5 },
          { name: 'flush', parameters: [], since: 1 },
        ],
      })
    );
    expect(withEvents.source).toContain(
      [
        'export const UI_EVENTS: readonly UiEventInfo[] = [',
        '  { name: "grid_resize", since: 5, parameters: [{ name: "grid", type: "Integer" }, { name: "size", type: "ArrayOf(Integer, 2)" }] },',
        '  { name: "flush", since: 1, parameters: [] },',
        '];',
      ].join('\n')
    );

    expect(emit(manifestWith([])).lines).toContain('export const UI_EVENTS: readonly UiEventInfo[] = [];');
  });

  it('should produce the same text regardless of table key order', () => {
    const functions = [fn('nvim_get_current_win', [], 'Window')];
    const forward = emit(manifestWith(functions));
    const reversed = emit(
      manifestWith(functions, {
        error_types: { Validation: { id: 1 }, Exception: { id: 0 } },
        types: {
          Window: { id: 1, prefix: 'nvim_win_' },
          Tabpage: { id: 2, prefix: 'nvim_tabpage_' },
          Buffer: { id: 0, prefix: 'nvim_buf_' },
        },
      })
    );

    expect(reversed.source).toBe(forward.source);
  });
});

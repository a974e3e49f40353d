/**
 * Unit tests for identifier helpers
 */

import {
  commentSafe,
  constantCase,
  pascalCase,
  quote,
  safeIdentifier,
  uniqueName,
} from '../../packages/bindgen/src/codegen/identifiers';

describe('safeIdentifier', () => {
  it('should keep plain names', () => {
    expect(safeIdentifier('nvim_buf_get_lines')).toBe('nvim_buf_get_lines');
    expect(safeIdentifier('end')).toBe('end');
  });

  it('should suffix reserved words', () => {
    expect(safeIdentifier('function')).toBe('function_');
    expect(safeIdentifier('eval')).toBe('eval_');
  });

  it('should suffix names already taken', () => {
    expect(safeIdentifier('client', new Set(['client']))).toBe('client_');
    expect(safeIdentifier('client', new Set(['client', 'client_']))).toBe('client__');
  });

  it('should replace characters that cannot appear in an identifier', () => {
    expect(safeIdentifier('ext-cmdline')).toBe('ext_cmdline');
    expect(safeIdentifier('3d')).toBe('_3d');
    expect(safeIdentifier('')).toBe('_');
  });
});

describe('case helpers', () => {
  it('should convert to PascalCase', () => {
    expect(pascalCase('ext_cmdline')).toBe('ExtCmdline');
    expect(pascalCase('rgb')).toBe('Rgb');
    expect(pascalCase('Tabpage')).toBe('Tabpage');
  });

  it('should convert to CONSTANT_CASE', () => {
    expect(constantCase('Tabpage')).toBe('TABPAGE');
    expect(constantCase('LuaRef')).toBe('LUA_REF');
  });
});

describe('uniqueName', () => {
  it('should number repeated names and record them', () => {
    const taken = new Set<string>();
    expect(uniqueName('a', taken)).toBe('a');
    expect(uniqueName('a', taken)).toBe('a2');
    expect(uniqueName('a', taken)).toBe('a3');
    expect([...taken]).toEqual(['a', 'a2', 'a3']);
  });
});

describe('literals and comments', () => {
  it('should quote strings as literals', () => {
    expect(quote('say "hi"')).toBe('"say \\"hi\\""');
  });

  it('should keep comment text from closing the comment', () => {
    expect(commentSafe('a */ b\nc')).toBe('a *\\/ b c');
  });
});

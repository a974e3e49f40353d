/**
 * Unit tests for manifest type -> TypeScript mapping
 */

import { TypeMapper, handleClassName } from '../../packages/bindgen/src/codegen/type-map';
import { parseTypeName } from '../../packages/bindgen/src/codegen/type-name';

const mapper = new TypeMapper([
  { name: 'Buffer', id: 0, prefix: 'nvim_buf_' },
  { name: 'Tabpage', id: 2, prefix: 'nvim_tabpage_' },
  { name: 'Window', id: 1, prefix: 'nvim_win_' },
]);

const map = (token: string) => mapper.map(parseTypeName(token));

describe('TypeMapper', () => {
  it('should map scalars to TypeScript types and codec calls', () => {
    expect(map('Boolean')).toMatchObject({ parameter: 'boolean', result: 'boolean', read: 'reader.readBoolean()' });
    expect(map('Integer')).toMatchObject({ parameter: 'bigint', result: 'bigint', read: 'reader.readInteger()' });
    expect(map('Float')).toMatchObject({ parameter: 'number', read: 'reader.readFloat()' });
    expect(map('String').write('name')).toEqual(['writer.writeString(name)']);
  });

  it('should map Object and unknown names to Value', () => {
    expect(map('Object')).toMatchObject({ parameter: 'Value', result: 'Value', uses: ['Value'] });
    expect(map('Frobnicator')).toMatchObject({ parameter: 'Value', read: 'reader.readValue()' });
  });

  it('should map containers', () => {
    expect(map('Array')).toMatchObject({ parameter: 'readonly Value[]', result: 'Value[]' });
    expect(map('Dictionary')).toMatchObject({
      parameter: 'ReadonlyMap<string, Value>',
      result: 'Map<string, Value>',
      read: 'reader.readDictionary()',
    });
  });

  it('should map handle kinds to their classes', () => {
    const buffer = map('Buffer');
    expect(buffer).toMatchObject({ parameter: 'Buffer', result: 'Buffer', read: 'reader.readHandleOf(Buffer)' });
    expect(buffer.write('buffer')).toEqual(['writer.writeHandle(buffer)']);
    expect(buffer.uses).toEqual([]);
  });

  it('should map dynamic arrays', () => {
    const windows = map('ArrayOf(Window)');
    expect(windows.parameter).toBe('Iterable<Window>');
    expect(windows.result).toBe('Window[]');
    expect(windows.read).toBe('reader.readSequence((reader) => reader.readHandleOf(Window))');
    expect(windows.write('list')).toEqual(['writer.writeSequence(list, (item) => writer.writeHandle(item))']);
  });

  it('should map fixed arrays to tuples', () => {
    const position = map('ArrayOf(Integer, 2)');
    expect(position.parameter).toBe('readonly [bigint, bigint]');
    expect(position.result).toBe('[bigint, bigint]');
    expect(position.fixedSize).toBe(2);
    expect(position.read).toBe('[reader.readInteger(), reader.readInteger()]');
    expect(position.write('pos')).toEqual([
      'writer.writeArrayHeader(2)',
      'writer.writeInteger(pos[0])',
      'writer.writeInteger(pos[1])',
    ]);
  });

  it('should map void results to skipped reads', () => {
    expect(map('void')).toMatchObject({ result: 'void', read: 'reader.skipValue()' });
  });

  describe('returnOf', () => {
    it('should narrow Object results by function name prefix', () => {
      expect(mapper.returnOf('window_get_cursor', parseTypeName('Object')).result).toBe('Window');
      expect(mapper.returnOf('buffer_get_var', parseTypeName('Object')).result).toBe('Buffer');
      expect(mapper.returnOf('tabpage_get_var', parseTypeName('Object')).result).toBe('Tabpage');
    });

    it('should keep Value for other Object results', () => {
      expect(mapper.returnOf('nvim_get_mode', parseTypeName('Object')).result).toBe('Value');
      expect(mapper.returnOf('nvim_win_get_var', parseTypeName('Object')).result).toBe('Value');
    });

    it('should leave non-Object results alone', () => {
      expect(mapper.returnOf('window_get_height', parseTypeName('Integer')).result).toBe('bigint');
    });
  });

  it('should give a reason for parameter types that get no stub', () => {
    expect(mapper.unsupportedReason(parseTypeName('LuaRef'))).toBe('is a LuaRef');
    expect(mapper.unsupportedReason(parseTypeName('ArrayOf(LuaRef)'))).toBe('holds LuaRefs');
    expect(mapper.unsupportedReason(parseTypeName('Object'))).toBeUndefined();
    expect(mapper.unsupportedReason({ kind: 'opaque', token: 'Dict(' })).toBe('has unparsable type "Dict("');
  });

  it('should map opaque types to Value', () => {
    const mapped = mapper.map({ kind: 'opaque', token: 'Dict(' });
    expect(mapped.parameter).toBe('Value');
    expect(mapped.read).toBe('reader.readValue()');
  });

  it('should let handle kinds shadow built-in names', () => {
    const shadowing = new TypeMapper([{ name: 'String', id: 5, prefix: 'nvim_str_' }]);
    expect(shadowing.scalar('String').read).toBe('reader.readHandleOf(String)');
  });
});

describe('handleClassName', () => {
  it('should produce a class identifier for the kind', () => {
    expect(handleClassName('Buffer')).toBe('Buffer');
    expect(handleClassName('lua_ref')).toBe('LuaRef');
  });
});

/**
 * Manifest type names -> TypeScript types and codec calls
 */

import type { HandleTypeEntry, TypeName } from '../manifest/types';
import { pascalCase, safeIdentifier } from './identifiers';

/** Callback references cannot cross the wire; functions taking one get no stub. */
export const LUA_REF = 'LuaRef';

export const VOID = 'void';

interface ScalarType {
  parameter: string;
  result: string;
  /** Expression writing `expr` with `writer` */
  write(expr: string): string;
  /** Expression reading one value from `reader` */
  read: string;
  /** Runtime exports the spelling refers to */
  uses: readonly string[];
}

/**
 * How one manifest type is spelled and carried in generated code.
 */
export interface MappedType {
  /** TypeScript type of a parameter */
  parameter: string;
  /** TypeScript type of a result */
  result: string;
  /** Statements writing `expr` with `writer` */
  write(expr: string): string[];
  /** Expression reading the value from `reader` */
  read: string;
  /** Set for tuples: the array header to check before `read` */
  fixedSize?: number;
  uses: readonly string[];
}

const VALUE_TYPE: ScalarType = {
  parameter: 'Value',
  result: 'Value',
  write: expr => `writer.writeValue(${expr})`,
  read: 'reader.readValue()',
  uses: ['Value'],
};

const SCALARS = new Map<string, ScalarType>([
  [
    'Boolean',
    {
      parameter: 'boolean',
      result: 'boolean',
      write: expr => `writer.writeBoolean(${expr})`,
      read: 'reader.readBoolean()',
      uses: [],
    },
  ],
  [
    'Integer',
    {
      parameter: 'bigint',
      result: 'bigint',
      write: expr => `writer.writeInteger(${expr})`,
      read: 'reader.readInteger()',
      uses: [],
    },
  ],
  [
    'Float',
    {
      parameter: 'number',
      result: 'number',
      write: expr => `writer.writeFloat(${expr})`,
      read: 'reader.readFloat()',
      uses: [],
    },
  ],
  [
    'String',
    {
      parameter: 'string',
      result: 'string',
      write: expr => `writer.writeString(${expr})`,
      read: 'reader.readString()',
      uses: [],
    },
  ],
  ['Object', VALUE_TYPE],
  [
    'Array',
    {
      parameter: 'readonly Value[]',
      result: 'Value[]',
      write: expr => `writer.writeSequence(${expr}, (item) => writer.writeValue(item))`,
      read: 'reader.readSequence((reader) => reader.readValue())',
      uses: ['Value'],
    },
  ],
  [
    'Dictionary',
    {
      parameter: 'ReadonlyMap<string, Value>',
      result: 'Map<string, Value>',
      write: expr =>
        `writer.writeMapping(${expr}, (key) => writer.writeString(key), (value) => writer.writeValue(value))`,
      read: 'reader.readDictionary()',
      uses: ['Value'],
    },
  ],
  [
    VOID,
    {
      parameter: 'Value',
      result: 'void',
      write: expr => `writer.writeValue(${expr})`,
      read: 'reader.skipValue()',
      uses: ['Value'],
    },
  ],
]);

/**
 * Class name emitted for a handle kind, e.g. `Buffer`.
 */
export function handleClassName(kind: string): string {
  return safeIdentifier(pascalCase(kind));
}

export class TypeMapper {
  private readonly handles: ReadonlyMap<string, string>;

  constructor(private readonly kinds: readonly HandleTypeEntry[]) {
    this.handles = new Map(kinds.map(kind => [kind.name, handleClassName(kind.name)]));
  }

  /**
   * Maps a scalar name; handle kinds take precedence over built-in names.
   */
  scalar(name: string): MappedType {
    return asMapped(this.element(name));
  }

  map(type: TypeName): MappedType {
    switch (type.kind) {
      case 'scalar':
        return this.scalar(type.name);
      case 'dynamic-array':
        return dynamicArray(this.element(type.element));
      case 'fixed-array':
        return fixedArray(this.element(type.element), type.size);
      case 'opaque':
        return asMapped(VALUE_TYPE);
    }
  }

  private element(name: string): ScalarType {
    const className = this.handles.get(name);
    if (className !== undefined) {
      return handleType(className);
    }
    return SCALARS.get(name) ?? VALUE_TYPE;
  }

  /**
   * Maps a function's return type. A generic `Object` result is narrowed to a
   * handle class when the function name starts with that kind's lower-cased
   * name (`window_get_cursor` -> `Window`).
   */
  returnOf(functionName: string, type: TypeName): MappedType {
    if (type.kind === 'scalar' && type.name === 'Object') {
      const kind = this.kinds.find(entry => functionName.startsWith(entry.name.toLowerCase()));
      if (kind) {
        return this.scalar(kind.name);
      }
    }
    return this.map(type);
  }

  /**
   * Why a parameter of this type keeps its function from getting a stub, if
   * it does.
   */
  unsupportedReason(type: TypeName): string | undefined {
    switch (type.kind) {
      case 'opaque':
        return `has unparsable type ${JSON.stringify(type.token)}`;
      case 'scalar':
        return type.name === LUA_REF ? 'is a LuaRef' : undefined;
      default:
        return type.element === LUA_REF ? 'holds LuaRefs' : undefined;
    }
  }
}

function asMapped(type: ScalarType): MappedType {
  return {
    parameter: type.parameter,
    result: type.result,
    write: expr => [type.write(expr)],
    read: type.read,
    uses: type.uses,
  };
}

function handleType(className: string): ScalarType {
  return {
    parameter: className,
    result: className,
    write: expr => `writer.writeHandle(${expr})`,
    read: `reader.readHandleOf(${className})`,
    uses: [],
  };
}

function dynamicArray(element: ScalarType): MappedType {
  return {
    parameter: `Iterable<${element.parameter}>`,
    result: `${element.result}[]`,
    write: expr => [`writer.writeSequence(${expr}, (item) => ${element.write('item')})`],
    read: `reader.readSequence((reader) => ${element.read})`,
    uses: element.uses,
  };
}

function fixedArray(element: ScalarType, size: number): MappedType {
  const indices = Array.from({ length: size }, (_, index) => index);
  const tuple = (type: string) => `[${indices.map(() => type).join(', ')}]`;
  return {
    parameter: `readonly ${tuple(element.parameter)}`,
    result: tuple(element.result),
    write: expr => [
      `writer.writeArrayHeader(${size})`,
      ...indices.map(index => element.write(`${expr}[${index}]`)),
    ],
    read: `[${indices.map(() => element.read).join(', ')}]`,
    fixedSize: size,
    uses: element.uses,
  };
}

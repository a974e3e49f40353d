/**
 * In-memory value model
 *
 * Every value that crosses the wire is one of these variants. Integers are
 * carried as bigint so the full signed 64-bit range survives; mapping keys are
 * values themselves, so mappings are kept as ordered entry lists.
 */

import { EncodingError } from './errors';
import { Handle } from './handles';

/**
 * Deepest collection nesting the codec and the value helpers accept. The
 * outermost sequence or mapping is level 1.
 */
export const MAX_NESTING_DEPTH = 512;

export enum ValueKind {
  Nil = 'nil',
  Boolean = 'boolean',
  Integer = 'integer',
  Float = 'float',
  String = 'string',
  Sequence = 'sequence',
  Mapping = 'mapping',
  Handle = 'handle',
}

export interface NilValue {
  readonly kind: ValueKind.Nil;
}

export interface BooleanValue {
  readonly kind: ValueKind.Boolean;
  readonly value: boolean;
}

export interface IntegerValue {
  readonly kind: ValueKind.Integer;
  readonly value: bigint;
}

export interface FloatValue {
  readonly kind: ValueKind.Float;
  readonly value: number;
}

export interface StringValue {
  readonly kind: ValueKind.String;
  readonly value: string;
}

export interface SequenceValue {
  readonly kind: ValueKind.Sequence;
  readonly items: readonly Value[];
}

export type MapEntry = readonly [Value, Value];

export interface MappingValue {
  readonly kind: ValueKind.Mapping;
  readonly entries: readonly MapEntry[];
}

export interface HandleValue {
  readonly kind: ValueKind.Handle;
  readonly handle: Handle;
}

export type Value =
  | NilValue
  | BooleanValue
  | IntegerValue
  | FloatValue
  | StringValue
  | SequenceValue
  | MappingValue
  | HandleValue;

const NIL: NilValue = Object.freeze({ kind: ValueKind.Nil });

export function nilValue(): NilValue {
  return NIL;
}

export function booleanValue(value: boolean): BooleanValue {
  return { kind: ValueKind.Boolean, value };
}

export function integerValue(value: bigint | number): IntegerValue {
  return { kind: ValueKind.Integer, value: typeof value === 'bigint' ? value : BigInt(value) };
}

export function floatValue(value: number): FloatValue {
  return { kind: ValueKind.Float, value };
}

export function stringValue(value: string): StringValue {
  return { kind: ValueKind.String, value };
}

export function sequenceValue(items: readonly Value[]): SequenceValue {
  return { kind: ValueKind.Sequence, items };
}

export function mappingValue(entries: readonly MapEntry[]): MappingValue {
  return { kind: ValueKind.Mapping, entries };
}

export function handleValue(handle: Handle): HandleValue {
  return { kind: ValueKind.Handle, handle };
}

export function isNil(value: Value): value is NilValue {
  return value.kind === ValueKind.Nil;
}

/**
 * Structural equality. Floats compare with Object.is so NaN equals NaN and
 * 0 differs from -0; mappings compare as sets of entries.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  return equalAt(a, b, 0);
}

function equalAt(a: Value, b: Value, depth: number): boolean {
  switch (a.kind) {
    case ValueKind.Nil:
      return b.kind === ValueKind.Nil;
    case ValueKind.Boolean:
      return b.kind === ValueKind.Boolean && a.value === b.value;
    case ValueKind.Integer:
      return b.kind === ValueKind.Integer && a.value === b.value;
    case ValueKind.Float:
      return b.kind === ValueKind.Float && Object.is(a.value, b.value);
    case ValueKind.String:
      return b.kind === ValueKind.String && a.value === b.value;
    case ValueKind.Sequence: {
      if (b.kind !== ValueKind.Sequence || a.items.length !== b.items.length) {
        return false;
      }
      const inner = enterCollection(depth);
      return a.items.every((item, index) => equalAt(item, b.items[index], inner));
    }
    case ValueKind.Mapping: {
      if (b.kind !== ValueKind.Mapping || a.entries.length !== b.entries.length) {
        return false;
      }
      const inner = enterCollection(depth);
      return a.entries.every(([key, value]) => {
        const other = b.entries.find(([candidate]) => equalAt(candidate, key, inner));
        return other !== undefined && equalAt(value, other[1], inner);
      });
    }
    case ValueKind.Handle:
      return b.kind === ValueKind.Handle && a.handle.equals(b.handle);
    default:
      return assertNever(a);
  }
}

/**
 * Depth of a collection's children, given the depth of the collection's
 * parent.
 *
 * @throws EncodingError with `CODEC_NESTING_TOO_DEEP` past MAX_NESTING_DEPTH
 */
export function enterCollection(depth: number): number {
  const inner = depth + 1;
  if (inner > MAX_NESTING_DEPTH) {
    throw EncodingError.nestingTooDeep(MAX_NESTING_DEPTH);
  }
  return inner;
}

/**
 * Identity of a scalar mapping key, for indexing entries by key. Follows
 * `valuesEqual`: NaN matches NaN and 0 does not match -0. Collections and
 * handles have none.
 */
export function scalarKey(value: Value): string | undefined {
  switch (value.kind) {
    case ValueKind.Nil:
      return 'n';
    case ValueKind.Boolean:
      return value.value ? 'b1' : 'b0';
    case ValueKind.Integer:
      return `i${value.value}`;
    case ValueKind.Float:
      return Object.is(value.value, -0) ? 'f-0' : `f${value.value}`;
    case ValueKind.String:
      return `s${value.value}`;
    default:
      return undefined;
  }
}

export function findEntry(entries: readonly MapEntry[], key: Value): MapEntry | undefined {
  return entries.find(([candidate]) => valuesEqual(candidate, key));
}

/**
 * Looks up a string key in a mapping value.
 */
export function mappingGet(mapping: MappingValue, key: string): Value | undefined {
  for (const [candidate, value] of mapping.entries) {
    if (candidate.kind === ValueKind.String && candidate.value === key) {
      return value;
    }
  }
  return undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts plain JavaScript data into a Value.
 *
 * Integral numbers become integers, so a JSON `1.0` cannot be told apart from
 * `1`; build a float explicitly with `floatValue` when that matters.
 */
export function toValue(input: unknown): Value {
  return convert(input, new Set());
}

function convert(input: unknown, seen: Set<object>): Value {
  if (input === null || input === undefined) {
    return NIL;
  }
  if (typeof input === 'boolean') {
    return booleanValue(input);
  }
  if (typeof input === 'bigint') {
    return integerValue(input);
  }
  if (typeof input === 'number') {
    return Number.isSafeInteger(input) ? integerValue(input) : floatValue(input);
  }
  if (typeof input === 'string') {
    return stringValue(input);
  }
  if (input instanceof Handle) {
    return handleValue(input);
  }
  if (typeof input !== 'object') {
    throw new TypeError(`Cannot convert value of type '${typeof input}'`);
  }
  if (seen.has(input)) {
    throw new TypeError('Cannot convert circular references');
  }
  if (seen.size >= MAX_NESTING_DEPTH) {
    throw EncodingError.nestingTooDeep(MAX_NESTING_DEPTH);
  }
  seen.add(input);
  try {
    if (Array.isArray(input)) {
      return sequenceValue(input.map((item: unknown) => convert(item, seen)));
    }
    if (input instanceof Map) {
      const entries: MapEntry[] = [];
      input.forEach((value: unknown, key: unknown) => {
        entries.push([convert(key, seen), convert(value, seen)]);
      });
      return mappingValue(entries);
    }
    if (isPlainObject(input)) {
      return mappingValue(
        Object.entries(input).map(([key, value]): MapEntry => [stringValue(key), convert(value, seen)])
      );
    }
  } finally {
    seen.delete(input);
  }
  throw new TypeError(`Cannot convert instance of '${input.constructor.name}'`);
}

export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * Converts a Value into JSON-friendly data. Integers become numbers when they
 * are safe integers and decimal strings otherwise; handles become
 * `{ "$handle": kind, "id": ... }`; non-string mapping keys are rendered with
 * their plain form.
 */
export function fromValue(value: Value): PlainValue {
  switch (value.kind) {
    case ValueKind.Nil:
      return null;
    case ValueKind.Boolean:
    case ValueKind.Float:
    case ValueKind.String:
      return value.value;
    case ValueKind.Integer:
      return plainInteger(value.value);
    case ValueKind.Sequence:
      return value.items.map(fromValue);
    case ValueKind.Mapping: {
      const result: { [key: string]: PlainValue } = {};
      for (const [key, item] of value.entries) {
        const name = key.kind === ValueKind.String ? key.value : JSON.stringify(fromValue(key));
        result[name] = fromValue(item);
      }
      return result;
    }
    case ValueKind.Handle:
      return { $handle: value.handle.kind, id: plainInteger(value.handle.id) };
    default:
      return assertNever(value);
  }
}

function plainInteger(value: bigint): number | string {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

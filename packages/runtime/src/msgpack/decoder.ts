/**
 * MessagePack Binary Decoder
 *
 * Mirrors the writer. Typed readers accept exactly one value category and
 * raise MarkerMismatchError for anything else; running out of bytes raises
 * TransportError. A failed read leaves no partially built value behind.
 */

import { TextDecoder } from 'util';
import { ANY_VALUE, EncodingError, MarkerMismatchError, TransportError, toError } from '../errors';
import { Handle, HandleConstructor, HandleRegistry } from '../handles';
import {
  booleanValue,
  floatValue,
  handleValue,
  integerValue,
  MapEntry,
  mappingValue,
  nilValue,
  sequenceValue,
  enterCollection,
  scalarKey,
  stringValue,
  Value,
  ValueKind,
  valuesEqual,
} from '../value';
import { fixExtLength, Marker } from './markers';

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Payload sizes of a MessagePack-encoded integer inside an extension. */
const PACKED_INTEGER_SIZES = new Set([1, 2, 3, 5, 9]);

export class MsgpackReader {
  private readonly view: DataView;
  private offset = 0;
  /** Collections currently open in readValue, readSequence or readDictionary */
  private depth = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly handles: HandleRegistry = new HandleRegistry()
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /**
   * Number of bytes consumed so far
   */
  position(): number {
    return this.offset;
  }

  /**
   * Get remaining bytes length
   */
  remaining(): number {
    return this.bytes.length - this.offset;
  }

  peekMarker(): number {
    this.ensureAvailable(1);
    return this.bytes[this.offset];
  }

  readNil(): null {
    const marker = this.readU8();
    if (marker !== Marker.Nil) {
      throw new MarkerMismatchError(ValueKind.Nil, marker);
    }
    return null;
  }

  readBoolean(): boolean {
    const marker = this.readU8();
    if (marker === Marker.True) return true;
    if (marker === Marker.False) return false;
    throw new MarkerMismatchError(ValueKind.Boolean, marker);
  }

  /**
   * Read any integer width, normalized to a signed 64-bit bigint
   */
  readInteger(): bigint {
    const marker = this.readU8();
    const value = this.readIntegerBody(marker);
    if (value === undefined) {
      throw new MarkerMismatchError(ValueKind.Integer, marker);
    }
    return value;
  }

  /**
   * Read float32 or float64, widened to double precision
   */
  readFloat(): number {
    const marker = this.readU8();
    if (marker === Marker.Float32) return this.readF32();
    if (marker === Marker.Float64) return this.readF64();
    throw new MarkerMismatchError(ValueKind.Float, marker);
  }

  readString(): string {
    const marker = this.readU8();
    const length = this.readStringLength(marker);
    if (length === undefined) {
      throw new MarkerMismatchError(ValueKind.String, marker);
    }
    return this.readUtf8(length);
  }

  readArrayHeader(): number {
    const marker = this.readU8();
    const length = this.readArrayLength(marker);
    if (length === undefined) {
      throw new MarkerMismatchError(ValueKind.Sequence, marker);
    }
    this.ensurePlausibleCount(length);
    return length;
  }

  /**
   * Read an array header that must announce exactly `size` items
   */
  readFixedArrayHeader(size: number): void {
    const length = this.readArrayHeader();
    if (length !== size) {
      throw EncodingError.lengthMismatch(size, length);
    }
  }

  readMapHeader(): number {
    const marker = this.readU8();
    const length = this.readMapLength(marker);
    if (length === undefined) {
      throw new MarkerMismatchError(ValueKind.Mapping, marker);
    }
    this.ensurePlausibleCount(length * 2);
    return length;
  }

  readSequence<T>(readItem: (reader: this) => T): T[] {
    const length = this.readArrayHeader();
    return this.nested(() => {
      const items: T[] = [];
      for (let i = 0; i < length; i += 1) {
        items.push(readItem(this));
      }
      return items;
    });
  }

  /**
   * Read a mapping whose keys are all strings
   */
  readDictionary(): Map<string, Value> {
    const length = this.readMapHeader();
    return this.nested(() => {
      const result = new Map<string, Value>();
      for (let i = 0; i < length; i += 1) {
        const key = this.readString();
        result.set(key, this.readValue());
      }
      return result;
    });
  }

  readHandle(): Handle {
    const marker = this.readU8();
    const handle = this.readHandleBody(marker);
    if (handle === undefined) {
      throw new MarkerMismatchError(ValueKind.Handle, marker);
    }
    return handle;
  }

  /**
   * Read a handle and check that it is of the given kind
   */
  readHandleOf<H extends Handle>(kind: HandleConstructor<H>): H {
    const marker = this.peekMarker();
    const handle = this.readHandle();
    if (!(handle instanceof kind)) {
      throw new MarkerMismatchError(
        ValueKind.Handle,
        marker,
        `expected ${kind.name}, got ${handle.kind}`
      );
    }
    return handle;
  }

  readValue(): Value {
    const marker = this.readU8();

    if (marker === Marker.Nil) return nilValue();
    if (marker === Marker.True) return booleanValue(true);
    if (marker === Marker.False) return booleanValue(false);
    if (marker === Marker.Float32) return floatValue(this.readF32());
    if (marker === Marker.Float64) return floatValue(this.readF64());

    const integer = this.readIntegerBody(marker);
    if (integer !== undefined) return integerValue(integer);

    const stringLength = this.readStringLength(marker);
    if (stringLength !== undefined) return stringValue(this.readUtf8(stringLength));

    const arrayLength = this.readArrayLength(marker);
    if (arrayLength !== undefined) {
      this.ensurePlausibleCount(arrayLength);
      return this.nested(() => {
        const items: Value[] = [];
        for (let i = 0; i < arrayLength; i += 1) {
          items.push(this.readValue());
        }
        return sequenceValue(items);
      });
    }

    const mapLength = this.readMapLength(marker);
    if (mapLength !== undefined) {
      this.ensurePlausibleCount(mapLength * 2);
      return this.nested(() => mappingValue(this.readEntries(mapLength)));
    }

    const handle = this.readHandleBody(marker);
    if (handle !== undefined) return handleValue(handle);

    throw new MarkerMismatchError(ANY_VALUE, marker, 'unsupported marker');
  }

  /**
   * Reads `count` key/value pairs. A repeated key keeps its first position and
   * takes the later value. Scalar keys are found through an index; only
   * collection and handle keys are compared entry by entry.
   */
  private readEntries(count: number): MapEntry[] {
    const entries: MapEntry[] = [];
    const positions = new Map<string, number>();
    for (let i = 0; i < count; i += 1) {
      const key = this.readValue();
      const value = this.readValue();
      const slot = scalarKey(key);
      const existing =
        slot === undefined
          ? entries.findIndex(([candidate]) => valuesEqual(candidate, key))
          : positions.get(slot) ?? -1;
      if (existing >= 0) {
        entries[existing] = [entries[existing][0], value];
        continue;
      }
      if (slot !== undefined) {
        positions.set(slot, entries.length);
      }
      entries.push([key, value]);
    }
    return entries;
  }

  private nested<T>(read: () => T): T {
    const outer = this.depth;
    this.depth = enterCollection(outer);
    try {
      return read();
    } finally {
      this.depth = outer;
    }
  }

  /**
   * Skip one complete value without building it. Extension payloads are
   * skipped by length, so unknown handle tags do not fail here.
   */
  skipValue(): void {
    let pending = 1;
    while (pending > 0) {
      pending += this.skipHead() - 1;
    }
  }

  /**
   * Skip the next value's marker and any scalar payload. Returns how many
   * values a collection header announces (keys and values both count for a
   * mapping), 0 for everything else; those values follow and are not skipped.
   */
  skipHead(): number {
    const marker = this.readU8();
    if (
      marker === Marker.Nil ||
      marker === Marker.True ||
      marker === Marker.False ||
      marker <= Marker.PositiveFixintMax ||
      marker >= Marker.NegativeFixintBase
    ) {
      return 0;
    }
    const arrayLength = this.readArrayLength(marker);
    if (arrayLength !== undefined) {
      this.ensurePlausibleCount(arrayLength);
      return arrayLength;
    }
    const mapLength = this.readMapLength(marker);
    if (mapLength !== undefined) {
      this.ensurePlausibleCount(mapLength * 2);
      return mapLength * 2;
    }
    const stringLength = this.readStringLength(marker);
    if (stringLength !== undefined) {
      this.advance(stringLength);
      return 0;
    }
    this.skipScalarBody(marker);
    return 0;
  }

  private skipScalarBody(marker: number): void {
    switch (marker) {
      case Marker.Uint8:
      case Marker.Int8:
        this.advance(1);
        return;
      case Marker.Uint16:
      case Marker.Int16:
        this.advance(2);
        return;
      case Marker.Uint32:
      case Marker.Int32:
      case Marker.Float32:
        this.advance(4);
        return;
      case Marker.Uint64:
      case Marker.Int64:
      case Marker.Float64:
        this.advance(8);
        return;
      case Marker.Bin8:
        this.advance(this.readU8());
        return;
      case Marker.Bin16:
        this.advance(this.readU16());
        return;
      case Marker.Bin32:
        this.advance(this.readU32());
        return;
      default: {
        const extLength = this.readExtLength(marker);
        if (extLength === undefined) {
          throw new MarkerMismatchError(ANY_VALUE, marker, 'unsupported marker');
        }
        this.advance(1 + extLength);
      }
    }
  }

  private readIntegerBody(marker: number): bigint | undefined {
    if (marker <= Marker.PositiveFixintMax) return BigInt(marker);
    if (marker >= Marker.NegativeFixintBase) return BigInt(marker - 0x100);
    switch (marker) {
      case Marker.Uint8:
        return BigInt(this.readU8());
      case Marker.Uint16:
        return BigInt(this.readU16());
      case Marker.Uint32:
        return BigInt(this.readU32());
      case Marker.Uint64: {
        this.ensureAvailable(8);
        const value = this.view.getBigUint64(this.offset);
        this.offset += 8;
        return BigInt.asIntN(64, value);
      }
      case Marker.Int8: {
        this.ensureAvailable(1);
        const value = this.view.getInt8(this.offset);
        this.offset += 1;
        return BigInt(value);
      }
      case Marker.Int16: {
        this.ensureAvailable(2);
        const value = this.view.getInt16(this.offset);
        this.offset += 2;
        return BigInt(value);
      }
      case Marker.Int32: {
        this.ensureAvailable(4);
        const value = this.view.getInt32(this.offset);
        this.offset += 4;
        return BigInt(value);
      }
      case Marker.Int64:
        return this.readI64();
      default:
        return undefined;
    }
  }

  private readStringLength(marker: number): number | undefined {
    if (marker >= Marker.FixstrBase && marker < Marker.Nil) return marker & 0x1f;
    if (marker === Marker.Str8) return this.readU8();
    if (marker === Marker.Str16) return this.readU16();
    if (marker === Marker.Str32) return this.readU32();
    return undefined;
  }

  private readArrayLength(marker: number): number | undefined {
    if (marker >= Marker.FixarrayBase && marker < Marker.FixstrBase) return marker & 0x0f;
    if (marker === Marker.Array16) return this.readU16();
    if (marker === Marker.Array32) return this.readU32();
    return undefined;
  }

  private readMapLength(marker: number): number | undefined {
    if (marker >= Marker.FixmapBase && marker < Marker.FixarrayBase) return marker & 0x0f;
    if (marker === Marker.Map16) return this.readU16();
    if (marker === Marker.Map32) return this.readU32();
    return undefined;
  }

  private readExtLength(marker: number): number | undefined {
    const fixed = fixExtLength(marker);
    if (fixed !== undefined) return fixed;
    if (marker === Marker.Ext8) return this.readU8();
    if (marker === Marker.Ext16) return this.readU16();
    if (marker === Marker.Ext32) return this.readU32();
    return undefined;
  }

  /**
   * Decodes a handle extension. fixext8 carries a raw big-endian id; payloads
   * of 1, 2, 3, 5 or 9 bytes carry a MessagePack integer.
   */
  private readHandleBody(marker: number): Handle | undefined {
    const length = this.readExtLength(marker);
    if (length === undefined) {
      return undefined;
    }
    this.ensureAvailable(1 + length);
    const tag = this.view.getInt8(this.offset);
    this.offset += 1;
    const kind = this.handles.kindOf(tag, marker);

    if (marker === Marker.FixExt8) {
      return kind.create(this.readI64());
    }
    if (!PACKED_INTEGER_SIZES.has(length)) {
      throw new MarkerMismatchError(ValueKind.Handle, marker, `unsupported payload size ${length}`);
    }
    const payload = new MsgpackReader(this.bytes.subarray(this.offset, this.offset + length));
    this.offset += length;
    const id = payload.readInteger();
    if (payload.remaining() !== 0) {
      throw new MarkerMismatchError(ValueKind.Handle, marker, 'trailing bytes in handle payload');
    }
    return kind.create(id);
  }

  private readUtf8(length: number): string {
    this.ensureAvailable(length);
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    let text: string;
    try {
      text = decoder.decode(slice);
    } catch (error) {
      throw EncodingError.invalidUtf8(length, toError(error));
    }
    this.offset += length;
    return text;
  }

  private readU8(): number {
    this.ensureAvailable(1);
    const value = this.bytes[this.offset];
    this.offset += 1;
    return value;
  }

  private readU16(): number {
    this.ensureAvailable(2);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  private readU32(): number {
    this.ensureAvailable(4);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  private readI64(): bigint {
    this.ensureAvailable(8);
    const value = this.view.getBigInt64(this.offset);
    this.offset += 8;
    return value;
  }

  private readF32(): number {
    this.ensureAvailable(4);
    const value = this.view.getFloat32(this.offset);
    this.offset += 4;
    return value;
  }

  private readF64(): number {
    this.ensureAvailable(8);
    const value = this.view.getFloat64(this.offset);
    this.offset += 8;
    return value;
  }

  private advance(length: number): void {
    this.ensureAvailable(length);
    this.offset += length;
  }

  /**
   * Every element takes at least one byte, so a count larger than what is
   * left can only end in a short read.
   */
  private ensurePlausibleCount(count: number): void {
    if (count > this.remaining()) {
      throw TransportError.unexpectedEof(count, this.remaining());
    }
  }

  private ensureAvailable(length: number): void {
    if (this.offset + length > this.bytes.length) {
      throw TransportError.unexpectedEof(length, this.remaining());
    }
  }
}

/**
 * Decodes exactly one value; trailing bytes are an error.
 */
export function decodeValue(bytes: Uint8Array, handles?: HandleRegistry): Value {
  const reader = new MsgpackReader(bytes, handles);
  const value = reader.readValue();
  if (reader.remaining() !== 0) {
    throw EncodingError.trailingBytes(reader.remaining());
  }
  return value;
}

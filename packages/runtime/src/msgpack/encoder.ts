/**
 * MessagePack Binary Encoder
 *
 * Writes values in their most compact wire form into a growable buffer.
 * Sequences and mappings accept lazily produced sources: elements are encoded
 * straight into the output and the length header is fixed up afterwards.
 */

import { TextEncoder } from 'util';
import { EncodingError } from '../errors';
import { Handle, HandleRegistry } from '../handles';
import { assertNever, enterCollection, Value, ValueKind } from '../value';
import { Marker } from './markers';

const MIN_INT64 = -(1n << 63n);
const MAX_INT64 = (1n << 63n) - 1n;
const MAX_UINT32 = 0xffffffff;

/** Header slot reserved while the element count is unknown. */
const DEFERRED_HEADER_SIZE = 5;

const encoder = new TextEncoder();

type CollectionMarkers = { fix: number; len16: number; len32: number };

const ARRAY_MARKERS: CollectionMarkers = {
  fix: Marker.FixarrayBase,
  len16: Marker.Array16,
  len32: Marker.Array32,
};

const MAP_MARKERS: CollectionMarkers = {
  fix: Marker.FixmapBase,
  len16: Marker.Map16,
  len32: Marker.Map32,
};

export class MsgpackWriter {
  private bytes: Uint8Array;
  private view: DataView;
  private offset = 0;
  /** Sequences and mappings currently being written */
  private depth = 0;

  constructor(
    private readonly handles: HandleRegistry = new HandleRegistry(),
    initialCapacity = 256
  ) {
    this.bytes = new Uint8Array(Math.max(initialCapacity, 16));
    this.view = new DataView(this.bytes.buffer);
  }

  writeNil(): void {
    this.writeU8(Marker.Nil);
  }

  writeBoolean(value: boolean): void {
    this.writeU8(value ? Marker.True : Marker.False);
  }

  /**
   * Write a signed 64-bit integer using the narrowest encoding
   */
  writeInteger(value: bigint | number): void {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw EncodingError.outOfRange('Integer', value);
    }
    const v = BigInt(value);
    if (v < MIN_INT64 || v > MAX_INT64) {
      throw EncodingError.outOfRange('Integer', v);
    }

    if (v >= 0n) {
      if (v <= 0x7fn) {
        this.writeU8(Number(v));
      } else if (v <= 0xffn) {
        this.writeU8(Marker.Uint8);
        this.writeU8(Number(v));
      } else if (v <= 0xffffn) {
        this.writeU8(Marker.Uint16);
        this.writeU16(Number(v));
      } else if (v <= 0xffffffffn) {
        this.writeU8(Marker.Uint32);
        this.writeU32(Number(v));
      } else {
        this.writeU8(Marker.Uint64);
        this.ensureCapacity(8);
        this.view.setBigUint64(this.offset, v);
        this.offset += 8;
      }
      return;
    }

    if (v >= -32n) {
      this.writeU8(Number(v) & 0xff);
    } else if (v >= -0x80n) {
      this.writeU8(Marker.Int8);
      this.ensureCapacity(1);
      this.view.setInt8(this.offset, Number(v));
      this.offset += 1;
    } else if (v >= -0x8000n) {
      this.writeU8(Marker.Int16);
      this.ensureCapacity(2);
      this.view.setInt16(this.offset, Number(v));
      this.offset += 2;
    } else if (v >= -0x80000000n) {
      this.writeU8(Marker.Int32);
      this.ensureCapacity(4);
      this.view.setInt32(this.offset, Number(v));
      this.offset += 4;
    } else {
      this.writeU8(Marker.Int64);
      this.writeI64(v);
    }
  }

  /**
   * Write a float, as float32 when single precision holds it exactly
   */
  writeFloat(value: number): void {
    if (Object.is(Math.fround(value), value)) {
      this.writeU8(Marker.Float32);
      this.ensureCapacity(4);
      this.view.setFloat32(this.offset, value);
      this.offset += 4;
    } else {
      this.writeU8(Marker.Float64);
      this.ensureCapacity(8);
      this.view.setFloat64(this.offset, value);
      this.offset += 8;
    }
  }

  /**
   * Write a string (length-class header + UTF-8 bytes)
   */
  writeString(value: string): void {
    const payload = encoder.encode(value);
    const length = payload.length;
    if (length < 32) {
      this.writeU8(Marker.FixstrBase | length);
    } else if (length <= 0xff) {
      this.writeU8(Marker.Str8);
      this.writeU8(length);
    } else if (length <= 0xffff) {
      this.writeU8(Marker.Str16);
      this.writeU16(length);
    } else if (length <= MAX_UINT32) {
      this.writeU8(Marker.Str32);
      this.writeU32(length);
    } else {
      throw EncodingError.outOfRange('String length', length);
    }
    this.ensureCapacity(length);
    this.bytes.set(payload, this.offset);
    this.offset += length;
  }

  writeArrayHeader(length: number): void {
    this.writeCollectionHeader(length, ARRAY_MARKERS);
  }

  writeMapHeader(length: number): void {
    this.writeCollectionHeader(length, MAP_MARKERS);
  }

  /**
   * Write a sequence from any iterable, one element at a time
   */
  writeSequence<T>(items: Iterable<T>, writeItem: (item: T) => void): void {
    this.writeCollection(ARRAY_MARKERS, () => {
      let count = 0;
      for (const item of items) {
        writeItem(item);
        count += 1;
      }
      return count;
    });
  }

  /**
   * Write a mapping from any iterable of entries, key first then value
   */
  writeMapping<K, V>(
    entries: Iterable<readonly [K, V]>,
    writeKey: (key: K) => void,
    writeValue: (value: V) => void
  ): void {
    this.writeCollection(MAP_MARKERS, () => {
      let count = 0;
      for (const [key, value] of entries) {
        writeKey(key);
        writeValue(value);
        count += 1;
      }
      return count;
    });
  }

  /**
   * Write a handle as fixext8: registered tag + big-endian 64-bit id
   */
  writeHandle(handle: Handle): void {
    const tag = this.handles.tagOf(handle);
    if (handle.id < MIN_INT64 || handle.id > MAX_INT64) {
      throw EncodingError.outOfRange(`${handle.kind} id`, handle.id);
    }
    this.writeU8(Marker.FixExt8);
    this.writeU8(tag);
    this.writeI64(handle.id);
  }

  writeValue(value: Value): void {
    switch (value.kind) {
      case ValueKind.Nil:
        this.writeNil();
        return;
      case ValueKind.Boolean:
        this.writeBoolean(value.value);
        return;
      case ValueKind.Integer:
        this.writeInteger(value.value);
        return;
      case ValueKind.Float:
        this.writeFloat(value.value);
        return;
      case ValueKind.String:
        this.writeString(value.value);
        return;
      case ValueKind.Sequence:
        this.writeSequence(value.items, item => this.writeValue(item));
        return;
      case ValueKind.Mapping:
        this.writeMapping(
          value.entries,
          key => this.writeValue(key),
          item => this.writeValue(item)
        );
        return;
      case ValueKind.Handle:
        this.writeHandle(value.handle);
        return;
      default:
        assertNever(value);
    }
  }

  /**
   * Get the serialized bytes
   */
  toBytes(): Uint8Array {
    return this.bytes.slice(0, this.offset);
  }

  /**
   * Get current buffer size
   */
  size(): number {
    return this.offset;
  }

  reset(): void {
    this.offset = 0;
    this.depth = 0;
  }

  /**
   * Writes a collection whose element count is known once `writeElements`
   * returns it.
   */
  private writeCollection(markers: CollectionMarkers, writeElements: () => number): void {
    const start = this.reserveHeader();
    const outer = this.depth;
    this.depth = enterCollection(outer);
    try {
      this.patchHeader(start, writeElements(), markers);
    } finally {
      this.depth = outer;
    }
  }

  private writeCollectionHeader(length: number, markers: CollectionMarkers): void {
    if (!Number.isInteger(length) || length < 0 || length > MAX_UINT32) {
      throw EncodingError.outOfRange('Collection length', length);
    }
    if (length < 16) {
      this.writeU8(markers.fix | length);
    } else if (length <= 0xffff) {
      this.writeU8(markers.len16);
      this.writeU16(length);
    } else {
      this.writeU8(markers.len32);
      this.writeU32(length);
    }
  }

  private reserveHeader(): number {
    const start = this.offset;
    this.ensureCapacity(DEFERRED_HEADER_SIZE);
    this.offset += DEFERRED_HEADER_SIZE;
    return start;
  }

  /**
   * Replaces the reserved slot at `start` with the real header, shifting the
   * already encoded elements back when the header is shorter than the slot.
   */
  private patchHeader(start: number, count: number, markers: CollectionMarkers): void {
    const headerSize = count < 16 ? 1 : count <= 0xffff ? 3 : DEFERRED_HEADER_SIZE;
    const bodyStart = start + DEFERRED_HEADER_SIZE;
    const end = this.offset;
    const shift = DEFERRED_HEADER_SIZE - headerSize;
    if (shift > 0) {
      this.bytes.copyWithin(start + headerSize, bodyStart, end);
    }
    this.offset = start;
    this.writeCollectionHeader(count, markers);
    this.offset = end - shift;
  }

  private writeU8(value: number): void {
    this.ensureCapacity(1);
    this.bytes[this.offset] = value & 0xff;
    this.offset += 1;
  }

  private writeU16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.offset, value);
    this.offset += 2;
  }

  private writeU32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.offset, value);
    this.offset += 4;
  }

  private writeI64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.offset, value);
    this.offset += 8;
  }

  private ensureCapacity(needed: number): void {
    if (this.offset + needed <= this.bytes.length) return;
    let capacity = this.bytes.length;
    while (capacity < this.offset + needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.bytes.subarray(0, this.offset));
    this.bytes = next;
    this.view = new DataView(next.buffer);
  }
}

/**
 * Encodes a single value into a fresh byte array.
 */
export function encodeValue(value: Value, handles?: HandleRegistry): Uint8Array {
  const writer = new MsgpackWriter(handles);
  writer.writeValue(value);
  return writer.toBytes();
}

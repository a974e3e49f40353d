/**
 * MessagePack marker bytes
 * https://github.com/msgpack/msgpack/blob/master/spec.md
 */

export const Marker = {
  PositiveFixintMax: 0x7f,
  FixmapBase: 0x80,
  FixarrayBase: 0x90,
  FixstrBase: 0xa0,
  NegativeFixintBase: 0xe0,

  Nil: 0xc0,
  NeverUsed: 0xc1,
  False: 0xc2,
  True: 0xc3,

  Bin8: 0xc4,
  Bin16: 0xc5,
  Bin32: 0xc6,

  Ext8: 0xc7,
  Ext16: 0xc8,
  Ext32: 0xc9,

  Float32: 0xca,
  Float64: 0xcb,

  Uint8: 0xcc,
  Uint16: 0xcd,
  Uint32: 0xce,
  Uint64: 0xcf,
  Int8: 0xd0,
  Int16: 0xd1,
  Int32: 0xd2,
  Int64: 0xd3,

  FixExt1: 0xd4,
  FixExt2: 0xd5,
  FixExt4: 0xd6,
  FixExt8: 0xd7,
  FixExt16: 0xd8,

  Str8: 0xd9,
  Str16: 0xda,
  Str32: 0xdb,
  Array16: 0xdc,
  Array32: 0xdd,
  Map16: 0xde,
  Map32: 0xdf,
} as const;

const NAMES: Record<number, string> = {
  [Marker.Nil]: 'nil',
  [Marker.NeverUsed]: 'never used',
  [Marker.False]: 'false',
  [Marker.True]: 'true',
  [Marker.Bin8]: 'bin8',
  [Marker.Bin16]: 'bin16',
  [Marker.Bin32]: 'bin32',
  [Marker.Ext8]: 'ext8',
  [Marker.Ext16]: 'ext16',
  [Marker.Ext32]: 'ext32',
  [Marker.Float32]: 'float32',
  [Marker.Float64]: 'float64',
  [Marker.Uint8]: 'uint8',
  [Marker.Uint16]: 'uint16',
  [Marker.Uint32]: 'uint32',
  [Marker.Uint64]: 'uint64',
  [Marker.Int8]: 'int8',
  [Marker.Int16]: 'int16',
  [Marker.Int32]: 'int32',
  [Marker.Int64]: 'int64',
  [Marker.FixExt1]: 'fixext1',
  [Marker.FixExt2]: 'fixext2',
  [Marker.FixExt4]: 'fixext4',
  [Marker.FixExt8]: 'fixext8',
  [Marker.FixExt16]: 'fixext16',
  [Marker.Str8]: 'str8',
  [Marker.Str16]: 'str16',
  [Marker.Str32]: 'str32',
  [Marker.Array16]: 'array16',
  [Marker.Array32]: 'array32',
  [Marker.Map16]: 'map16',
  [Marker.Map32]: 'map32',
};

/**
 * Human readable name of a marker byte, used in mismatch messages.
 */
export function markerName(marker: number): string {
  if (marker <= Marker.PositiveFixintMax) return 'positive fixint';
  if (marker >= Marker.NegativeFixintBase) return 'negative fixint';
  if (marker < Marker.FixarrayBase) return `fixmap(${marker & 0x0f})`;
  if (marker < Marker.FixstrBase) return `fixarray(${marker & 0x0f})`;
  if (marker < Marker.Nil) return `fixstr(${marker & 0x1f})`;
  return NAMES[marker] ?? 'unknown';
}

/**
 * Payload size of a fixext marker, or undefined for any other marker.
 */
export function fixExtLength(marker: number): number | undefined {
  switch (marker) {
    case Marker.FixExt1:
      return 1;
    case Marker.FixExt2:
      return 2;
    case Marker.FixExt4:
      return 4;
    case Marker.FixExt8:
      return 8;
    case Marker.FixExt16:
      return 16;
    default:
      return undefined;
  }
}

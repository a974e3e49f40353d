/**
 * @nvrpc/runtime - value model, MessagePack codec and msgpack-rpc session
 * used by generated Neovim API bindings
 *
 * @packageDocumentation
 */

// Value model
export {
  ValueKind,
  nilValue,
  booleanValue,
  integerValue,
  floatValue,
  stringValue,
  sequenceValue,
  mappingValue,
  handleValue,
  isNil,
  valuesEqual,
  findEntry,
  mappingGet,
  toValue,
  fromValue,
  assertNever,
  MAX_NESTING_DEPTH,
} from './value';
export type {
  Value,
  NilValue,
  BooleanValue,
  IntegerValue,
  FloatValue,
  StringValue,
  SequenceValue,
  MappingValue,
  MapEntry,
  HandleValue,
  PlainValue,
} from './value';

// Handles
export { Handle, HandleRegistry, MAX_HANDLE_TAG, compareStrings } from './handles';
export type { HandleKind, HandleFactory, HandleConstructor } from './handles';

// Codec
export { MsgpackWriter, encodeValue } from './msgpack/encoder';
export { MsgpackReader, decodeValue } from './msgpack/decoder';
export { Marker, markerName } from './msgpack/markers';

// RPC
export { RpcSession } from './rpc/session';
export type { RpcSessionOptions } from './rpc/session';
export { MessageType } from './rpc/types';
export type {
  RpcClient,
  ArgumentWriter,
  ResultReader,
  ApiVersion,
  UiEventInfo,
  UiEventParameter,
} from './rpc/types';

// Errors
export * from './errors';

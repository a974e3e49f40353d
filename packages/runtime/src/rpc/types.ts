/**
 * Contract between generated call stubs and whatever carries the calls.
 */

import type { MsgpackReader } from '../msgpack/decoder';
import type { MsgpackWriter } from '../msgpack/encoder';

/**
 * Writes the argument tuple of a call, header included.
 */
export type ArgumentWriter = (writer: MsgpackWriter) => void;

/**
 * Decodes the result slot of a successful response.
 */
export type ResultReader<T> = (reader: MsgpackReader) => T;

export interface RpcClient {
  /**
   * Sends one request and resolves with the decoded result of its response.
   */
  call<T>(method: string, writeArgs: ArgumentWriter, readResult: ResultReader<T>): Promise<T>;
}

/**
 * msgpack-rpc message types
 */
export enum MessageType {
  Request = 0,
  Response = 1,
  Notification = 2,
}

export interface ApiVersion {
  readonly apiCompatible: number;
  readonly apiLevel: number;
  readonly apiPrerelease: boolean;
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: boolean;
}

export interface UiEventParameter {
  readonly name: string;
  readonly type: string;
}

export interface UiEventInfo {
  readonly name: string;
  readonly since: number;
  readonly parameters: readonly UiEventParameter[];
}

/**
 * msgpack-rpc session over a pair of Node streams
 *
 * Requests are `[0, msgid, method, params]`, responses
 * `[1, msgid, error, result]`, notifications `[2, method, params]`. Incoming
 * bytes are buffered until a complete message frames, so chunk boundaries do
 * not matter.
 */

import { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import {
  ErrorCode,
  hasErrorCode,
  NvrpcError,
  RemoteError,
  toError,
  TransportError,
} from '../errors';
import { HandleRegistry } from '../handles';
import { MsgpackReader } from '../msgpack/decoder';
import { MsgpackWriter } from '../msgpack/encoder';
import { fromValue, isNil, Value, ValueKind } from '../value';
import { ArgumentWriter, MessageType, ResultReader, RpcClient } from './types';

export interface RpcSessionOptions {
  /**
   * Handle kinds the peer may send; generated bindings export one as `handles`
   */
  handles?: HandleRegistry;
}

interface PendingCall {
  readonly method: string;
  settle(reader: MsgpackReader): void;
  reject(error: Error): void;
}

const EMPTY = new Uint8Array(0);

export class RpcSession implements RpcClient {
  private readonly events = new EventEmitter();
  private readonly pending = new Map<number, PendingCall>();
  private readonly handles: HandleRegistry;
  private buffer: Uint8Array = EMPTY;
  /** Bytes of the first buffered message already scanned */
  private scanned = 0;
  /** Values the scan still has to pass before the first message is whole */
  private unscanned = 1;
  private nextId = 0;
  private closed = false;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    options: RpcSessionOptions = {}
  ) {
    this.handles = options.handles ?? new HandleRegistry();
    this.input.on('data', (chunk: unknown) => this.receive(chunk));
    this.input.on('end', () => this.shutdown(TransportError.closed('input ended')));
    this.input.on('error', (error: Error) => this.shutdown(TransportError.closed(error.message)));
    this.output.on('error', (error: Error) => this.shutdown(TransportError.writeFailed(error)));
  }

  async call<T>(method: string, writeArgs: ArgumentWriter, readResult: ResultReader<T>): Promise<T> {
    if (this.closed) {
      throw TransportError.closed();
    }

    const msgid = this.nextId;
    this.nextId = (this.nextId + 1) >>> 0;

    const writer = new MsgpackWriter(this.handles);
    writer.writeArrayHeader(4);
    writer.writeInteger(MessageType.Request);
    writer.writeInteger(msgid);
    writer.writeString(method);
    writeArgs(writer);
    const request = writer.toBytes();

    return new Promise<T>((resolve, reject) => {
      this.pending.set(msgid, {
        method,
        settle: reader => resolve(readResult(reader)),
        reject,
      });
      this.output.write(request, error => {
        if (error && this.pending.delete(msgid)) {
          reject(TransportError.writeFailed(error));
        }
      });
    });
  }

  /**
   * Number of requests still waiting for a response
   */
  pendingCount(): number {
    return this.pending.size;
  }

  onNotification(listener: (method: string, params: Value[]) => void): () => void {
    this.events.on('notification', listener);
    return () => {
      this.events.off('notification', listener);
    };
  }

  /**
   * Called when the incoming stream cannot be framed or parsed; the session
   * is closed right after.
   */
  onError(listener: (error: Error) => void): () => void {
    this.events.on('protocol-error', listener);
    return () => {
      this.events.off('protocol-error', listener);
    };
  }

  onClose(listener: () => void): () => void {
    this.events.on('close', listener);
    return () => {
      this.events.off('close', listener);
    };
  }

  /**
   * Rejects every pending call and ends the output stream.
   */
  close(): void {
    this.shutdown(TransportError.closed('session closed'));
    this.output.end();
  }

  private receive(chunk: unknown): void {
    if (this.closed) return;
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (!(bytes instanceof Uint8Array)) {
      this.fail(new NvrpcError(ErrorCode.RPC_PROTOCOL_ERROR, 'Received a non-binary chunk'));
      return;
    }
    this.buffer = concat(this.buffer, bytes);

    try {
      for (;;) {
        const length = this.frameLength();
        if (length === undefined) return;
        const message = this.buffer.subarray(0, length);
        this.buffer = this.buffer.slice(length);
        this.dispatch(message);
      }
    } catch (error) {
      this.fail(toError(error));
    }
  }

  /**
   * Size of the first complete message in the buffer, or undefined while
   * more bytes are needed. The scan resumes where the previous chunk left
   * it, at the start of the value that did not fit.
   */
  private frameLength(): number | undefined {
    if (this.scanned >= this.buffer.length) return undefined;
    const reader = new MsgpackReader(this.buffer.subarray(this.scanned), this.handles);
    while (this.unscanned > 0) {
      const start = reader.position();
      let announced: number;
      try {
        announced = reader.skipHead();
      } catch (error) {
        if (hasErrorCode(error, ErrorCode.TRANSPORT_UNEXPECTED_EOF)) {
          this.scanned += start;
          return undefined;
        }
        throw error;
      }
      this.unscanned += announced - 1;
    }
    const length = this.scanned + reader.position();
    this.scanned = 0;
    this.unscanned = 1;
    return length;
  }

  private dispatch(message: Uint8Array): void {
    const reader = new MsgpackReader(message, this.handles);
    const length = reader.readArrayHeader();
    const type = Number(reader.readInteger());

    switch (type) {
      case MessageType.Response:
        expectLength(length, 4, 'response');
        this.handleResponse(reader);
        return;
      case MessageType.Notification: {
        expectLength(length, 3, 'notification');
        const method = reader.readString();
        const params = reader.readSequence(item => item.readValue());
        this.events.emit('notification', method, params);
        return;
      }
      case MessageType.Request:
        expectLength(length, 4, 'request');
        this.rejectRequest(reader);
        return;
      default:
        throw new NvrpcError(ErrorCode.RPC_PROTOCOL_ERROR, `Unknown message type ${type}`, {
          context: { type },
        });
    }
  }

  private handleResponse(reader: MsgpackReader): void {
    const msgid = Number(reader.readInteger());
    const call = this.pending.get(msgid);
    if (!call) {
      throw new NvrpcError(ErrorCode.RPC_PROTOCOL_ERROR, `Response for unknown request ${msgid}`, {
        context: { msgid },
      });
    }
    this.pending.delete(msgid);

    try {
      const error = reader.readValue();
      if (!isNil(error)) {
        call.reject(remoteError(call.method, error));
        return;
      }
      call.settle(reader);
    } catch (error) {
      call.reject(toError(error));
    }
  }

  /**
   * Requests initiated by the peer are answered with an error response.
   */
  private rejectRequest(reader: MsgpackReader): void {
    const msgid = reader.readInteger();
    const method = reader.readString();
    const writer = new MsgpackWriter(this.handles);
    writer.writeArrayHeader(4);
    writer.writeInteger(MessageType.Response);
    writer.writeInteger(msgid);
    writer.writeArrayHeader(2);
    writer.writeInteger(0);
    writer.writeString(`request handling is not supported: ${method}`);
    writer.writeNil();
    this.output.write(writer.toBytes(), error => {
      if (error) this.fail(TransportError.writeFailed(error));
    });
  }

  private fail(error: Error): void {
    if (this.closed) return;
    this.events.emit('protocol-error', error);
    this.shutdown(error);
  }

  private shutdown(error: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer = EMPTY;
    this.scanned = 0;
    this.unscanned = 1;
    const calls = Array.from(this.pending.values());
    this.pending.clear();
    for (const call of calls) {
      call.reject(error);
    }
    this.events.emit('close');
  }
}

/**
 * Builds a RemoteError from a response's error slot, usually
 * `[errorTypeId, message]`.
 */
function remoteError(method: string, error: Value): RemoteError {
  if (error.kind === ValueKind.Sequence && error.items.length === 2) {
    const [type, message] = error.items;
    if (type.kind === ValueKind.Integer && message.kind === ValueKind.String) {
      return new RemoteError(method, Number(type.value), message.value);
    }
  }
  if (error.kind === ValueKind.String) {
    return new RemoteError(method, undefined, error.value);
  }
  return new RemoteError(method, undefined, JSON.stringify(fromValue(error)));
}

function expectLength(actual: number, expected: number, what: string): void {
  if (actual !== expected) {
    throw new NvrpcError(
      ErrorCode.RPC_PROTOCOL_ERROR,
      `Malformed ${what}: expected ${expected} fields, got ${actual}`,
      { context: { expected, actual } }
    );
  }
}

function concat(head: Uint8Array, tail: Uint8Array): Uint8Array {
  if (head.length === 0) return tail;
  const joined = new Uint8Array(head.length + tail.length);
  joined.set(head, 0);
  joined.set(tail, head.length);
  return joined;
}

import { vi } from 'vitest';
import type { ISessionTransport, StreamConnection } from '../domain/ports/ISessionTransport.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { JsonObject, TelescopeRequest } from '../domain/entities/TelescopeMessage.js';
import {
  ConnectionLostError,
  ConnectionRefusedError,
  HandshakeTimeoutError,
} from '../domain/errors/TelescopeErrors.js';
import { FRAME_TERMINATOR, decodeRequestFrame } from '../infrastructure/protocol/FrameCodec.js';

export function createMockLogger(): ILogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/** Returns the `result` field of the reply */
export type FakeResponder = (request: TelescopeRequest) => unknown;

export class FakeStream implements StreamConnection {
  closed = false;
  readonly written: string[] = [];
  private dataHandlers: Array<(chunk: Buffer | string) => void> = [];
  private closeHandlers: Array<(reason: string) => void> = [];

  constructor(private readonly onFrame: (stream: FakeStream, frame: string) => void) {}

  write(data: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConnectionLostError('write on closed socket'));
    }
    this.written.push(data);
    data
      .split(FRAME_TERMINATOR)
      .filter((line) => line.length > 0)
      .forEach((line) => this.onFrame(this, line));
    return Promise.resolve();
  }

  close(): void {
    this.drop('closed locally');
  }

  onData(handler: (chunk: Buffer | string) => void): void {
    this.dataHandlers.push(handler);
  }

  onClose(handler: (reason: string) => void): void {
    this.closeHandlers.push(handler);
  }

  /** Push raw bytes as if they came off the socket */
  emit(chunk: Buffer | string): void {
    if (this.closed) return;
    this.dataHandlers.forEach((handler) => handler(chunk));
  }

  drop(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.closeHandlers.forEach((handler) => handler(reason));
  }
}

/**
 * In-process telescope: records every request and answers the methods it
 * has a responder for. Everything else stays unanswered until the test
 * replies by hand.
 */
export class FakeTelescope implements ISessionTransport {
  handshakeFails = false;
  /** Park every handshake until the test releases it */
  holdHandshakes = false;
  refuseConnections = false;
  readonly handshakes: Array<{ host: string; port: number; at: number }> = [];
  readonly streams: FakeStream[] = [];
  readonly requests: TelescopeRequest[] = [];
  private responders = new Map<string, FakeResponder>();
  private readonly heldHandshakes: Array<(() => void) | null> = [];

  handshake(host: string, port: number, timeoutMs: number): Promise<void> {
    this.handshakes.push({ host, port, at: Date.now() });
    if (this.handshakeFails) {
      return Promise.reject(new HandshakeTimeoutError(host, port, timeoutMs));
    }
    if (this.holdHandshakes) {
      return new Promise<void>((resolve) => this.heldHandshakes.push(resolve));
    }
    return Promise.resolve();
  }

  /** Acknowledge the held handshake with this index, in arrival order */
  releaseHandshake(index: number): void {
    const release = this.heldHandshakes[index];
    if (!release) throw new Error(`No held handshake at index ${index}`);
    this.heldHandshakes[index] = null;
    release();
  }

  openStream(host: string, port: number): Promise<StreamConnection> {
    if (this.refuseConnections) {
      return Promise.reject(new ConnectionRefusedError(host, port, 'ECONNREFUSED'));
    }
    const stream = new FakeStream((source, frame) => this.handleFrame(source, frame));
    this.streams.push(stream);
    return Promise.resolve(stream);
  }

  get currentStream(): FakeStream | undefined {
    return this.streams[this.streams.length - 1];
  }

  respondTo(method: string, responder: FakeResponder): void {
    this.responders.set(method, responder);
  }

  stopResponding(method: string): void {
    this.responders.delete(method);
  }

  requestsFor(method: string): TelescopeRequest[] {
    return this.requests.filter((request) => request.method === method);
  }

  lastRequest(method: string): TelescopeRequest | undefined {
    return this.requestsFor(method).pop();
  }

  reply(id: number, result: unknown = 0, extra: JsonObject = {}): void {
    this.send({ jsonrpc: '2.0', id, code: 0, result, ...extra });
  }

  replyError(id: number, code: number, error: string): void {
    this.send({ jsonrpc: '2.0', id, code, error });
  }

  emitEvent(event: JsonObject): void {
    this.send(event);
  }

  emitRaw(chunk: string): void {
    this.currentStream?.emit(chunk);
  }

  dropConnection(reason = 'connection reset'): void {
    this.currentStream?.drop(reason);
  }

  private send(message: JsonObject): void {
    this.currentStream?.emit(JSON.stringify(message) + FRAME_TERMINATOR);
  }

  private handleFrame(stream: FakeStream, frame: string): void {
    const request = decodeRequestFrame(frame);
    this.requests.push(request);
    const responder = this.responders.get(request.method);
    if (!responder) return;
    const result = responder(request);
    // Reply on a later microtask, like a real socket would.
    void Promise.resolve().then(() => {
      stream.emit(
        JSON.stringify({ jsonrpc: '2.0', id: request.id, method: request.method, code: 0, result }) +
          FRAME_TERMINATOR
      );
    });
  }
}

import {
  isJsonObject,
  type JsonObject,
  type TelescopeEventMessage,
  type TelescopeRequest,
  type TelescopeResponseMessage,
} from '../../domain/entities/TelescopeMessage.js';
import { DecodeError } from '../../domain/errors/TelescopeErrors.js';

export const FRAME_TERMINATOR = '\r\n';

export type DecodedFrame =
  | { kind: 'response'; message: TelescopeResponseMessage }
  | { kind: 'event'; message: TelescopeEventMessage; payload: JsonObject }
  | { kind: 'invalid'; error: DecodeError };

/**
 * Encode a request as one CRLF-terminated frame. Key order is id, method, params;
 * params is left out when undefined.
 */
export function encodeRequestFrame(request: TelescopeRequest): string {
  const payload: JsonObject = { id: request.id, method: request.method };
  if (request.params !== undefined) {
    payload.params = request.params;
  }
  return JSON.stringify(payload) + FRAME_TERMINATOR;
}

/**
 * Parse a single request frame (terminator optional). Throws DecodeError.
 */
export function decodeRequestFrame(frame: string): TelescopeRequest {
  const line = frame.endsWith(FRAME_TERMINATOR) ? frame.slice(0, -FRAME_TERMINATOR.length) : frame;
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new DecodeError(line, error instanceof Error ? error.message : 'invalid JSON');
  }
  if (!isJsonObject(parsed) || typeof parsed.id !== 'number' || typeof parsed.method !== 'string') {
    throw new DecodeError(line, 'request frame needs a numeric id and a string method');
  }
  const request: TelescopeRequest = { id: parsed.id, method: parsed.method };
  if ('params' in parsed) {
    request.params = parsed.params;
  }
  return request;
}

/**
 * Classify one inbound line. Events win over ids: a frame carrying `Event` is
 * never treated as a response.
 */
export function classifyLine(line: string): DecodedFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    return {
      kind: 'invalid',
      error: new DecodeError(line, error instanceof Error ? error.message : 'invalid JSON'),
    };
  }

  if (!isJsonObject(parsed)) {
    return { kind: 'invalid', error: new DecodeError(line, 'frame is not a JSON object') };
  }

  if (typeof parsed.Event === 'string') {
    const message: TelescopeEventMessage = { Event: parsed.Event, result: parsed.result };
    if (typeof parsed.state === 'string') message.state = parsed.state;
    if (typeof parsed.error === 'string') message.error = parsed.error;
    if (typeof parsed.Timestamp === 'string') message.Timestamp = parsed.Timestamp;
    return { kind: 'event', message, payload: parsed };
  }

  if (typeof parsed.id === 'number') {
    const message: TelescopeResponseMessage = {
      id: parsed.id,
      result: parsed.result,
      error: parsed.error,
    };
    if (typeof parsed.jsonrpc === 'string') message.jsonrpc = parsed.jsonrpc;
    if (typeof parsed.method === 'string') message.method = parsed.method;
    if (typeof parsed.code === 'number') message.code = parsed.code;
    if (typeof parsed.Timestamp === 'string') message.Timestamp = parsed.Timestamp;
    return { kind: 'response', message };
  }

  return { kind: 'invalid', error: new DecodeError(line, 'frame has neither id nor Event') };
}

/**
 * Incremental decoder for the inbound byte stream. Partial lines (and UTF-8
 * sequences split across chunks) are held until their terminator arrives.
 */
export class FrameDecoder {
  private readonly textDecoder = new TextDecoder('utf-8');
  private remainder = '';

  push(chunk: Buffer | string): DecodedFrame[] {
    this.remainder +=
      typeof chunk === 'string' ? chunk : this.textDecoder.decode(chunk, { stream: true });

    const frames: DecodedFrame[] = [];
    let index = this.remainder.indexOf(FRAME_TERMINATOR);
    while (index >= 0) {
      const line = this.remainder.slice(0, index);
      this.remainder = this.remainder.slice(index + FRAME_TERMINATOR.length);
      if (line.trim().length > 0) {
        frames.push(classifyLine(line));
      }
      index = this.remainder.indexOf(FRAME_TERMINATOR);
    }
    return frames;
  }

  get bufferedLength(): number {
    return this.remainder.length;
  }

  reset(): void {
    this.remainder = '';
    this.textDecoder.decode();
  }
}

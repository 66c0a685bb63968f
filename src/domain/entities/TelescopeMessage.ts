/**
 * Wire-level message shapes of the telescope control protocol.
 * Every message is a single JSON object terminated by CR LF.
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Outgoing request: {"id": 1001, "method": "scope_get_equ_coord", "params": {...}}
 */
export interface TelescopeRequest {
  id: number;
  method: string;
  params?: unknown;
}

/**
 * Correlated reply. `code` 0 (or absent) is success; anything else is a
 * rejection and `error` carries the telescope's message.
 */
export interface TelescopeResponseMessage {
  jsonrpc?: string;
  id: number;
  method?: string;
  code?: number;
  result?: unknown;
  error?: unknown;
  Timestamp?: string;
}

/**
 * Uncorrelated notification pushed by the telescope.
 * e.g. {"Event": "AutoGoto", "state": "complete", "result": {"success": true}}
 */
export interface TelescopeEventMessage {
  Event: string;
  state?: string;
  result?: unknown;
  error?: string;
  Timestamp?: string;
}

/**
 * Event kinds the bridge knows how to interpret. Anything else arrives as
 * `Unknown` with the original name preserved.
 */
export const TELESCOPE_EVENT_KINDS = [
  'AutoGoto',
  'AutoFocus',
  'Stack',
  'Exposure',
  'PlateSolve',
  'ScopeGoto',
  'ScopeHome',
  'ScopeTrack',
  'ScanSun',
  'View',
  'PiStatus',
  'Alert',
  'Unknown',
] as const;

export type TelescopeEventKind = (typeof TELESCOPE_EVENT_KINDS)[number];

/**
 * Decoded inbound event, dispatched to subscribers in wire-arrival order.
 */
export interface InboundEvent {
  kind: TelescopeEventKind;
  /** Event name exactly as received */
  name: string;
  state: string | null;
  result: unknown;
  error: string | null;
  /** The whole decoded frame; some events carry counters at top level */
  payload: JsonObject;
  receivedAt: number;
}

export function toEventKind(name: string): TelescopeEventKind {
  const known = TELESCOPE_EVENT_KINDS.find((kind) => kind === name && kind !== 'Unknown');
  return known ?? 'Unknown';
}

export function toInboundEvent(
  message: TelescopeEventMessage,
  receivedAt: number,
  payload: JsonObject
): InboundEvent {
  return {
    kind: toEventKind(message.Event),
    name: message.Event,
    state: typeof message.state === 'string' ? message.state : null,
    result: message.result,
    error: typeof message.error === 'string' ? message.error : null,
    payload,
    receivedAt,
  };
}

import type { InboundEvent, TelescopeEventKind } from '../entities/TelescopeMessage.js';

/**
 * Connection lifecycle of a protocol session.
 *
 *   disconnected → initializing → connected ⇄ degraded → reconnecting → connected
 *   any state → disconnected when disconnect() is called (terminal)
 */
export type ConnectionState =
  | 'disconnected'
  | 'initializing'
  | 'connected'
  | 'degraded'
  | 'reconnecting';

export type ConnectionStateHandler = (state: ConnectionState, previous: ConnectionState) => void;
export type InboundEventHandler = (event: InboundEvent) => void;

/**
 * Which events a subscriber wants: a single kind, a list of kinds, or a predicate.
 * Omitted means every event.
 */
export type EventFilter =
  | TelescopeEventKind
  | readonly TelescopeEventKind[]
  | ((event: InboundEvent) => boolean);

/**
 * Per-subscriber event sequence. Iteration ends when the session closes or
 * close() is called; closing one subscription does not affect others.
 */
export interface EventSubscription extends AsyncIterable<InboundEvent> {
  readonly closed: boolean;
  close(): void;
}

export interface SendOptions {
  /** Overrides the per-method / default deadline */
  timeoutMs?: number;
}

export interface SessionStats {
  framesSent: number;
  framesReceived: number;
  decodeErrors: number;
  unmatchedResponses: number;
  reconnects: number;
}

export interface ConnectOptions {
  host?: string;
  tcpPort?: number;
  udpPort?: number;
  timeoutMs?: number;
}

/**
 * Port for the telescope protocol session. The infrastructure ProtocolSession
 * is the only implementation; use cases depend on this interface.
 */
export interface ITelescopeSession {
  readonly connectionState: ConnectionState;
  readonly host: string | null;
  readonly pendingCount: number;
  readonly stats: Readonly<SessionStats>;

  connect(options?: ConnectOptions): Promise<void>;
  disconnect(): Promise<void>;

  /**
   * Send a request and wait for the response with the same id.
   * Rejects with RemoteError, RequestTimeoutError, ConnectionLostError or
   * NotConnectedError. Never retried automatically.
   */
  send(method: string, params?: unknown, options?: SendOptions): Promise<unknown>;

  /** Give up an in-progress reconnection loop; state becomes disconnected */
  stopReconnecting(): void;

  subscribe(filter?: EventFilter): EventSubscription;

  onEvent(handler: InboundEventHandler): void;
  offEvent(handler: InboundEventHandler): void;
  onConnectionStateChange(handler: ConnectionStateHandler): void;
  offConnectionStateChange(handler: ConnectionStateHandler): void;
}

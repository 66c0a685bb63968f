import type {
  ConnectOptions,
  ConnectionState,
  ConnectionStateHandler,
  EventFilter,
  EventSubscription,
  ITelescopeSession,
  InboundEventHandler,
  SendOptions,
  SessionStats,
} from '../../domain/ports/ITelescopeSession.js';
import type { ISessionTransport, StreamConnection } from '../../domain/ports/ISessionTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import {
  toInboundEvent,
  type InboundEvent,
  type JsonObject,
  type TelescopeEventMessage,
  type TelescopeResponseMessage,
} from '../../domain/entities/TelescopeMessage.js';
import {
  ConnectionLostError,
  InvalidInputError,
  NotConnectedError,
  RemoteError,
  RequestTimeoutError,
  TelescopeError,
  errorMessage,
} from '../../domain/errors/TelescopeErrors.js';
import { FrameDecoder, encodeRequestFrame } from './FrameCodec.js';
import { ExponentialBackoff } from './ExponentialBackoff.js';

export const DEFAULT_TCP_PORT = 4700;
export const DEFAULT_UDP_PORT = 4720;
export const FIRST_REQUEST_ID = 1001;
export const MAX_REQUEST_ID = 2 ** 31 - 1;

/**
 * Methods whose reply can take as long as a slew or a plate solve.
 */
export const LONG_RUNNING_METHODS = [
  'iscope_start_view',
  'start_solve',
  'start_auto_focuse',
  'scope_park',
  'scope_move_to_horizon',
] as const;

export interface ProtocolSessionConfig {
  host?: string;
  tcpPort?: number;
  udpPort?: number;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
  /** Deadline applied to LONG_RUNNING_METHODS unless methodTimeouts says otherwise */
  longRunningTimeoutMs?: number;
  /** Per-method deadlines, merged over the defaults */
  methodTimeouts?: Record<string, number>;
  /** Id of the first request; later ids count up from it */
  firstRequestId?: number;
  /** Highest id before the counter wraps to 1 */
  maxRequestId?: number;
  heartbeatMethod?: string;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  /** Consecutive missed heartbeats before the session is Degraded */
  heartbeatMissThreshold?: number;
  /** Inbound silence (ms) that turns Degraded into a reconnection */
  silenceThresholdMs?: number;
  reconnectBaseDelayMs?: number;
  reconnectMaxDelayMs?: number;
  /** 0 = unbounded */
  reconnectMaxAttempts?: number;
  /** Events buffered per subscriber before the oldest are dropped */
  subscriberBufferSize?: number;
}

type ResolvedSessionConfig = Required<Omit<ProtocolSessionConfig, 'host'>> & { host: string | null };

interface PendingRequest {
  id: number;
  method: string;
  params: unknown;
  issuedAt: number;
  deadline: number;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

function toMatcher(filter: EventFilter | undefined): (event: InboundEvent) => boolean {
  if (filter === undefined) return () => true;
  if (typeof filter === 'function') return filter;
  if (typeof filter === 'string') return (event) => event.kind === filter;
  const kinds = new Set<string>(filter);
  return (event) => kinds.has(event.kind);
}

function describeRemoteError(message: TelescopeResponseMessage): string {
  const detail = message.error ?? message.result;
  if (typeof detail === 'string') return detail;
  if (typeof detail === 'object' && detail !== null && 'message' in detail) {
    const nested = detail.message;
    if (typeof nested === 'string') return nested;
  }
  return detail === undefined ? 'unknown error' : JSON.stringify(detail);
}

/**
 * One subscriber's view of the event stream: a bounded FIFO plus the
 * iterators currently waiting on it.
 */
class QueueSubscription implements EventSubscription {
  private queue: InboundEvent[] = [];
  private waiters: Array<(result: IteratorResult<InboundEvent>) => void> = [];
  private _closed = false;
  private ending = false;

  constructor(
    private readonly matches: (event: InboundEvent) => boolean,
    private readonly capacity: number,
    private readonly detach: (subscription: QueueSubscription) => void,
    private readonly onOverflow: (dropped: InboundEvent) => void
  ) {}

  get closed(): boolean {
    return this._closed;
  }

  offer(event: InboundEvent): void {
    if (this._closed || this.ending || !this.matches(event)) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return;
    }
    if (this.queue.length >= this.capacity) {
      const dropped = this.queue.shift();
      if (dropped) this.onOverflow(dropped);
    }
    this.queue.push(event);
  }

  /**
   * Session ended: hand out what is already queued, then finish.
   */
  end(): void {
    if (this._closed) return;
    this.ending = true;
    if (this.queue.length === 0) this.close();
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.queue = [];
    this.detach(this);
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((waiter) => waiter({ value: undefined, done: true }));
  }

  [Symbol.asyncIterator](): AsyncIterator<InboundEvent> {
    return {
      next: (): Promise<IteratorResult<InboundEvent>> => {
        const queued = this.queue.shift();
        if (queued) {
          if (this.ending && this.queue.length === 0) this.close();
          return Promise.resolve({ value: queued, done: false });
        }
        if (this._closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => this.waiters.push(resolve));
      },
      return: (): Promise<IteratorResult<InboundEvent>> => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

/**
 * Owns the telescope connection: UDP handshake, the TCP control channel,
 * request/response correlation by id, event fan-out, heartbeat and
 * reconnection.
 *
 * Outstanding requests are never retried: when the channel drops they fail
 * with ConnectionLostError and the caller decides.
 */
export class ProtocolSession implements ITelescopeSession {
  private readonly config: ResolvedSessionConfig;
  private _connectionState: ConnectionState = 'disconnected';
  private connection: StreamConnection | null = null;
  private connectionGeneration = 0;
  /** Bumped by every connect, reconnect attempt, stop and disconnect */
  private connectAttempt = 0;
  private readonly decoder = new FrameDecoder();
  private lastIssuedId: number;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly backoff: ExponentialBackoff;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatInFlight = false;
  private missedHeartbeats = 0;
  private _lastInboundAt = 0;
  private closed = false;
  private readonly _stats: SessionStats = {
    framesSent: 0,
    framesReceived: 0,
    decodeErrors: 0,
    unmatchedResponses: 0,
    reconnects: 0,
  };

  private readonly subscriptions = new Set<QueueSubscription>();
  private readonly eventHandlers = new Set<InboundEventHandler>();
  private readonly connectionStateHandlers = new Set<ConnectionStateHandler>();

  constructor(
    config: ProtocolSessionConfig,
    private readonly transport: ISessionTransport,
    private readonly logger: ILogger,
    private readonly clock: () => number = Date.now
  ) {
    const longRunningTimeoutMs = config.longRunningTimeoutMs ?? 120000;
    const longRunningDefaults = Object.fromEntries(
      LONG_RUNNING_METHODS.map((method) => [method, longRunningTimeoutMs])
    );

    this.config = {
      host: config.host ?? null,
      tcpPort: config.tcpPort ?? DEFAULT_TCP_PORT,
      udpPort: config.udpPort ?? DEFAULT_UDP_PORT,
      connectTimeoutMs: config.connectTimeoutMs ?? 10000,
      requestTimeoutMs: config.requestTimeoutMs ?? 30000,
      longRunningTimeoutMs,
      methodTimeouts: { ...longRunningDefaults, ...config.methodTimeouts },
      firstRequestId: config.firstRequestId ?? FIRST_REQUEST_ID,
      maxRequestId: config.maxRequestId ?? MAX_REQUEST_ID,
      heartbeatMethod: config.heartbeatMethod ?? 'test_connection',
      heartbeatIntervalMs: config.heartbeatIntervalMs ?? 15000,
      heartbeatTimeoutMs: config.heartbeatTimeoutMs ?? 10000,
      heartbeatMissThreshold: config.heartbeatMissThreshold ?? 2,
      silenceThresholdMs: config.silenceThresholdMs ?? 45000,
      reconnectBaseDelayMs: config.reconnectBaseDelayMs ?? 1000,
      reconnectMaxDelayMs: config.reconnectMaxDelayMs ?? 60000,
      reconnectMaxAttempts: config.reconnectMaxAttempts ?? 0,
      subscriberBufferSize: config.subscriberBufferSize ?? 256,
    };

    this.lastIssuedId = this.config.firstRequestId - 1;

    this.backoff = new ExponentialBackoff({
      baseDelayMs: this.config.reconnectBaseDelayMs,
      maxDelayMs: this.config.reconnectMaxDelayMs,
      maxAttempts: this.config.reconnectMaxAttempts,
    });
  }

  get connectionState(): ConnectionState {
    return this._connectionState;
  }

  get host(): string | null {
    return this.config.host;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get stats(): Readonly<SessionStats> {
    return { ...this._stats };
  }

  get lastInboundAt(): number {
    return this._lastInboundAt;
  }

  get reconnectAttempts(): number {
    return this.backoff.attempts;
  }

  /**
   * Deadline used for `method` when the caller passes none.
   */
  timeoutFor(method: string): number {
    return this.config.methodTimeouts[method] ?? this.config.requestTimeoutMs;
  }

  private setConnectionState(state: ConnectionState): void {
    const previous = this._connectionState;
    if (previous === state) return;
    this._connectionState = state;
    this.logger.info('Connection state changed', { from: previous, to: state });
    this.connectionStateHandlers.forEach((handler) => {
      try {
        handler(state, previous);
      } catch (error) {
        this.logger.error('Connection state handler failed', error);
      }
    });
  }

  async connect(options: ConnectOptions = {}): Promise<void> {
    if (this.closed) {
      throw new ConnectionLostError('session was disconnected; create a new session to reconnect');
    }
    if (
      this._connectionState === 'connected' ||
      this._connectionState === 'degraded' ||
      this._connectionState === 'initializing'
    ) {
      this.logger.warn('Already connected or connecting', { state: this._connectionState });
      return;
    }

    if (options.host !== undefined) this.config.host = options.host;
    if (options.tcpPort !== undefined) this.config.tcpPort = options.tcpPort;
    if (options.udpPort !== undefined) this.config.udpPort = options.udpPort;
    if (options.timeoutMs !== undefined) this.config.connectTimeoutMs = options.timeoutMs;

    if (!this.config.host) {
      throw new InvalidInputError('No telescope host configured');
    }

    // A reconnect attempt still in flight is superseded by this one
    this.clearReconnectTimer();
    const attempt = ++this.connectAttempt;
    this.setConnectionState('initializing');

    let connection: StreamConnection;
    try {
      connection = await this.establish();
    } catch (error) {
      if (attempt !== this.connectAttempt) throw error;
      this.setConnectionState('disconnected');
      this.logger.error('Failed to connect to telescope', error, {
        host: this.config.host,
        tcpPort: this.config.tcpPort,
        udpPort: this.config.udpPort,
      });
      throw error;
    }

    if (attempt !== this.connectAttempt || this.closed) {
      connection.close();
      throw new ConnectionLostError('session disconnected while connecting');
    }

    this.attach(connection);
    this.backoff.reset();
    this.setConnectionState('connected');
    this.startHeartbeat();
  }

  /**
   * Handshake then TCP. Leaves state and the current channel alone; callers
   * attach the stream once they know their attempt is still current.
   */
  private async establish(): Promise<StreamConnection> {
    const { host, udpPort, tcpPort, connectTimeoutMs } = this.config;
    if (!host) {
      throw new InvalidInputError('No telescope host configured');
    }

    this.logger.info('Connecting to telescope', { host, udpPort, tcpPort });
    await this.transport.handshake(host, udpPort, connectTimeoutMs);
    this.logger.debug('UDP handshake acknowledged', { host, udpPort });

    return this.transport.openStream(host, tcpPort, connectTimeoutMs);
  }

  private attach(connection: StreamConnection): void {
    const generation = ++this.connectionGeneration;
    this.connection = connection;
    this.decoder.reset();
    this._lastInboundAt = this.clock();
    this.missedHeartbeats = 0;

    connection.onData((chunk) => {
      if (generation === this.connectionGeneration) this.handleData(chunk);
    });
    connection.onClose((reason) => {
      if (generation === this.connectionGeneration) this.handleUnexpectedClose(reason);
    });
  }

  private detach(): void {
    this.connectionGeneration++;
    const connection = this.connection;
    this.connection = null;
    connection?.close();
    this.decoder.reset();
  }

  private handleData(chunk: Buffer | string): void {
    this._lastInboundAt = this.clock();

    for (const frame of this.decoder.push(chunk)) {
      this._stats.framesReceived++;
      switch (frame.kind) {
        case 'response':
          this.logger.trace('Response received', { id: frame.message.id, code: frame.message.code });
          this.handleResponse(frame.message);
          break;
        case 'event':
          this.logger.trace('Event received', { event: frame.message.Event, state: frame.message.state });
          this.dispatchEvent(frame.message, frame.payload);
          break;
        case 'invalid':
          this._stats.decodeErrors++;
          this.logger.warn('Discarding malformed frame', frame.error.context);
          break;
      }
    }
  }

  private handleResponse(message: TelescopeResponseMessage): void {
    const pending = this.pending.get(message.id);
    if (!pending) {
      this._stats.unmatchedResponses++;
      this.logger.warn('Dropping response with no pending request', {
        id: message.id,
        method: message.method,
      });
      return;
    }

    clearTimeout(pending.timer);
    this.pending.delete(message.id);

    const code = message.code ?? 0;
    if (code !== 0) {
      pending.reject(new RemoteError(code, describeRemoteError(message), pending.method, pending.id));
      return;
    }
    pending.resolve(message.result);
  }

  private dispatchEvent(message: TelescopeEventMessage, payload: JsonObject): void {
    const event = toInboundEvent(message, this.clock(), payload);

    this.eventHandlers.forEach((handler) => {
      try {
        handler(event);
      } catch (error) {
        this.logger.error('Event handler failed', error, { event: event.name });
      }
    });
    this.subscriptions.forEach((subscription) => subscription.offer(event));
  }

  send(method: string, params?: unknown, options: SendOptions = {}): Promise<unknown> {
    const connection = this.connection;
    if (
      !connection ||
      (this._connectionState !== 'connected' && this._connectionState !== 'degraded')
    ) {
      return Promise.reject(new NotConnectedError(this._connectionState, method));
    }

    const id = this.allocateId();
    const timeoutMs = options.timeoutMs ?? this.timeoutFor(method);
    const frame = encodeRequestFrame({ id, method, params });

    return new Promise<unknown>((resolve, reject) => {
      const issuedAt = this.clock();
      const timer = setTimeout(() => {
        if (this.pending.get(id) !== entry) return;
        this.pending.delete(id);
        this.logger.warn('Request timed out', { id, method, timeoutMs });
        reject(new RequestTimeoutError(method, id, timeoutMs));
      }, timeoutMs);

      const entry: PendingRequest = {
        id,
        method,
        params,
        issuedAt,
        deadline: issuedAt + timeoutMs,
        resolve,
        reject,
        timer,
      };
      this.pending.set(id, entry);
      this._stats.framesSent++;
      this.logger.trace('Request sent', { id, method });

      connection.write(frame).catch((error: unknown) => {
        if (this.pending.get(id) !== entry) return;
        clearTimeout(timer);
        this.pending.delete(id);
        reject(
          error instanceof TelescopeError
            ? error
            : new ConnectionLostError(errorMessage(error), { method, id })
        );
      });
    });
  }

  /**
   * Monotonic ids; wraps to 1 after maxRequestId and skips ids still pending.
   */
  private allocateId(): number {
    do {
      this.lastIssuedId = this.lastIssuedId >= this.config.maxRequestId ? 1 : this.lastIssuedId + 1;
    } while (this.pending.has(this.lastIssuedId));
    return this.lastIssuedId;
  }

  private failAllPending(error: TelescopeError): void {
    if (this.pending.size === 0) return;
    const entries = [...this.pending.values()];
    this.pending.clear();
    this.logger.warn('Failing outstanding requests', {
      count: entries.length,
      methods: entries.map((entry) => entry.method),
      error: error.kind,
    });
    entries.forEach((entry) => {
      clearTimeout(entry.timer);
      entry.reject(error);
    });
  }

  // Heartbeat

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.missedHeartbeats = 0;
    this.heartbeatTimer = setInterval(() => this.heartbeatTick(), this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.heartbeatInFlight = false;
  }

  private heartbeatTick(): void {
    if (this._connectionState !== 'connected' && this._connectionState !== 'degraded') return;

    const silentForMs = this.clock() - this._lastInboundAt;
    if (this._connectionState === 'degraded' && silentForMs > this.config.silenceThresholdMs) {
      this.logger.warn('Telescope silent beyond threshold, reconnecting', {
        silentForMs,
        thresholdMs: this.config.silenceThresholdMs,
      });
      this.beginReconnect(`no traffic for ${silentForMs}ms`);
      return;
    }

    if (this.heartbeatInFlight) return;
    this.heartbeatInFlight = true;

    this.send(this.config.heartbeatMethod, undefined, {
      timeoutMs: this.config.heartbeatTimeoutMs,
    }).then(
      () => this.onHeartbeatResult(null),
      (error: unknown) => this.onHeartbeatResult(error)
    );
  }

  private onHeartbeatResult(error: unknown): void {
    this.heartbeatInFlight = false;
    if (this._connectionState !== 'connected' && this._connectionState !== 'degraded') return;

    // A rejection is still a reply: the telescope is alive.
    if (error === null || error instanceof RemoteError) {
      if (this._connectionState === 'degraded') {
        this.logger.info('Heartbeat recovered');
        this.setConnectionState('connected');
      }
      this.missedHeartbeats = 0;
      return;
    }

    this.missedHeartbeats++;
    this.logger.warn('Heartbeat missed', {
      missed: this.missedHeartbeats,
      error: errorMessage(error),
    });
    if (
      this._connectionState === 'connected' &&
      this.missedHeartbeats >= this.config.heartbeatMissThreshold
    ) {
      this.setConnectionState('degraded');
    }
  }

  // Reconnection

  private handleUnexpectedClose(reason: string): void {
    if (this.closed || this._connectionState === 'disconnected') return;
    this.logger.warn('Control channel closed unexpectedly', { reason, state: this._connectionState });
    this.beginReconnect(reason);
  }

  private beginReconnect(reason: string): void {
    const lastState = this._connectionState;
    this.stopHeartbeat();
    this.detach();
    this.failAllPending(new ConnectionLostError(reason, { lastState }));
    this.setConnectionState('reconnecting');
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.closed || this._connectionState !== 'reconnecting') return;

    if (this.backoff.exhausted) {
      this.logger.error('Max reconnection attempts reached', undefined, {
        attempts: this.backoff.attempts,
      });
      this.backoff.reset();
      this.setConnectionState('disconnected');
      return;
    }

    const delayMs = this.backoff.next();
    this.logger.info('Scheduling reconnection', { attempt: this.backoff.attempts, delayMs });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attemptReconnect().catch((error) => {
        this.logger.error('Reconnection attempt crashed', error);
      });
    }, delayMs);
  }

  private async attemptReconnect(): Promise<void> {
    if (this.closed || this._connectionState !== 'reconnecting') return;
    const attempt = ++this.connectAttempt;

    let connection: StreamConnection;
    try {
      connection = await this.establish();
    } catch (error) {
      if (attempt !== this.connectAttempt) return;
      this.logger.warn('Reconnection attempt failed', {
        attempt: this.backoff.attempts,
        error: errorMessage(error),
      });
      this.scheduleReconnect();
      return;
    }

    if (attempt !== this.connectAttempt || this._connectionState !== 'reconnecting') {
      // A manual connect, stopReconnecting() or disconnect() won the race
      this.logger.debug('Discarding superseded reconnection', { attempt });
      connection.close();
      return;
    }

    this.attach(connection);
    this._stats.reconnects++;
    this.logger.info('Reconnected to telescope', { attempts: this.backoff.attempts });
    this.backoff.reset();
    this.setConnectionState('connected');
    this.startHeartbeat();
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /**
   * Abandon an in-progress reconnection loop. The session can be connected
   * again afterwards.
   */
  stopReconnecting(): void {
    if (this._connectionState !== 'reconnecting') return;
    this.clearReconnectTimer();
    this.connectAttempt++;
    this.backoff.reset();
    this.logger.info('Reconnection stopped');
    this.setConnectionState('disconnected');
  }

  async disconnect(): Promise<void> {
    this.logger.info('Disconnecting from telescope', { host: this.config.host });
    this.closed = true;
    this.connectAttempt++;
    this.clearReconnectTimer();
    this.stopHeartbeat();
    this.detach();
    this.failAllPending(
      new ConnectionLostError('session disconnected', { lastState: this._connectionState })
    );
    [...this.subscriptions].forEach((subscription) => subscription.end());
    this.setConnectionState('disconnected');
  }

  // Event subscription

  subscribe(filter?: EventFilter): EventSubscription {
    const subscription = new QueueSubscription(
      toMatcher(filter),
      this.config.subscriberBufferSize,
      (closed) => this.subscriptions.delete(closed),
      (dropped) =>
        this.logger.warn('Subscriber buffer full, dropping oldest event', { event: dropped.name })
    );
    if (this.closed) {
      subscription.end();
    } else {
      this.subscriptions.add(subscription);
    }
    return subscription;
  }

  onEvent(handler: InboundEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: InboundEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  onConnectionStateChange(handler: ConnectionStateHandler): void {
    this.connectionStateHandlers.add(handler);
  }

  offConnectionStateChange(handler: ConnectionStateHandler): void {
    this.connectionStateHandlers.delete(handler);
  }
}

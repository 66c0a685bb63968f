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
} from '../domain/ports/ITelescopeSession.js';
import type { InboundEvent } from '../domain/entities/TelescopeMessage.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { errorMessage } from '../domain/errors/TelescopeErrors.js';

export type SessionFactory = () => ITelescopeSession;

/**
 * Keeps one live protocol session behind a stable handle.
 *
 * A protocol session is finished once disconnect() has been called, so a
 * later connect() builds a fresh one from the factory. Event and state
 * listeners registered here survive that swap, and resync callbacks run
 * after every automatic reconnection.
 */
export class SessionManager implements ITelescopeSession {
  private session: ITelescopeSession;
  private retired = false;
  private connectOptions: ConnectOptions = {};
  private readonly eventHandlers = new Set<InboundEventHandler>();
  private readonly stateHandlers = new Set<ConnectionStateHandler>();
  private readonly resyncCallbacks: Array<() => void | Promise<void>> = [];
  private readonly logger: ILogger;

  constructor(
    private readonly createSession: SessionFactory,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'SessionManager' });
    this.session = this.adopt(createSession());
  }

  get connectionState(): ConnectionState {
    return this.session.connectionState;
  }

  get host(): string | null {
    return this.connectOptions.host ?? this.session.host;
  }

  get pendingCount(): number {
    return this.session.pendingCount;
  }

  get stats(): Readonly<SessionStats> {
    return this.session.stats;
  }

  /** Registered callbacks run in order after an automatic reconnection */
  onReconnected(callback: () => void | Promise<void>): void {
    this.resyncCallbacks.push(callback);
  }

  async connect(options: ConnectOptions = {}): Promise<void> {
    if (this.retired) {
      this.logger.debug('Replacing disconnected session');
      this.release(this.session);
      this.session = this.adopt(this.createSession());
      this.retired = false;
    }
    this.connectOptions = { ...this.connectOptions, ...options };
    await this.session.connect(this.connectOptions);
  }

  async disconnect(): Promise<void> {
    this.retired = true;
    await this.session.disconnect();
  }

  send(method: string, params?: unknown, options?: SendOptions): Promise<unknown> {
    return this.session.send(method, params, options);
  }

  stopReconnecting(): void {
    this.session.stopReconnecting();
  }

  subscribe(filter?: EventFilter): EventSubscription {
    return this.session.subscribe(filter);
  }

  onEvent(handler: InboundEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: InboundEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  onConnectionStateChange(handler: ConnectionStateHandler): void {
    this.stateHandlers.add(handler);
  }

  offConnectionStateChange(handler: ConnectionStateHandler): void {
    this.stateHandlers.delete(handler);
  }

  private readonly relayEvent = (event: InboundEvent): void => {
    [...this.eventHandlers].forEach((handler) => {
      try {
        handler(event);
      } catch (error) {
        this.logger.error('Event listener failed', error, { event: event.name });
      }
    });
  };

  private readonly relayState = (state: ConnectionState, previous: ConnectionState): void => {
    [...this.stateHandlers].forEach((handler) => {
      try {
        handler(state, previous);
      } catch (error) {
        this.logger.error('Connection state listener failed', error, { state });
      }
    });

    if (state === 'connected' && previous === 'reconnecting') {
      this.resync().catch((error) => {
        this.logger.error('Resync after reconnect crashed', error);
      });
    }
  };

  private async resync(): Promise<void> {
    this.logger.info('Reconnected, resyncing state', { callbacks: this.resyncCallbacks.length });
    for (const callback of this.resyncCallbacks) {
      try {
        await callback();
      } catch (error) {
        this.logger.warn('Resync after reconnect failed', { error: errorMessage(error) });
      }
    }
  }

  private adopt(session: ITelescopeSession): ITelescopeSession {
    session.onEvent(this.relayEvent);
    session.onConnectionStateChange(this.relayState);
    return session;
  }

  private release(session: ITelescopeSession): void {
    session.offEvent(this.relayEvent);
    session.offConnectionStateChange(this.relayState);
  }
}

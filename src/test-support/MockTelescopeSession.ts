import { vi } from 'vitest';
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
import { toInboundEvent, type InboundEvent, type JsonObject } from '../domain/entities/TelescopeMessage.js';

type SendFn = (method: string, params?: unknown, options?: SendOptions) => Promise<unknown>;

const endedSubscription: EventSubscription = {
  closed: true,
  close: () => undefined,
  [Symbol.asyncIterator]: () => ({
    next: (): Promise<IteratorResult<InboundEvent>> => Promise.resolve({ value: undefined, done: true }),
  }),
};

/**
 * Port-level stand-in for use case tests. `send` resolves with 0 unless a
 * test gives it another implementation.
 */
export class MockTelescopeSession implements ITelescopeSession {
  connectionState: ConnectionState = 'connected';
  host: string | null = '192.168.1.50';
  pendingCount = 0;
  stats: SessionStats = {
    framesSent: 0,
    framesReceived: 0,
    decodeErrors: 0,
    unmatchedResponses: 0,
    reconnects: 0,
  };

  private readonly eventHandlers = new Set<InboundEventHandler>();
  private readonly stateHandlers = new Set<ConnectionStateHandler>();

  readonly connect = vi.fn<(options?: ConnectOptions) => Promise<void>>(async () => {
    this.changeState('connected');
  });
  readonly disconnect = vi.fn<() => Promise<void>>(async () => {
    this.changeState('disconnected');
  });
  readonly send = vi.fn<SendFn>(async () => 0);
  readonly stopReconnecting = vi.fn<() => void>();
  readonly subscribe = vi.fn<(filter?: EventFilter) => EventSubscription>(() => endedSubscription);

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

  get listenerCount(): number {
    return this.eventHandlers.size + this.stateHandlers.size;
  }

  emitEvent(payload: JsonObject & { Event: string }): void {
    const event = toInboundEvent(
      {
        Event: payload.Event,
        state: typeof payload.state === 'string' ? payload.state : undefined,
        error: typeof payload.error === 'string' ? payload.error : undefined,
        result: payload.result,
      },
      Date.now(),
      payload
    );
    [...this.eventHandlers].forEach((handler) => handler(event));
  }

  changeState(state: ConnectionState): void {
    const previous = this.connectionState;
    if (previous === state) return;
    this.connectionState = state;
    [...this.stateHandlers].forEach((handler) => handler(state, previous));
  }

  /** Make `send` emit `event` on the next microtask after `method` is sent */
  emitAfter(method: string, event: JsonObject & { Event: string }, result: unknown = 0): void {
    this.send.mockImplementation(async (sent) => {
      if (sent === method) queueMicrotask(() => this.emitEvent(event));
      return result;
    });
  }
}

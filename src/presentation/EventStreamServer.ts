import type { Server } from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import type { ConnectionState, ITelescopeSession } from '../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { InboundEvent } from '../domain/entities/TelescopeMessage.js';

/** What the stream needs from a connected socket */
export interface StreamClient {
  readonly readyState: number;
  send(data: string): void;
}

export type StreamMessage =
  | {
      type: 'event';
      event: {
        kind: InboundEvent['kind'];
        name: string;
        state: string | null;
        result: unknown;
        error: string | null;
        payload: InboundEvent['payload'];
        receivedAt: string;
      };
    }
  | { type: 'state'; state: ConnectionState; previous: ConnectionState | null; at: string };

export function eventMessage(event: InboundEvent): StreamMessage {
  return {
    type: 'event',
    event: {
      kind: event.kind,
      name: event.name,
      state: event.state,
      result: event.result,
      error: event.error,
      payload: event.payload,
      receivedAt: new Date(event.receivedAt).toISOString(),
    },
  };
}

/**
 * Pushes telescope events and connection state changes to WebSocket
 * clients. New clients first get the current connection state.
 */
export class EventStreamServer {
  private readonly clients = new Set<StreamClient>();
  private wss: WebSocketServer | null = null;

  constructor(
    private readonly session: ITelescopeSession,
    private readonly logger: ILogger,
    private readonly path = '/events',
    private readonly now: () => Date = () => new Date()
  ) {}

  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * Accept WebSocket upgrades on `path` of an HTTP server and start relaying
   */
  attach(server: Server): void {
    const wss = new WebSocketServer({ server, path: this.path });
    wss.on('connection', (socket: WebSocket) => {
      this.addClient(socket);
      socket.on('close', () => this.removeClient(socket));
      socket.on('error', (error) => {
        this.logger.warn('Event stream client error', { error: error.message });
      });
    });
    wss.on('error', (error) => {
      this.logger.error('Event stream server error', error);
    });
    this.wss = wss;
    this.start();
    this.logger.info('Event stream listening', { path: this.path });
  }

  start(): void {
    this.session.onEvent(this.handleEvent);
    this.session.onConnectionStateChange(this.handleState);
  }

  stop(): Promise<void> {
    this.session.offEvent(this.handleEvent);
    this.session.offConnectionStateChange(this.handleState);
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (!wss) return Promise.resolve();

    for (const socket of wss.clients) {
      socket.close(1001, 'Server shutting down');
    }
    return new Promise((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  addClient(client: StreamClient): void {
    this.clients.add(client);
    this.logger.debug('Event stream client connected', { clients: this.clients.size });
    this.sendTo(client, {
      type: 'state',
      state: this.session.connectionState,
      previous: null,
      at: this.now().toISOString(),
    });
  }

  removeClient(client: StreamClient): void {
    this.clients.delete(client);
    this.logger.debug('Event stream client disconnected', { clients: this.clients.size });
  }

  broadcast(message: StreamMessage): void {
    for (const client of this.clients) {
      this.sendTo(client, message);
    }
  }

  private readonly handleEvent = (event: InboundEvent): void => {
    this.broadcast(eventMessage(event));
  };

  private readonly handleState = (state: ConnectionState, previous: ConnectionState): void => {
    this.broadcast({ type: 'state', state, previous, at: this.now().toISOString() });
  };

  private sendTo(client: StreamClient, message: StreamMessage): void {
    if (client.readyState !== WebSocket.OPEN) return;
    try {
      client.send(JSON.stringify(message));
    } catch (error) {
      this.logger.warn('Failed to push to event stream client', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

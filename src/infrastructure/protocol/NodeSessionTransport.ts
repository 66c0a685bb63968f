import * as dgram from 'node:dgram';
import * as net from 'node:net';
import type { ISessionTransport, StreamConnection } from '../../domain/ports/ISessionTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import {
  ConnectionLostError,
  ConnectionRefusedError,
  HandshakeTimeoutError,
} from '../../domain/errors/TelescopeErrors.js';

/** Introduction datagram the telescope expects before accepting control */
export const HANDSHAKE_MESSAGE = JSON.stringify({ id: 1, method: 'scan_iscope', params: '' });

const KEEPALIVE_DELAY_MS = 30000;

class SocketStreamConnection implements StreamConnection {
  private closeHandlers: Array<(reason: string) => void> = [];
  private closed = false;
  private closeReason = 'socket closed';

  constructor(
    private readonly socket: net.Socket,
    private readonly logger: ILogger
  ) {
    socket.on('error', (error) => {
      this.closeReason = error.message;
      this.logger.warn('Control socket error', { error: error.message });
    });
    socket.on('close', () => this.markClosed(this.closeReason));
  }

  write(data: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConnectionLostError('write on closed socket'));
    }
    return new Promise((resolve, reject) => {
      this.socket.write(data, 'utf-8', (error) => {
        if (error) {
          reject(new ConnectionLostError(`write failed: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closeReason = 'closed locally';
    this.socket.destroy();
  }

  onData(handler: (chunk: Buffer | string) => void): void {
    this.socket.on('data', handler);
  }

  onClose(handler: (reason: string) => void): void {
    this.closeHandlers.push(handler);
  }

  private markClosed(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.closeHandlers.forEach((handler) => handler(reason));
  }
}

/**
 * Real network transport: UDP introduction on the handshake port, then a TCP
 * socket with keepalive on the control port.
 */
export class NodeSessionTransport implements ISessionTransport {
  constructor(private readonly logger: ILogger) {}

  handshake(host: string, port: number, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');
      let settled = false;

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.close();
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        finish(new HandshakeTimeoutError(host, port, timeoutMs));
      }, timeoutMs);

      socket.on('message', (message, remote) => {
        this.logger.debug('UDP handshake reply', {
          from: `${remote.address}:${remote.port}`,
          bytes: message.length,
        });
        finish();
      });

      socket.on('error', (error) => {
        this.logger.warn('UDP handshake socket error', { error: error.message });
        finish(new HandshakeTimeoutError(host, port, timeoutMs));
      });

      this.logger.debug('Sending UDP handshake', { host, port });
      socket.send(HANDSHAKE_MESSAGE, port, host, (error) => {
        if (error) {
          this.logger.warn('UDP handshake send failed', { error: error.message });
          finish(new HandshakeTimeoutError(host, port, timeoutMs));
        }
      });
    });
  }

  openStream(host: string, port: number, timeoutMs: number): Promise<StreamConnection> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionRefusedError(host, port, `timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      const onError = (error: Error): void => {
        clearTimeout(timer);
        socket.destroy();
        reject(new ConnectionRefusedError(host, port, error.message));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        socket.setKeepAlive(true, KEEPALIVE_DELAY_MS);
        socket.setNoDelay(true);
        this.logger.info('Control channel open', { host, port });
        resolve(new SocketStreamConnection(socket, this.logger));
      });

      socket.connect(port, host);
    });
  }
}

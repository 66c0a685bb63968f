import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SessionManager } from './SessionManager.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { InboundEvent } from '../domain/entities/TelescopeMessage.js';
import type { ConnectionState } from '../domain/ports/ITelescopeSession.js';
import { createMockLogger } from '../test-support/FakeTelescope.js';
import { MockTelescopeSession } from '../test-support/MockTelescopeSession.js';

describe('SessionManager', () => {
  let logger: ILogger;
  let sessions: MockTelescopeSession[];
  let manager: SessionManager;

  beforeEach(() => {
    logger = createMockLogger();
    sessions = [];
    manager = new SessionManager(() => {
      const session = new MockTelescopeSession();
      session.connectionState = 'disconnected';
      sessions.push(session);
      return session;
    }, logger);
  });

  it('should connect the current session with the given options', async () => {
    await manager.connect({ host: '10.0.0.7' });

    expect(sessions).toHaveLength(1);
    expect(sessions[0]?.connect).toHaveBeenCalledWith({ host: '10.0.0.7' });
    expect(manager.connectionState).toBe('connected');
    expect(manager.host).toBe('10.0.0.7');
  });

  it('should build a fresh session when connecting after a disconnect', async () => {
    await manager.connect({ host: '10.0.0.7', tcpPort: 4701 });
    await manager.disconnect();
    await manager.connect();

    expect(sessions).toHaveLength(2);
    expect(sessions[1]?.connect).toHaveBeenCalledWith({ host: '10.0.0.7', tcpPort: 4701 });
    expect(sessions[0]?.listenerCount).toBe(0);
  });

  it('should keep listeners attached across session swaps', async () => {
    const events: string[] = [];
    const states: ConnectionState[] = [];
    manager.onEvent((event: InboundEvent) => events.push(event.name));
    manager.onConnectionStateChange((state) => states.push(state));

    await manager.connect();
    sessions[0]?.emitEvent({ Event: 'AutoGoto', state: 'start' });
    await manager.disconnect();
    await manager.connect();
    sessions[1]?.emitEvent({ Event: 'Stack', state: 'start' });

    expect(events).toEqual(['AutoGoto', 'Stack']);
    expect(states).toEqual(['connected', 'disconnected', 'connected']);
  });

  it('should run resync callbacks after an automatic reconnection only', async () => {
    const resync = vi.fn();
    manager.onReconnected(resync);
    await manager.connect();

    sessions[0]?.changeState('reconnecting');
    sessions[0]?.changeState('connected');
    await vi.waitFor(() => expect(resync).toHaveBeenCalledTimes(1));

    await manager.disconnect();
    await manager.connect();
    expect(resync).toHaveBeenCalledTimes(1);
  });

  it('should keep going when a resync callback fails', async () => {
    const second = vi.fn();
    manager.onReconnected(() => Promise.reject(new Error('status read failed')));
    manager.onReconnected(second);
    await manager.connect();

    sessions[0]?.changeState('reconnecting');
    sessions[0]?.changeState('connected');

    await vi.waitFor(() => expect(second).toHaveBeenCalledTimes(1));
    expect(logger.warn).toHaveBeenCalledWith('Resync after reconnect failed', {
      error: 'status read failed',
    });
  });

  it('should isolate a throwing listener', async () => {
    const healthy = vi.fn();
    manager.onEvent(() => {
      throw new Error('listener bug');
    });
    manager.onEvent(healthy);
    await manager.connect();

    sessions[0]?.emitEvent({ Event: 'PiStatus' });

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Event listener failed', expect.any(Error), {
      event: 'PiStatus',
    });
  });

  it('should delegate send and stopReconnecting to the live session', async () => {
    await manager.connect();
    sessions[0]?.send.mockResolvedValue({ ra: 1, dec: 2 });

    await expect(manager.send('scope_get_equ_coord')).resolves.toEqual({ ra: 1, dec: 2 });
    manager.stopReconnecting();

    expect(sessions[0]?.send).toHaveBeenCalledWith('scope_get_equ_coord', undefined, undefined);
    expect(sessions[0]?.stopReconnecting).toHaveBeenCalledTimes(1);
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { HttpServer, type ApiRequest } from './HttpServer.js';
import { TelescopeController } from './TelescopeController.js';
import { LocationManager } from '../application/LocationManager.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { RemoteError } from '../domain/errors/TelescopeErrors.js';
import { createMockLogger } from '../test-support/FakeTelescope.js';
import { MockTelescopeSession } from '../test-support/MockTelescopeSession.js';
import { OCTOBER_EVENING, createTestResolver } from '../test-support/fixtures.js';

function request(method: string, target: string, body?: unknown): ApiRequest {
  const url = new URL(target, 'http://localhost');
  return { method, path: url.pathname, query: url.searchParams, body };
}

describe('HttpServer routes', () => {
  let logger: ILogger;
  let session: MockTelescopeSession;
  let server: HttpServer;

  beforeEach(() => {
    logger = createMockLogger();
    session = new MockTelescopeSession();
    const controller = new TelescopeController(
      session,
      createTestResolver(logger),
      new LocationManager(logger, () => OCTOBER_EVENING),
      logger,
      { version: '1.0.0', now: () => OCTOBER_EVENING }
    );
    controller.start();
    server = new HttpServer(controller, logger, { port: 0 });
  });

  describe('GET /health', () => {
    it('should be healthy while the telescope is connected', async () => {
      const response = await server.route(request('GET', '/health'));

      expect(response).toEqual({
        status: 200,
        body: {
          status: 'healthy',
          timestamp: expect.any(String),
          connection: 'connected',
          uptime: 0,
        },
      });
    });

    it('should answer 503 without a connection', async () => {
      session.connectionState = 'disconnected';

      const response = await server.route(request('GET', '/health'));

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ status: 'unhealthy', connection: 'disconnected' });
    });
  });

  describe('POST /api/goto', () => {
    it('should slew and record the command', async () => {
      session.emitAfter('iscope_start_view', { Event: 'AutoGoto', state: 'complete' });

      const response = await server.route(request('POST', '/api/goto', { name: 'M31' }));
      const system = await server.route(request('GET', '/api/system'));

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        completed: true,
        message: 'Slewed to M31 (Andromeda Galaxy)',
      });
      expect(system.body).toMatchObject({
        lastCommand: { name: 'goto_target', at: '2024-10-15T04:00:00.000Z' },
      });
    });

    it('should answer 403 for the Sun without acknowledgement', async () => {
      const response = await server.route(request('POST', '/api/goto', { name: 'Sun' }));

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        success: false,
        error: {
          kind: 'SolarSafety',
          message: "Pointing at 'Sun' requires explicit acknowledgement that a solar filter is installed",
          context: { targetName: 'Sun' },
        },
      });
    });

    it('should answer 400 when the name is missing', async () => {
      const response = await server.route(request('POST', '/api/goto', {}));

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: { kind: 'InvalidInput', message: 'name is required' } });
    });

    it('should answer 502 with the remote code when the telescope rejects the goto', async () => {
      session.send.mockRejectedValue(new RemoteError(207, 'fail to operate', 'iscope_start_view', 1001));

      const response = await server.route(request('POST', '/api/goto', { name: 'M31' }));

      expect(response.status).toBe(502);
      expect(response.body).toMatchObject({
        error: { kind: 'RemoteError', context: { code: 207, method: 'iscope_start_view' } },
      });
    });
  });

  it('should reject a non-numeric coordinate', async () => {
    const response = await server.route(
      request('POST', '/api/goto/coordinates', { rightAscensionHours: '5', declinationDegrees: 10 })
    );

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ error: { message: 'rightAscensionHours must be a number' } });
  });

  it('should reject a body that is not an object', async () => {
    const response = await server.route(request('POST', '/api/connect', ['192.168.1.50']));

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ error: { message: 'Request body must be a JSON object' } });
  });

  it('should require the name query parameter for searches', async () => {
    const response = await server.route(request('GET', '/api/targets/search'));

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ error: { message: 'Query parameter name is required' } });
  });

  it('should answer 409 for visibility before a location is set', async () => {
    const response = await server.route(request('GET', '/api/targets/visibility?name=M31'));

    expect(response.status).toBe(409);
    expect(response.body).toMatchObject({ error: { kind: 'LocationNotConfigured' } });
  });

  it('should store the location and report it back with local time', async () => {
    const before = await server.route(request('GET', '/api/location'));
    await server.route(
      request('PUT', '/api/location', {
        latitude: 34.0522,
        longitude: -118.2437,
        timezoneId: 'America/Los_Angeles',
      })
    );
    const after = await server.route(request('GET', '/api/location'));

    expect(before.body).toEqual({ configured: false, location: null });
    expect(after.body).toEqual({
      configured: true,
      location: {
        latitude: 34.0522,
        longitude: -118.2437,
        elevationMeters: 0,
        timezoneId: 'America/Los_Angeles',
        localTime: {
          utc: '2024-10-15T04:00:00.000Z',
          local: '2024-10-14T21:00:00-07:00',
          timezoneId: 'America/Los_Angeles',
          utcOffsetMinutes: -420,
        },
      },
    });
  });

  it('should park in equatorial mode when asked', async () => {
    const response = await server.route(request('POST', '/api/mount/park', { equatorialMode: true }));

    expect(response.status).toBe(200);
    expect(session.send).toHaveBeenCalledWith('scope_park', { equ_mode: true });
  });

  describe('POST /api/reconnect/stop', () => {
    it('should stop an automatic reconnection loop', async () => {
      session.connectionState = 'reconnecting';

      const response = await server.route(request('POST', '/api/reconnect/stop'));

      expect(response).toEqual({
        status: 200,
        body: { success: true, message: 'Stopped reconnecting to the telescope' },
      });
      expect(session.stopReconnecting).toHaveBeenCalledTimes(1);
    });

    it('should leave a connected session alone', async () => {
      const response = await server.route(request('POST', '/api/reconnect/stop'));

      expect(response.body).toEqual({ success: false, message: 'Not reconnecting (state: connected)' });
      expect(session.stopReconnecting).not.toHaveBeenCalled();
    });
  });

  it('should report calibration as not implemented', async () => {
    const response = await server.route(request('POST', '/api/calibration'));

    expect(response.status).toBe(501);
    expect(response.body).toMatchObject({ error: { kind: 'Unsupported' } });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await server.route(request('GET', '/api/unknown'));

    expect(response).toEqual({ status: 404, body: { error: 'Not Found', path: '/api/unknown' } });
  });
});

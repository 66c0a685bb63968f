import { describe, it, expect, beforeEach } from 'vitest';
import { GetTelescopeStatus, parseEquatorialPosition } from './GetTelescopeStatus.js';
import { LocationManager } from '../LocationManager.js';
import { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RequestTimeoutError } from '../../domain/errors/TelescopeErrors.js';
import { createMockLogger } from '../../test-support/FakeTelescope.js';
import { MockTelescopeSession } from '../../test-support/MockTelescopeSession.js';
import { LOS_ANGELES, OCTOBER_EVENING } from '../../test-support/fixtures.js';

describe('GetTelescopeStatus', () => {
  let logger: ILogger;
  let session: MockTelescopeSession;
  let locationManager: LocationManager;
  let tracker: TelescopeStateTracker;
  let useCase: GetTelescopeStatus;

  beforeEach(() => {
    logger = createMockLogger();
    session = new MockTelescopeSession();
    locationManager = new LocationManager(logger, () => OCTOBER_EVENING);
    tracker = new TelescopeStateTracker(session, logger);
    tracker.start();
    useCase = new GetTelescopeStatus(session, tracker, locationManager, logger, () => OCTOBER_EVENING);
  });

  it('should read the pointing position and derived operation', async () => {
    session.send.mockResolvedValue({ ra: 12.863333, dec: -30.129167 });
    session.emitEvent({ Event: 'AutoGoto', state: 'working' });

    const status = await useCase.execute();

    expect(session.send).toHaveBeenCalledWith('scope_get_equ_coord');
    expect(status).toEqual({
      connection: 'connected',
      operation: 'slewing',
      rightAscensionHours: 12.863333,
      declinationDegrees: -30.129167,
      horizontal: null,
      currentTarget: null,
      lastEvent: expect.objectContaining({ name: 'AutoGoto', state: 'working' }),
      lastError: null,
      updatedAt: '2024-10-15T04:00:00.000Z',
    });
  });

  it('should add alt/az once the location is known', async () => {
    locationManager.configure(LOS_ANGELES);
    session.send.mockResolvedValue({ ra: 0.7348, dec: 41.4049 });

    const status = await useCase.execute();

    expect(status.horizontal?.altitudeDegrees).toBeCloseTo(54.01, 1);
    expect(status.horizontal?.azimuthDegrees).toBeCloseTo(64.67, 1);
  });

  it('should not query a disconnected telescope', async () => {
    session.connectionState = 'disconnected';

    const status = await useCase.execute();

    expect(session.send).not.toHaveBeenCalled();
    expect(status).toMatchObject({ connection: 'disconnected', rightAscensionHours: null });
  });

  it('should surface a command timeout', async () => {
    session.send.mockRejectedValue(new RequestTimeoutError('scope_get_equ_coord', 1001, 30000));

    await expect(useCase.execute()).rejects.toBeInstanceOf(RequestTimeoutError);
  });

  it('should ignore a malformed position', () => {
    expect(parseEquatorialPosition({ ra: '1', dec: 2 })).toBeNull();
    expect(parseEquatorialPosition([1, 2])).toBeNull();
    expect(parseEquatorialPosition({ ra: 1, dec: 2, extra: true })).toEqual({ ra: 1, dec: 2 });
  });
});

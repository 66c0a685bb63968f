import { describe, it, expect, beforeEach } from 'vitest';
import { GotoTarget } from './GotoTarget.js';
import { GotoCoordinates } from './GotoCoordinates.js';
import { LocationManager } from '../LocationManager.js';
import { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { SOLAR_SAFETY_WARNING } from '../../domain/entities/Target.js';
import {
  BelowHorizonError,
  NotConnectedError,
  SolarSafetyError,
  TargetNotFoundError,
} from '../../domain/errors/TelescopeErrors.js';
import { createMockLogger } from '../../test-support/FakeTelescope.js';
import { MockTelescopeSession } from '../../test-support/MockTelescopeSession.js';
import {
  LOS_ANGELES,
  OCTOBER_EVENING,
  OCTOBER_MORNING,
  createTestResolver,
} from '../../test-support/fixtures.js';

describe('GotoTarget', () => {
  let logger: ILogger;
  let session: MockTelescopeSession;
  let clock: Date;
  let locationManager: LocationManager;
  let tracker: TelescopeStateTracker;
  let useCase: GotoTarget;

  beforeEach(() => {
    logger = createMockLogger();
    session = new MockTelescopeSession();
    clock = OCTOBER_EVENING;
    locationManager = new LocationManager(logger, () => clock);
    tracker = new TelescopeStateTracker(session, logger);
    const gotoCoordinates = new GotoCoordinates(session, locationManager, tracker, logger);
    useCase = new GotoTarget(session, createTestResolver(logger), locationManager, gotoCoordinates, tracker, logger);
  });

  it('should resolve the name and slew to it', async () => {
    locationManager.configure(LOS_ANGELES);
    session.emitAfter('iscope_start_view', { Event: 'AutoGoto', state: 'complete' });

    const result = await useCase.execute({ name: 'M31' });

    expect(result.target.name).toBe('M31 (Andromeda Galaxy)');
    expect(result.completed).toBe(true);
    expect(session.send).toHaveBeenCalledWith(
      'iscope_start_view',
      expect.objectContaining({ mode: 'star', target_name: 'M31 (Andromeda Galaxy)' })
    );
  });

  it('should raise TargetNotFound without contacting the telescope', async () => {
    await expect(useCase.execute({ name: 'Nowhere Nebula' })).rejects.toBeInstanceOf(TargetNotFoundError);
    expect(session.send).not.toHaveBeenCalled();
  });

  it('should check the connection before resolving', async () => {
    session.connectionState = 'disconnected';

    await expect(useCase.execute({ name: 'M31' })).rejects.toBeInstanceOf(NotConnectedError);
  });

  describe('the Sun', () => {
    it('should refuse without acknowledgement', async () => {
      const error = await useCase.execute({ name: 'Sun' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SolarSafetyError);
      expect(error).toMatchObject({ context: { targetName: 'Sun' } });
      expect(session.send).not.toHaveBeenCalled();
    });

    it('should use solar mode once acknowledged', async () => {
      locationManager.configure(LOS_ANGELES);
      clock = OCTOBER_MORNING;

      const result = await useCase.execute({ name: 'sun', acknowledgeSolarRisk: true });

      expect(session.send.mock.calls.map(([method, params]) => [method, params])).toEqual([
        ['iscope_start_view', { mode: 'sun' }],
        ['start_scan_planet', undefined],
        ['clear_app_state', { name: 'ScanSun' }],
      ]);
      expect(result).toMatchObject({
        success: true,
        message: 'Solar observation mode started for Sun',
        warning: SOLAR_SAFETY_WARNING,
      });
      expect(tracker.snapshot()).toMatchObject({ operation: 'solar', currentTarget: 'Sun' });
    });

    it('should still refuse a Sun below the horizon', async () => {
      locationManager.configure(LOS_ANGELES);

      await expect(useCase.execute({ name: 'Sun', acknowledgeSolarRisk: true })).rejects.toBeInstanceOf(
        BelowHorizonError
      );
      expect(session.send).not.toHaveBeenCalled();
    });
  });
});

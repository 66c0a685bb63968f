import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GotoCoordinates } from './GotoCoordinates.js';
import { LocationManager } from '../LocationManager.js';
import { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import {
  BelowHorizonError,
  ConnectionLostError,
  InvalidInputError,
  NotConnectedError,
  OperationFailedError,
  RemoteError,
} from '../../domain/errors/TelescopeErrors.js';
import { createMockLogger } from '../../test-support/FakeTelescope.js';
import { MockTelescopeSession } from '../../test-support/MockTelescopeSession.js';
import { LOS_ANGELES, M31, OCTOBER_EVENING, OCTOBER_MORNING } from '../../test-support/fixtures.js';

describe('GotoCoordinates', () => {
  let logger: ILogger;
  let session: MockTelescopeSession;
  let clock: Date;
  let locationManager: LocationManager;
  let tracker: TelescopeStateTracker;
  let useCase: GotoCoordinates;

  const m31Input = {
    rightAscensionHours: M31.rightAscensionHours,
    declinationDegrees: M31.declinationDegrees,
    targetName: 'M31',
  };

  beforeEach(() => {
    logger = createMockLogger();
    session = new MockTelescopeSession();
    clock = OCTOBER_EVENING;
    locationManager = new LocationManager(logger, () => clock);
    tracker = new TelescopeStateTracker(session, logger);
    tracker.start();
    useCase = new GotoCoordinates(session, locationManager, tracker, logger, 120000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should start the view with RA in degrees and wait for AutoGoto complete', async () => {
    locationManager.configure(LOS_ANGELES);
    session.emitAfter('iscope_start_view', { Event: 'AutoGoto', state: 'complete' });

    const result = await useCase.execute(m31Input);

    expect(session.send).toHaveBeenCalledWith('iscope_start_view', {
      mode: 'star',
      target_ra_dec: [10.68459, 41.269167],
      target_name: 'M31',
      lp_filter: false,
      auto_center: true,
    });
    expect(result).toMatchObject({ success: true, completed: true, message: 'Slewed to M31' });
    expect(result.visibility?.isVisible).toBe(true);
    expect(tracker.snapshot()).toMatchObject({ operation: 'idle', currentTarget: 'M31' });
  });

  it('should refuse targets below the horizon without sending anything', async () => {
    locationManager.configure(LOS_ANGELES);
    clock = OCTOBER_MORNING;

    const error = await useCase.execute(m31Input).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BelowHorizonError);
    expect(error).toMatchObject({ context: { targetName: 'M31', minimumAltitudeDegrees: 10 } });
    expect(session.send).not.toHaveBeenCalled();
  });

  it('should skip the visibility check with a warning when no location is set', async () => {
    session.emitAfter('iscope_start_view', { Event: 'AutoGoto', state: 'complete' });

    const result = await useCase.execute(m31Input);

    expect(result.visibility).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('Observer location not configured, skipping visibility check', {
      target: 'M31',
    });
  });

  it('should add the mosaic layout and name suffix', async () => {
    session.emitAfter('iscope_start_view', { Event: 'AutoGoto', state: 'complete' });

    const result = await useCase.execute({ ...m31Input, mosaic: { width: 2, height: 1 } });

    expect(session.send).toHaveBeenCalledWith(
      'iscope_start_view',
      expect.objectContaining({
        target_name: 'M31 (Mosaic 2x1)',
        mosaic: { enable: true, width: 2, height: 1 },
      })
    );
    expect(result.targetName).toBe('M31 (Mosaic 2x1)');
  });

  it('should name unnamed coordinates after their position', async () => {
    session.emitAfter('iscope_start_view', { Event: 'AutoGoto', state: 'complete' });

    const result = await useCase.execute({ rightAscensionHours: 5.5, declinationDegrees: -5.25 });

    expect(result.targetName).toBe('Target at 5.500h, -5.250°');
  });

  it('should surface an AutoGoto failure without retrying', async () => {
    session.emitAfter('iscope_start_view', { Event: 'AutoGoto', state: 'fail', error: 'mount goto failed' });

    const error = await useCase.execute(m31Input).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OperationFailedError);
    expect(error).toMatchObject({ message: "Goto to 'M31' failed: mount goto failed" });
    expect(session.send).toHaveBeenCalledTimes(1);
    expect(tracker.snapshot().operation).toBe('error');
  });

  it('should propagate a rejected command and stop waiting', async () => {
    session.send.mockRejectedValue(new RemoteError(207, 'fail to operate', 'iscope_start_view', 1001));

    await expect(useCase.execute(m31Input)).rejects.toBeInstanceOf(RemoteError);
    expect(session.listenerCount).toBe(2);
  });

  it('should report an unfinished goto after the timeout', async () => {
    vi.useFakeTimers();

    const pending = useCase.execute(m31Input);
    await vi.advanceTimersByTimeAsync(120000);
    const result = await pending;

    expect(result).toMatchObject({
      success: true,
      completed: false,
      message: 'Goto to M31 still in progress after 120s',
    });
  });

  it('should fail with ConnectionLost when the channel drops mid-goto', async () => {
    session.send.mockImplementation(async () => {
      queueMicrotask(() => session.changeState('reconnecting'));
      return 0;
    });

    await expect(useCase.execute(m31Input)).rejects.toBeInstanceOf(ConnectionLostError);
  });

  it('should require a connection', async () => {
    session.connectionState = 'reconnecting';

    await expect(useCase.execute(m31Input)).rejects.toBeInstanceOf(NotConnectedError);
  });

  it.each([
    [{ rightAscensionHours: 24, declinationDegrees: 0 }, 'rightAscensionHours must be at least 0 and less than 24'],
    [{ rightAscensionHours: 1, declinationDegrees: -90.5 }, 'declinationDegrees must be at least -90 and at most 90'],
    [
      { rightAscensionHours: 1, declinationDegrees: 0, mosaic: { width: 3, height: 1 } },
      'mosaic.width must be an integer at least 1 and at most 2',
    ],
  ])('should reject invalid input %o', async (input, message) => {
    const error = await useCase.execute(input).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ message });
  });
});

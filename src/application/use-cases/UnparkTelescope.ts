import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import type { MountOutput } from './ParkTelescope.js';
import { assertConnected } from './guards.js';

export const SENSOR_KEYS = ['balance_sensor', 'compass_sensor'] as const;

/**
 * Use case for raising the arm to the horizon, then reading the level and
 * compass sensors so the caller can check the result.
 */
export class UnparkTelescope {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger
  ) {}

  async execute(): Promise<MountOutput> {
    assertConnected(this.session, 'unpark');
    this.logger.info('Moving telescope arm to the horizon');
    await this.session.send('scope_move_to_horizon');
    this.tracker.markOperation('idle');

    const sensors = await this.session.send('get_device_state', { keys: [...SENSOR_KEYS] });
    return {
      success: true,
      message: 'Telescope arm opened to the horizon',
      data: { sensors },
    };
  }
}

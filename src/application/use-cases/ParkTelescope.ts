import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import { assertConnected } from './guards.js';

export interface MountOutput {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Use case for folding the arm away. `equatorialMode` parks for an
 * equatorial wedge instead of alt-az.
 */
export class ParkTelescope {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger
  ) {}

  async execute(equatorialMode = false): Promise<MountOutput> {
    assertConnected(this.session, 'park');
    this.logger.info('Parking telescope', { equatorialMode });
    await this.session.send('scope_park', { equ_mode: equatorialMode });
    this.tracker.markOperation('parked', null);
    return {
      success: true,
      message: `Telescope parked (${equatorialMode ? 'equatorial' : 'alt-az'} mode)`,
      data: { equatorialMode },
    };
  }
}

import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import type { MountOutput } from './ParkTelescope.js';
import { assertConnected } from './guards.js';

/**
 * Use case for stopping every stage at once: slew, stacking, solar scan.
 */
export class EmergencyStop {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger
  ) {}

  async execute(): Promise<MountOutput> {
    assertConnected(this.session, 'emergency_stop');
    this.logger.warn('Emergency stop requested');
    await this.session.send('iscope_stop_view', { stage: 'All' });
    this.tracker.markImagingStopped();
    this.tracker.markOperation('idle');
    return { success: true, message: 'All telescope operations stopped' };
  }
}

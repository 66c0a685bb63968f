import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import type { ImagingOutput } from './StartImaging.js';
import { assertConnected } from './guards.js';

/**
 * Use case for stopping the stacking stage only; the mount keeps tracking.
 */
export class StopImaging {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger
  ) {}

  async execute(): Promise<ImagingOutput> {
    assertConnected(this.session, 'stop_imaging');
    this.logger.info('Stopping imaging');
    await this.session.send('iscope_stop_view', { stage: 'Stack' });
    this.tracker.markImagingStopped();
    return { success: true, message: 'Imaging stopped', imaging: this.tracker.imagingState() };
  }
}

import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { ImagingParams, ImagingState } from '../../domain/entities/TelescopeState.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import { validateMosaic } from './GotoCoordinates.js';
import { assertConnected, assertInRange } from './guards.js';

export interface ImagingOutput {
  success: boolean;
  message: string;
  imaging: ImagingState;
}

export function validateImagingParams(params: ImagingParams): void {
  assertInRange('exposureTime', params.exposureTime, { min: 0, exclusiveMin: true });
  assertInRange('count', params.count, { min: 1, integer: true });
  if (params.gain !== undefined) assertInRange('gain', params.gain, { min: 0, max: 300, integer: true });
  if (params.binning !== undefined) assertInRange('binning', params.binning, { min: 1, max: 4, integer: true });
  if (params.mosaic) validateMosaic(params.mosaic);
}

/**
 * Use case for starting live stacking on whatever the telescope is
 * pointed at. Exposure, count, gain and binning are checked here; the
 * telescope applies its own stacking settings.
 */
export class StartImaging {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger
  ) {}

  async execute(params: ImagingParams): Promise<ImagingOutput> {
    validateImagingParams(params);
    assertConnected(this.session, 'start_imaging');

    const stackParams: Record<string, unknown> = { restart: true };
    if (params.mosaic) {
      stackParams.mosaic = { enable: true, width: params.mosaic.width, height: params.mosaic.height };
    }

    this.logger.info('Starting imaging', {
      exposureTime: params.exposureTime,
      count: params.count,
      gain: params.gain,
      binning: params.binning,
      mosaic: params.mosaic,
    });
    await this.session.send('iscope_start_stack', stackParams);
    this.tracker.markImagingStarted(this.tracker.snapshot().currentTarget);

    const kind = params.mosaic ? `mosaic ${params.mosaic.width}x${params.mosaic.height} imaging` : 'imaging';
    return {
      success: true,
      message: `Started ${kind}: ${params.count} x ${params.exposureTime}s`,
      imaging: this.tracker.imagingState(),
    };
  }
}

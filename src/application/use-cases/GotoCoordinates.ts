import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { CoordinateEpoch } from '../../domain/entities/Target.js';
import type { MosaicParams } from '../../domain/entities/TelescopeState.js';
import type { VisibilityResult } from '../../domain/entities/ObserverLocation.js';
import { BelowHorizonError, OperationFailedError } from '../../domain/errors/TelescopeErrors.js';
import type { LocationManager } from '../LocationManager.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import { waitForEvent } from '../waitForEvent.js';
import { assertConnected, assertInRange } from './guards.js';

export interface GotoCoordinatesInput {
  rightAscensionHours: number;
  declinationDegrees: number;
  epoch?: CoordinateEpoch;
  targetName?: string;
  mosaic?: MosaicParams;
  skipVisibilityCheck?: boolean;
}

export interface GotoOutput {
  success: boolean;
  /** false when no AutoGoto outcome arrived within the goto timeout */
  completed: boolean;
  message: string;
  targetName: string;
  visibility: VisibilityResult | null;
  warning?: string;
}

export function validateMosaic(mosaic: MosaicParams): void {
  assertInRange('mosaic.width', mosaic.width, { min: 1, max: 2, integer: true });
  assertInRange('mosaic.height', mosaic.height, { min: 1, max: 2, integer: true });
}

const round6 = (value: number): number => Math.round(value * 1e6) / 1e6;

/**
 * Use case for slewing to explicit coordinates. The telescope plate-solves
 * and centers on its own and reports the outcome as an AutoGoto event.
 * A failed goto is reported, never retried.
 */
export class GotoCoordinates {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly locationManager: LocationManager,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger,
    private readonly gotoTimeoutMs = 120000
  ) {}

  async execute(input: GotoCoordinatesInput): Promise<GotoOutput> {
    const ra = input.rightAscensionHours;
    const dec = input.declinationDegrees;
    assertInRange('rightAscensionHours', ra, { min: 0, max: 24, exclusiveMax: true });
    assertInRange('declinationDegrees', dec, { min: -90, max: 90 });
    if (input.mosaic) validateMosaic(input.mosaic);
    assertConnected(this.session, 'goto');

    let displayName =
      input.targetName?.trim() || `Target at ${ra.toFixed(3)}h, ${dec >= 0 ? '+' : ''}${dec.toFixed(3)}°`;

    const visibility = this.checkVisibility(input, displayName);

    const params: Record<string, unknown> = {
      mode: 'star',
      target_ra_dec: [round6(ra * 15), round6(dec)],
      target_name: displayName,
      lp_filter: false,
      auto_center: true,
    };
    if (input.mosaic) {
      const { width, height } = input.mosaic;
      displayName = `${displayName} (Mosaic ${width}x${height})`;
      params.target_name = displayName;
      params.mosaic = { enable: true, width, height };
    }

    this.logger.info('Slewing to target', {
      target: displayName,
      rightAscensionHours: ra,
      declinationDegrees: dec,
    });

    const outcome = waitForEvent(
      this.session,
      (event) => event.kind === 'AutoGoto' && (event.state === 'complete' || event.state === 'fail'),
      this.gotoTimeoutMs
    );
    this.tracker.markOperation('slewing', displayName);

    try {
      await this.session.send('iscope_start_view', params);
    } catch (error) {
      outcome.cancel();
      this.tracker.markOperation('error');
      throw error;
    }

    const event = await outcome.promise;
    if (!event) {
      this.logger.warn('No goto outcome within timeout', {
        target: displayName,
        timeoutMs: this.gotoTimeoutMs,
      });
      return {
        success: true,
        completed: false,
        message: `Goto to ${displayName} still in progress after ${Math.round(this.gotoTimeoutMs / 1000)}s`,
        targetName: displayName,
        visibility,
      };
    }

    if (event.state === 'fail') {
      const reason = event.error ?? 'unknown error';
      throw new OperationFailedError(`Goto to '${displayName}'`, reason, {
        targetName: displayName,
        belowHorizon: reason === 'below horizon',
      });
    }

    this.logger.info('Goto completed', { target: displayName });
    return {
      success: true,
      completed: true,
      message: `Slewed to ${displayName}`,
      targetName: displayName,
      visibility,
    };
  }

  private checkVisibility(input: GotoCoordinatesInput, displayName: string): VisibilityResult | null {
    if (input.skipVisibilityCheck) {
      this.logger.warn('Visibility check skipped on request', { target: displayName });
      return null;
    }
    if (!this.locationManager.isConfigured) {
      this.logger.warn('Observer location not configured, skipping visibility check', {
        target: displayName,
      });
      return null;
    }

    const visibility = this.locationManager.checkVisible({
      rightAscensionHours: input.rightAscensionHours,
      declinationDegrees: input.declinationDegrees,
      epoch: input.epoch ?? 'J2000',
    });
    if (!visibility.isVisible) {
      throw new BelowHorizonError(
        displayName,
        visibility.altitudeDegrees,
        visibility.minimumAltitudeDegrees
      );
    }
    return visibility;
  }
}

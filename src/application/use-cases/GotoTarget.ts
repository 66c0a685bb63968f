import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { MosaicParams } from '../../domain/entities/TelescopeState.js';
import type { VisibilityResult } from '../../domain/entities/ObserverLocation.js';
import { requiresSolarAcknowledgement, type Target } from '../../domain/entities/Target.js';
import { BelowHorizonError, SolarSafetyError } from '../../domain/errors/TelescopeErrors.js';
import type { TargetResolver } from '../TargetResolver.js';
import type { LocationManager } from '../LocationManager.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import type { GotoCoordinates, GotoOutput } from './GotoCoordinates.js';
import { assertConnected } from './guards.js';

export interface GotoTargetInput {
  name: string;
  /** Required to point at the Sun */
  acknowledgeSolarRisk?: boolean;
  skipVisibilityCheck?: boolean;
  mosaic?: MosaicParams;
}

export interface GotoTargetOutput extends GotoOutput {
  target: Target;
}

/**
 * Use case for slewing to a named object: resolve, solar gate, visibility
 * gate, then the goto itself.
 */
export class GotoTarget {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly resolver: TargetResolver,
    private readonly locationManager: LocationManager,
    private readonly gotoCoordinates: GotoCoordinates,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger
  ) {}

  async execute(input: GotoTargetInput): Promise<GotoTargetOutput> {
    this.logger.info('Executing GotoTarget use case', { name: input.name });
    assertConnected(this.session, 'goto');

    const target = await this.resolver.resolveOrThrow(input.name);

    if (requiresSolarAcknowledgement(target)) {
      if (!input.acknowledgeSolarRisk) {
        this.logger.warn('Solar goto refused without acknowledgement', { target: target.name });
        throw new SolarSafetyError(target.name);
      }
      return this.startSolarObservation(target, input.skipVisibilityCheck === true);
    }

    const result = await this.gotoCoordinates.execute({
      rightAscensionHours: target.rightAscensionHours,
      declinationDegrees: target.declinationDegrees,
      epoch: target.epoch,
      targetName: target.name,
      mosaic: input.mosaic,
      skipVisibilityCheck: input.skipVisibilityCheck,
    });
    return { ...result, target };
  }

  /**
   * The telescope has a dedicated solar mode that finds the Sun itself.
   */
  private async startSolarObservation(target: Target, skipVisibilityCheck: boolean): Promise<GotoTargetOutput> {
    let visibility: VisibilityResult | null = null;
    if (!skipVisibilityCheck && this.locationManager.isConfigured) {
      visibility = this.locationManager.checkVisible(target);
      if (!visibility.isVisible) {
        throw new BelowHorizonError(target.name, visibility.altitudeDegrees, visibility.minimumAltitudeDegrees);
      }
    }

    this.logger.warn('Starting solar observation mode', { target: target.name });
    await this.session.send('iscope_start_view', { mode: 'sun' });
    await this.session.send('start_scan_planet');
    await this.session.send('clear_app_state', { name: 'ScanSun' });
    this.tracker.markOperation('solar', target.name);

    return {
      success: true,
      completed: true,
      message: `Solar observation mode started for ${target.name}`,
      targetName: target.name,
      visibility,
      warning: target.solarSafety?.warning,
      target,
    };
  }
}

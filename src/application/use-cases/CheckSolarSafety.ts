import type { ILogger } from '../../domain/ports/ILogger.js';
import type { EquatorialCoordinates } from '../../domain/entities/Target.js';
import type { VisibilityResult } from '../../domain/entities/ObserverLocation.js';
import type { TargetResolver } from '../TargetResolver.js';
import type { LocationManager } from '../LocationManager.js';

export const SOLAR_SAFETY_WARNINGS: readonly string[] = [
  'CRITICAL: Ensure a proper solar filter is installed before any solar observation',
  'Never look directly at the Sun through the telescope without proper filtration',
  'Some telescopes have built-in safety mechanisms that prevent solar pointing',
  "If slewing fails with 'mount goto failed', the telescope may be protecting against solar observation",
];

export interface SolarSafetyReport {
  sun: EquatorialCoordinates;
  visibility: VisibilityResult | null;
  safetyWarnings: string[];
  recommendations: string[];
}

/**
 * Use case for the pre-flight check before any solar observation
 */
export class CheckSolarSafety {
  constructor(
    private readonly resolver: TargetResolver,
    private readonly locationManager: LocationManager,
    private readonly logger: ILogger
  ) {}

  async execute(at?: Date): Promise<SolarSafetyReport> {
    const sun = await this.resolver.resolveOrThrow('sun');
    const sunPosition: EquatorialCoordinates = {
      rightAscensionHours: sun.rightAscensionHours,
      declinationDegrees: sun.declinationDegrees,
      epoch: sun.epoch,
    };

    if (!this.locationManager.isConfigured) {
      return {
        sun: sunPosition,
        visibility: null,
        safetyWarnings: [...SOLAR_SAFETY_WARNINGS],
        recommendations: [
          'Configure the observer location to check whether the Sun is above the horizon',
          'Verify the solar filter is properly installed',
        ],
      };
    }

    const visibility = this.locationManager.checkVisible(sunPosition, at);
    this.logger.info('Solar safety check', {
      altitudeDegrees: visibility.altitudeDegrees,
      isVisible: visibility.isVisible,
    });

    return {
      sun: sunPosition,
      visibility,
      safetyWarnings: [...SOLAR_SAFETY_WARNINGS],
      recommendations: visibility.isVisible
        ? [
            'Sun is above the horizon and visible',
            'Verify the solar filter is properly installed',
            'Try slewing to the Sun; a failure may indicate telescope safety protection',
          ]
        : [
            'Sun is below the horizon and cannot be observed',
            'Wait until the Sun rises above the horizon',
          ],
    };
  }
}

import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { TelescopeStatus } from '../../domain/entities/TelescopeState.js';
import type { HorizontalCoordinates } from '../../domain/entities/ObserverLocation.js';
import { isJsonObject } from '../../domain/entities/TelescopeMessage.js';
import type { LocationManager } from '../LocationManager.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';

export interface EquatorialPosition {
  ra: number;
  dec: number;
}

/**
 * `scope_get_equ_coord` answers {"ra": hours, "dec": degrees} of date.
 */
export function parseEquatorialPosition(result: unknown): EquatorialPosition | null {
  if (!isJsonObject(result)) return null;
  const { ra, dec } = result;
  if (typeof ra !== 'number' || typeof dec !== 'number') return null;
  return { ra, dec };
}

/**
 * Use case for reading where the telescope points and what it is doing
 */
export class GetTelescopeStatus {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly tracker: TelescopeStateTracker,
    private readonly locationManager: LocationManager,
    private readonly logger: ILogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async execute(): Promise<TelescopeStatus> {
    const connection = this.session.connectionState;
    const snapshot = this.tracker.snapshot();

    let position: EquatorialPosition | null = null;
    let horizontal: HorizontalCoordinates | null = null;

    if (connection === 'connected' || connection === 'degraded') {
      const result = await this.session.send('scope_get_equ_coord');
      position = parseEquatorialPosition(result);
      if (!position) {
        this.logger.warn('Unexpected scope_get_equ_coord result', { result });
      }
    }

    if (position && this.locationManager.isConfigured) {
      const { altitudeDegrees, azimuthDegrees } = this.locationManager.checkVisible({
        rightAscensionHours: position.ra,
        declinationDegrees: position.dec,
        epoch: 'JNow',
      });
      horizontal = { altitudeDegrees, azimuthDegrees };
    }

    return {
      connection,
      operation: snapshot.operation,
      rightAscensionHours: position?.ra ?? null,
      declinationDegrees: position?.dec ?? null,
      horizontal,
      currentTarget: snapshot.currentTarget,
      lastEvent: snapshot.lastEvent,
      lastError: snapshot.lastError,
      updatedAt: this.now().toISOString(),
    };
  }
}

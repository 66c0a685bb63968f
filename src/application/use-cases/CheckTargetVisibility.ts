import type { ILogger } from '../../domain/ports/ILogger.js';
import type { Target } from '../../domain/entities/Target.js';
import type { LocalTimeInfo, VisibilityResult } from '../../domain/entities/ObserverLocation.js';
import type { TargetResolver } from '../TargetResolver.js';
import type { LocationManager } from '../LocationManager.js';

export interface CheckTargetVisibilityOutput {
  target: Target;
  visibility: VisibilityResult;
  localTime: LocalTimeInfo;
}

/**
 * Use case for answering "can I see it from here right now?"
 */
export class CheckTargetVisibility {
  constructor(
    private readonly resolver: TargetResolver,
    private readonly locationManager: LocationManager,
    private readonly logger: ILogger
  ) {}

  async execute(name: string, at?: Date): Promise<CheckTargetVisibilityOutput> {
    const target = await this.resolver.resolveOrThrow(name);
    const visibility = this.locationManager.checkVisible(target, at);
    this.logger.info('Visibility checked', {
      target: target.name,
      altitudeDegrees: visibility.altitudeDegrees,
      isVisible: visibility.isVisible,
    });
    return {
      target,
      visibility,
      localTime: this.locationManager.getLocalTime(at),
    };
  }
}

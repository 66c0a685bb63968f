import type { ILogger } from '../../domain/ports/ILogger.js';
import { UnsupportedOperationError } from '../../domain/errors/TelescopeErrors.js';

export const CALIBRATION_UNSUPPORTED_MESSAGE =
  'Calibration must be performed with the manufacturer mobile app. ' +
  'The telescope does not accept polar alignment or calibration commands over its control channel.';

/** The control protocol has no calibration commands, so this always rejects. */
export class StartCalibration {
  constructor(private readonly logger: ILogger) {}

  async execute(): Promise<never> {
    this.logger.warn('Calibration requested but not supported remotely');
    throw new UnsupportedOperationError('start_calibration', CALIBRATION_UNSUPPORTED_MESSAGE);
  }
}

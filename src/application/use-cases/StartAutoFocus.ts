import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { OperationFailedError } from '../../domain/errors/TelescopeErrors.js';
import type { TelescopeStateTracker } from '../TelescopeStateTracker.js';
import { waitForEvent } from '../waitForEvent.js';
import { assertConnected } from './guards.js';

export interface AutoFocusOutput {
  success: boolean;
  completed: boolean;
  message: string;
  result?: unknown;
}

/**
 * Use case for running the telescope's own focus routine and waiting for
 * its AutoFocus outcome.
 */
export class StartAutoFocus {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger,
    private readonly timeoutMs = 120000
  ) {}

  async execute(): Promise<AutoFocusOutput> {
    assertConnected(this.session, 'auto_focus');

    const outcome = waitForEvent(
      this.session,
      (event) => event.kind === 'AutoFocus' && (event.state === 'complete' || event.state === 'fail'),
      this.timeoutMs
    );
    this.tracker.markOperation('focusing');

    try {
      // "focuse" is the telescope's spelling
      await this.session.send('start_auto_focuse');
    } catch (error) {
      outcome.cancel();
      this.tracker.markOperation('error');
      throw error;
    }

    const event = await outcome.promise;
    if (!event) {
      this.logger.warn('No auto focus outcome within timeout', { timeoutMs: this.timeoutMs });
      return { success: true, completed: false, message: 'Auto focus still running' };
    }
    if (event.state === 'fail') {
      throw new OperationFailedError('Auto focus', event.error ?? 'unknown error');
    }

    this.logger.info('Auto focus completed');
    return { success: true, completed: true, message: 'Auto focus completed', result: event.result };
  }
}

import type { ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';

/**
 * Use case for closing the control channel. Outstanding requests fail with
 * ConnectionLostError; nothing reconnects until connect is called again.
 */
export class DisconnectTelescope {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly logger: ILogger
  ) {}

  async execute(): Promise<{ success: boolean; message: string }> {
    if (this.session.connectionState === 'disconnected') {
      return { success: true, message: 'Telescope was not connected' };
    }
    this.logger.info('Executing DisconnectTelescope use case', { host: this.session.host });
    await this.session.disconnect();
    return { success: true, message: 'Disconnected from telescope' };
  }
}

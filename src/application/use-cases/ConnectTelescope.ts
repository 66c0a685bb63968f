import type { ConnectOptions, ConnectionState, ITelescopeSession } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { InvalidInputError } from '../../domain/errors/TelescopeErrors.js';
import { assertInRange } from './guards.js';

export interface ConnectTelescopeInput {
  host?: string;
  tcpPort?: number;
  udpPort?: number;
  timeoutMs?: number;
}

export interface ConnectTelescopeOutput {
  success: boolean;
  message: string;
  host: string | null;
  state: ConnectionState;
}

/**
 * Use case for opening the control channel (UDP handshake, then TCP)
 */
export class ConnectTelescope {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly logger: ILogger
  ) {}

  async execute(input: ConnectTelescopeInput = {}): Promise<ConnectTelescopeOutput> {
    const options: ConnectOptions = {};
    if (input.host !== undefined) {
      const host = input.host.trim();
      if (host.length === 0) {
        throw new InvalidInputError('Host must not be empty');
      }
      options.host = host;
    }
    if (input.tcpPort !== undefined) {
      assertInRange('tcpPort', input.tcpPort, { min: 1, max: 65535, integer: true });
      options.tcpPort = input.tcpPort;
    }
    if (input.udpPort !== undefined) {
      assertInRange('udpPort', input.udpPort, { min: 1, max: 65535, integer: true });
      options.udpPort = input.udpPort;
    }
    if (input.timeoutMs !== undefined) {
      assertInRange('timeoutMs', input.timeoutMs, { min: 0, exclusiveMin: true });
      options.timeoutMs = input.timeoutMs;
    }

    this.logger.info('Executing ConnectTelescope use case', { host: options.host ?? this.session.host });

    await this.session.connect(options);

    const host = this.session.host;
    return {
      success: true,
      message: `Connected to telescope at ${host ?? 'unknown host'}`,
      host,
      state: this.session.connectionState,
    };
  }
}

import type { ConnectionState, ITelescopeSession, SessionStats } from '../../domain/ports/ITelescopeSession.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { errorMessage } from '../../domain/errors/TelescopeErrors.js';
import type { TargetResolver } from '../TargetResolver.js';
import type { CommandRecord, TelescopeStateTracker } from '../TelescopeStateTracker.js';

export interface SystemInfo {
  version: string;
  uptimeSeconds: number;
  connectionState: ConnectionState;
  host: string | null;
  /** `get_device_state` result, null when not connected or unavailable */
  telescopeInfo: unknown;
  lastCommand: CommandRecord | null;
  stats: Readonly<SessionStats>;
  catalogs: string[];
  cachedTargets: number;
}

/**
 * Use case for bridge and telescope diagnostics
 */
export class GetSystemInfo {
  constructor(
    private readonly session: ITelescopeSession,
    private readonly resolver: TargetResolver,
    private readonly tracker: TelescopeStateTracker,
    private readonly logger: ILogger,
    private readonly options: { version: string; startedAt: Date; now?: () => Date }
  ) {}

  async execute(): Promise<SystemInfo> {
    const state = this.session.connectionState;
    let telescopeInfo: unknown = null;

    if (state === 'connected' || state === 'degraded') {
      try {
        telescopeInfo = await this.session.send('get_device_state');
      } catch (error) {
        this.logger.warn('Could not read device state', { error: errorMessage(error) });
      }
    }

    const now = this.options.now?.() ?? new Date();
    return {
      version: this.options.version,
      uptimeSeconds: Math.max(0, Math.round((now.getTime() - this.options.startedAt.getTime()) / 1000)),
      connectionState: state,
      host: this.session.host,
      telescopeInfo,
      lastCommand: this.tracker.lastCommandInfo(),
      stats: this.session.stats,
      catalogs: this.resolver.catalogNames,
      cachedTargets: this.resolver.getCachedTargets().length,
    };
  }
}

import type { ILogger } from '../../domain/ports/ILogger.js';
import type { TargetSearchResult } from '../../domain/entities/Target.js';
import { formatCoordinates, type TargetResolver } from '../TargetResolver.js';

export type SearchTargetOutput = TargetSearchResult & { formattedCoordinates?: string };

/**
 * Use case for looking a name up without moving the telescope
 */
export class SearchTarget {
  constructor(
    private readonly resolver: TargetResolver,
    private readonly logger: ILogger
  ) {}

  async execute(name: string): Promise<SearchTargetOutput> {
    this.logger.info('Executing SearchTarget use case', { name });
    const result = await this.resolver.resolve(name);
    if (!result.found) {
      return result;
    }
    return { ...result, formattedCoordinates: formatCoordinates(result.target) };
  }
}

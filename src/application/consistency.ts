import type { EventCatalog, StatisticsMap } from '../domain/index.js';
import { ConsistencyError, MissingStatisticError } from '../domain/index.js';

/**
 * Startup check: the catalog and the generation statistics must name the
 * same events, one statistic per event.
 */
export function assertCatalogMatchesStatistics(catalog: EventCatalog, stats: StatisticsMap): void {
  if (catalog.size !== stats.size) {
    throw new ConsistencyError(
      `Inconsistent number between events (${catalog.size}) and statistics (${stats.size})`,
    );
  }
  for (const name of catalog.keys()) {
    if (!stats.has(name)) throw new MissingStatisticError(name);
  }
}

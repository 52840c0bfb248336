// Scan Service
// Catalog -> item ids -> market snapshot -> ranking, for one invocation

import type {
  MarketDataProvider,
  MarketSnapshot,
  RankingResult,
  Recipe,
  Region,
  ScanParameters,
} from '../types';
import { rankRecipes, type RankingOptions } from './ranking-aggregator';

export interface ScanReport {
  ranking: RankingResult;
  requestedIds: number;
  pricedIds: number;
  elapsedMs: number;
}

export interface ScanOptions extends RankingOptions {
  region: Region;
  // Called with the frozen snapshot before ranking, e.g. to store it for offline replays
  persist?: (region: Region, snapshot: MarketSnapshot) => void;
}

/**
 * Every product and ingredient option id in the catalog, once, in catalog order
 */
export function collectItemIds(recipes: readonly Recipe[]): number[] {
  const ids = new Set<number>();
  for (const recipe of recipes) {
    ids.add(recipe.product.id);
    for (const slot of recipe.slots) {
      for (const option of slot.options) {
        ids.add(option.id);
      }
    }
  }
  return [...ids];
}

export async function runScan(
  recipes: readonly Recipe[],
  provider: MarketDataProvider,
  params: ScanParameters,
  options: ScanOptions
): Promise<ScanReport> {
  const startTime = Date.now();
  const ids = collectItemIds(recipes);

  const snapshot: MarketSnapshot = ids.length > 0 ? await provider.lookup(ids) : new Map();

  options.persist?.(options.region, snapshot);

  return {
    ranking: rankRecipes(recipes, snapshot, params, options),
    requestedIds: ids.length,
    pricedIds: snapshot.size,
    elapsedMs: Date.now() - startTime,
  };
}

/**
 * Rank against a snapshot that was already fetched (e.g. one loaded from the store)
 */
export function replayScan(
  recipes: readonly Recipe[],
  snapshot: MarketSnapshot,
  params: ScanParameters,
  options: RankingOptions = {}
): ScanReport {
  const startTime = Date.now();
  return {
    ranking: rankRecipes(recipes, snapshot, params, options),
    requestedIds: collectItemIds(recipes).length,
    pricedIds: snapshot.size,
    elapsedMs: Date.now() - startTime,
  };
}

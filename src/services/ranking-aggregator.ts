// Ranking Aggregator
// Evaluates every recipe in the catalog and orders the survivors by hourly profit

import type {
  Evaluation,
  MarketSnapshot,
  RankedRow,
  RankingResult,
  Recipe,
  ScanParameters,
  VendorCatalog,
  YieldTable,
} from '../types';
import { DEFAULT_VENDOR_CATALOG } from '../constants/vendor-items';
import { AvailabilityResolver, indexRecipesByProduct } from './availability-resolver';
import { evaluateRecipe, type EvaluationContext } from './profitability-calculator';

export interface RankingOptions {
  vendors?: VendorCatalog;
  yieldTable?: YieldTable;
  cyclesPerHour?: number;
}

export function toRankedRow(evaluation: Evaluation): RankedRow {
  const { recipe } = evaluation;
  return {
    productId: recipe.product.id,
    name: recipe.product.name,
    category: recipe.category,
    craftable: evaluation.craftable,
    cost: Math.trunc(evaluation.cost),
    sellPrice: Math.trunc(evaluation.sellPrice),
    profitPerHour: Math.trunc(evaluation.profitPerHour),
    missing: evaluation.missing?.name,
  };
}

/**
 * Evaluate all recipes against one frozen snapshot.
 * Unsellable recipes (no product price) are dropped; uncraftable ones are dropped
 * only when params.requireStock is on, otherwise they stay in with craftable = false.
 * Sort is by descending hourly profit; equal profits keep catalog order.
 */
export function rankRecipes(
  recipes: readonly Recipe[],
  snapshot: MarketSnapshot,
  params: ScanParameters,
  options: RankingOptions = {}
): RankingResult {
  if (recipes.length === 0 || snapshot.size === 0) {
    return { rows: [], evaluated: 0, excludedUnsellable: 0, excludedUncraftable: 0, empty: true };
  }

  const vendors = options.vendors ?? DEFAULT_VENDOR_CATALOG;
  const context: EvaluationContext = {
    snapshot,
    vendors,
    yieldTable: options.yieldTable,
    cyclesPerHour: options.cyclesPerHour,
    resolver: params.recursive
      ? new AvailabilityResolver(indexRecipesByProduct(recipes), snapshot, vendors, params)
      : undefined,
  };

  let excludedUnsellable = 0;
  let excludedUncraftable = 0;
  const kept: { evaluation: Evaluation; order: number }[] = [];

  recipes.forEach((recipe, order) => {
    const evaluation = evaluateRecipe(recipe, context, params);

    if (evaluation.sellPrice === 0) {
      excludedUnsellable++;
      return;
    }
    if (params.requireStock && !evaluation.craftable) {
      excludedUncraftable++;
      return;
    }

    kept.push({ evaluation, order });
  });

  kept.sort((a, b) => b.evaluation.profitPerHour - a.evaluation.profitPerHour || a.order - b.order);

  const rows = kept.map(({ evaluation }) => toRankedRow(evaluation));

  return {
    rows,
    evaluated: recipes.length,
    excludedUnsellable,
    excludedUncraftable,
    empty: rows.length === 0,
  };
}

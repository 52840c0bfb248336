// Availability Resolver
// Decides whether an item can be obtained directly (vendor / market stock) or by crafting it
// from obtainable ingredients, within a bounded number of recipe expansions

import type { MarketSnapshot, Recipe, ScanParameters, VendorCatalog } from '../types';

/**
 * Group recipes by product id. Several recipes may make the same product;
 * they are alternatives to each other.
 */
export function indexRecipesByProduct(recipes: readonly Recipe[]): Map<number, Recipe[]> {
  const index = new Map<number, Recipe[]>();
  for (const recipe of recipes) {
    const existing = index.get(recipe.product.id);
    if (existing) {
      existing.push(recipe);
    } else {
      index.set(recipe.product.id, [recipe]);
    }
  }
  return index;
}

export class AvailabilityResolver {
  private recipesByProduct: Map<number, Recipe[]>;
  private snapshot: MarketSnapshot;
  private vendors: VendorCatalog;
  private minStock: number;
  // keyed by "itemId:depth"; a failure at one depth says nothing about a deeper query
  private memo = new Map<string, boolean>();

  constructor(
    recipes: readonly Recipe[] | Map<number, Recipe[]>,
    snapshot: MarketSnapshot,
    vendors: VendorCatalog,
    params: Pick<ScanParameters, 'minStock'>
  ) {
    this.recipesByProduct = recipes instanceof Map ? recipes : indexRecipesByProduct(recipes);
    this.snapshot = snapshot;
    this.vendors = vendors;
    this.minStock = params.minStock;
  }

  /**
   * Vendor item, or listed on the market with at least the minimum stock
   */
  isDirectlyAvailable(itemId: number): boolean {
    if (this.vendors.isVendorItem(itemId)) return true;
    const entry = this.snapshot.get(itemId);
    return entry !== undefined && entry.stock >= this.minStock;
  }

  /**
   * Whether the item is obtainable with at most `depthRemaining` recipe expansions.
   * Terminates on cyclic catalogs because every expansion consumes one level of depth.
   */
  isObtainable(itemId: number, depthRemaining: number): boolean {
    if (this.isDirectlyAvailable(itemId)) return true;

    const depth = Math.max(0, Math.floor(depthRemaining));
    if (depth === 0) return false;

    const key = `${itemId}:${depth}`;
    const cached = this.memo.get(key);
    if (cached !== undefined) return cached;

    const candidates = this.recipesByProduct.get(itemId) ?? [];
    const result = candidates.some((recipe) =>
      recipe.slots.every((slot) =>
        slot.options.some((option) => this.isObtainable(option.id, depth - 1))
      )
    );

    this.memo.set(key, result);
    return result;
  }

  /**
   * Number of memoized (item, depth) answers, for diagnostics
   */
  get cacheSize(): number {
    return this.memo.size;
  }
}

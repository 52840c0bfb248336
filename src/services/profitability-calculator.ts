// Profitability Calculation Engine
// Prices one recipe against a market snapshot: ingredient cost, sell price, yield and profit rate

import type {
  Evaluation,
  IngredientSlot,
  Item,
  MarketSnapshot,
  Recipe,
  ScanParameters,
  VendorCatalog,
  YieldTable,
} from '../types';
import { CYCLES_PER_HOUR, yieldFor } from '../constants/yield-policy';
import type { AvailabilityResolver } from './availability-resolver';

export interface EvaluationContext {
  snapshot: MarketSnapshot;
  vendors: VendorCatalog;
  yieldTable?: YieldTable;
  cyclesPerHour?: number;
  // Consulted only when params.recursive is on
  resolver?: AvailabilityResolver;
}

// Reported as missing for a slot that lists no options at all
export const UNKNOWN_INGREDIENT: Item = Object.freeze({ id: 0, name: '?' });

export interface SlotEvaluation {
  satisfied: boolean;
  unitPrice: number; // cheapest eligible option, 0 when unsatisfied
  cost: number;
  eligible: Item[];
}

/**
 * Unit price of one option if it can be used to fill a slot, otherwise null.
 *
 * Vendor items always qualify at their nominal cost. Market items need a snapshot
 * entry with at least the minimum stock. In recursive mode an option that fails
 * those checks still qualifies when it can be crafted from obtainable ingredients;
 * it is then priced at its snapshot price, or 0 when it has none.
 */
function eligiblePrice(option: Item, context: EvaluationContext, params: ScanParameters): number | null {
  if (context.vendors.isVendorItem(option.id)) {
    return context.vendors.nominalCost(option.id);
  }

  const entry = context.snapshot.get(option.id);
  if (entry && entry.stock >= params.minStock) {
    return entry.price;
  }

  if (params.recursive && context.resolver?.isObtainable(option.id, params.maxDepth)) {
    return entry?.price ?? 0;
  }

  return null;
}

export function evaluateSlot(
  slot: IngredientSlot,
  context: EvaluationContext,
  params: ScanParameters
): SlotEvaluation {
  const eligible: Item[] = [];
  let unitPrice = Infinity;

  for (const option of slot.options) {
    const price = eligiblePrice(option, context, params);
    if (price === null) continue;
    eligible.push(option);
    unitPrice = Math.min(unitPrice, price);
  }

  if (eligible.length === 0) {
    return { satisfied: false, unitPrice: 0, cost: 0, eligible };
  }

  return { satisfied: true, unitPrice, cost: unitPrice * slot.quantity, eligible };
}

/**
 * Evaluate one recipe. Never throws: missing prices degrade to 0 / not craftable.
 *
 * Every slot is evaluated even after one fails, so the cost of the satisfiable
 * slots is still reported for uncraftable recipes.
 */
export function evaluateRecipe(
  recipe: Recipe,
  context: EvaluationContext,
  params: ScanParameters
): Evaluation {
  const sellPrice = context.snapshot.get(recipe.product.id)?.price ?? 0;

  let cost = 0;
  let craftable = true;
  let missing: Item | undefined;

  for (const slot of recipe.slots) {
    const result = evaluateSlot(slot, context, params);
    if (result.satisfied) {
      cost += result.cost;
    } else {
      craftable = false;
      // first declared option of the first unsatisfied slot
      missing = missing ?? slot.options[0] ?? UNKNOWN_INGREDIENT;
    }
  }

  const yieldMultiplier = yieldFor(recipe.category, params.mastery, context.yieldTable);
  const revenue = sellPrice * yieldMultiplier * params.taxRate;
  const profitPerCycle = revenue - cost;
  const profitPerHour = profitPerCycle * (context.cyclesPerHour ?? CYCLES_PER_HOUR);

  return {
    recipe,
    craftable,
    cost,
    sellPrice,
    yieldMultiplier,
    profitPerCycle,
    profitPerHour,
    missing,
  };
}

// Catalog Normalizer
// Turns raw recipe records into integer-keyed recipes tagged with their category

import type {
  CatalogLoadStatus,
  IngredientSlot,
  Item,
  RawCategoryFile,
  RawId,
  RawItem,
  RawRecipe,
  Recipe,
  RecipeCategory,
} from '../types';

const CATEGORY_PATTERNS: { pattern: RegExp; category: RecipeCategory }[] = [
  { pattern: /processing/i, category: 'Processing' },
  { pattern: /cooking/i, category: 'Cooking' },
  { pattern: /alchemy/i, category: 'Alchemy' },
];

/**
 * Derive the recipe category from the file it was loaded from
 * e.g. "recipesProcessing.json" -> "Processing"
 */
export function categoryFromSource(source: string): RecipeCategory {
  for (const { pattern, category } of CATEGORY_PATTERNS) {
    if (pattern.test(source)) return category;
  }
  return 'Other';
}

/**
 * Coerce an identifier that may arrive as a number or a numeric string.
 * Returns null when it isn't an integer.
 */
export function coerceId(raw: RawId | null | undefined): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? Math.trunc(raw) : null;
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    return /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
  }
  return null;
}

function coerceQuantity(raw: number | string | undefined): number {
  const quantity = typeof raw === 'string' ? Number(raw.trim()) : raw;
  return quantity !== undefined && Number.isFinite(quantity) && quantity > 0 ? quantity : 1;
}

function toItem(raw: RawItem | null): Item | null {
  if (!raw) return null;
  const id = coerceId(raw.id);
  if (id === null) return null;
  return { id, name: raw.name ?? String(id) };
}

type NormalizeOutcome = { recipe: Recipe } | { reason: string };

function normalizeRecipe(raw: RawRecipe, source: string, category: RecipeCategory): NormalizeOutcome {
  if (typeof raw.product !== 'object' || raw.product === null) {
    return { reason: 'missing product' };
  }

  const product = toItem(raw.product);
  if (!product) {
    return { reason: `product id ${JSON.stringify(raw.product.id)} is not an integer` };
  }

  const slots: IngredientSlot[] = [];
  const groups = Array.isArray(raw.ingredients) ? raw.ingredients : [];
  for (const group of groups) {
    // A group without options stays as a slot nothing can fill
    const rawOptions = Array.isArray(group.item) ? group.item : [];

    const options: Item[] = [];
    for (const option of rawOptions) {
      const item = toItem(option);
      if (!item) {
        return {
          reason: `${product.name}: ingredient id ${JSON.stringify(option?.id ?? null)} is not an integer`,
        };
      }
      options.push(item);
    }

    slots.push({ options, quantity: coerceQuantity(group.amount) });
  }

  return { recipe: { product, slots, category, source } };
}

/**
 * Normalize one category file. Records that can't be coerced are skipped and
 * reported in the returned status, never thrown.
 */
export function normalizeCategory(
  source: string,
  raw: RawCategoryFile
): { recipes: Recipe[]; status: CatalogLoadStatus } {
  const category = categoryFromSource(source);
  const recipes: Recipe[] = [];
  const warnings: string[] = [];

  const records = Array.isArray(raw.recipes) ? raw.recipes : [];
  records.forEach((record, index) => {
    const outcome = normalizeRecipe(record, source, category);
    if ('recipe' in outcome) {
      recipes.push(outcome.recipe);
    } else {
      warnings.push(`#${index}: ${outcome.reason}`);
    }
  });

  return {
    recipes,
    status: {
      source,
      loaded: recipes.length,
      skipped: warnings.length,
      warnings,
    },
  };
}

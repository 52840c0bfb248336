// Type definitions for the crafting profit scanner

export type Region = 'NA' | 'EU' | 'SEA' | 'KR' | 'SA' | 'RU' | 'JP';

// Yield model is selected per category; everything that isn't processing uses the mastery curve
export type RecipeCategory = 'Cooking' | 'Alchemy' | 'Processing' | 'Other';

export interface Item {
  id: number;
  name: string;
}

// One ingredient requirement: any one of the options satisfies it
export interface IngredientSlot {
  options: Item[];
  quantity: number;
}

export interface Recipe {
  product: Item;
  slots: IngredientSlot[];
  category: RecipeCategory;
  source: string; // file the recipe was loaded from
}

// ============================================================================
// RAW CATALOG (as found in the recipe files)
// ============================================================================

export type RawId = string | number;

export interface RawItem {
  id?: RawId | null;
  name?: string;
}

export interface RawIngredientGroup {
  item?: (RawItem | null)[];
  amount?: number | string;
}

export interface RawRecipe {
  product?: RawItem;
  ingredients?: RawIngredientGroup[];
}

export interface RawCategoryFile {
  recipes?: RawRecipe[];
}

export interface CatalogLoadStatus {
  source: string;
  loaded: number;
  skipped: number;
  warnings: string[];
  error?: string;
}

export interface Catalog {
  recipes: Recipe[];
  log: CatalogLoadStatus[];
}

// ============================================================================
// MARKET
// ============================================================================

export interface MarketEntry {
  price: number; // per unit
  stock: number;
}

// Absence of an id means "unpriced", never zero
export type MarketSnapshot = ReadonlyMap<number, MarketEntry>;

export interface MarketDataProvider {
  lookup(itemIds: Iterable<number>): Promise<MarketSnapshot>;
}

// ============================================================================
// SCAN
// ============================================================================

export interface ScanParameters {
  mastery: number;
  taxRate: number;       // fraction kept after market tax, (0, 1]
  minStock: number;
  maxDepth: number;      // recipe expansions allowed when resolving sub-ingredients
  requireStock: boolean; // drop recipes with an unsatisfied slot instead of flagging them
  recursive: boolean;    // let craftable sub-ingredients satisfy a slot
}

export interface VendorCatalog {
  isVendorItem(itemId: number): boolean;
  nominalCost(itemId: number): number;
}

export type YieldFunction = (mastery: number) => number;

export type YieldTable = Record<RecipeCategory, YieldFunction>;

export interface Evaluation {
  recipe: Recipe;
  craftable: boolean;
  cost: number;
  sellPrice: number;
  yieldMultiplier: number;
  profitPerCycle: number;
  profitPerHour: number;
  missing?: Item;
}

export interface RankedRow {
  productId: number;
  name: string;
  category: RecipeCategory;
  craftable: boolean;
  cost: number;
  sellPrice: number;
  profitPerHour: number;
  missing?: string;
}

export interface RankingResult {
  rows: RankedRow[];
  evaluated: number;
  excludedUnsellable: number;
  excludedUncraftable: number;
  empty: boolean; // nothing to show
}

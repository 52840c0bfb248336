import { describe, test, expect } from 'vitest'
import { evaluateRecipe, evaluateSlot, type EvaluationContext } from './profitability-calculator'
import { AvailabilityResolver } from './availability-resolver'
import { createVendorCatalog, DEFAULT_VENDOR_CATALOG } from '../constants/vendor-items'
import { CYCLES_PER_HOUR, masteryYield, YIELD_POLICY } from '../constants/yield-policy'
import type { MarketEntry, Recipe, RecipeCategory, ScanParameters } from '../types'

// ============================================================================
// HELPERS
// ============================================================================

const noVendors = createVendorCatalog([])

function params(overrides: Partial<ScanParameters> = {}): ScanParameters {
	return {
		mastery: 0,
		taxRate: 0.845,
		minStock: 1,
		maxDepth: 3,
		requireStock: true,
		recursive: false,
		...overrides,
	}
}

function snapshotOf(entries: Record<number, MarketEntry>): Map<number, MarketEntry> {
	return new Map(Object.entries(entries).map(([id, entry]) => [Number(id), entry]))
}

function breadRecipe(category: RecipeCategory = 'Cooking'): Recipe {
	return {
		product: { id: 100, name: 'Bread' },
		slots: [
			{
				options: [
					{ id: 200, name: 'Flour' },
					{ id: 201, name: 'Wheat Flour' },
				],
				quantity: 2,
			},
		],
		category,
		source: 'recipesCooking.json',
	}
}

const breadMarket = snapshotOf({
	100: { price: 500, stock: 0 },
	200: { price: 50, stock: 5 },
	201: { price: 30, stock: 0 },
})

// ============================================================================
// TESTS
// ============================================================================

describe('evaluateSlot', () => {
	test('only options with enough stock are eligible', () => {
		const context: EvaluationContext = { snapshot: breadMarket, vendors: noVendors }
		const result = evaluateSlot(breadRecipe().slots[0], context, params({ minStock: 1 }))

		expect(result.satisfied).toBe(true)
		expect(result.eligible.map((item) => item.id)).toEqual([200])
		expect(result.unitPrice).toBe(50)
		expect(result.cost).toBe(100)
	})

	test('picks the cheapest eligible option', () => {
		const context: EvaluationContext = { snapshot: breadMarket, vendors: noVendors }
		const result = evaluateSlot(breadRecipe().slots[0], context, params({ minStock: 0 }))

		expect(result.eligible.map((item) => item.id)).toEqual([200, 201])
		expect(result.cost).toBe(60)
	})

	test('vendor items are always eligible at their nominal cost', () => {
		const vendors = createVendorCatalog([{ id: 9059, name: 'Mineral Water', cost: 30 }])
		const context: EvaluationContext = { snapshot: new Map(), vendors }
		const result = evaluateSlot(
			{ options: [{ id: 9059, name: 'Mineral Water' }], quantity: 6 },
			context,
			params({ minStock: 1000 })
		)

		expect(result.satisfied).toBe(true)
		expect(result.cost).toBe(180)
	})
})

describe('evaluateRecipe', () => {
	test('bread is craftable from in-stock flour', () => {
		const result = evaluateRecipe(breadRecipe(), { snapshot: breadMarket, vendors: noVendors }, params({ minStock: 1 }))

		expect(result.craftable).toBe(true)
		expect(result.cost).toBe(100)
		expect(result.sellPrice).toBe(500)
		expect(result.missing).toBeUndefined()
		// 2.35 yield at mastery 0
		expect(result.yieldMultiplier).toBeCloseTo(2.35, 10)
		expect(result.profitPerCycle).toBeCloseTo(500 * 2.35 * 0.845 - 100, 6)
		expect(result.profitPerHour).toBeCloseTo((500 * 2.35 * 0.845 - 100) * CYCLES_PER_HOUR, 4)
	})

	test('bread is not craftable when no flour meets the stock threshold', () => {
		const result = evaluateRecipe(breadRecipe(), { snapshot: breadMarket, vendors: noVendors }, params({ minStock: 10 }))

		expect(result.craftable).toBe(false)
		expect(result.missing).toEqual({ id: 200, name: 'Flour' })
		expect(result.cost).toBe(0)
	})

	test('keeps summing the satisfiable slots after one fails', () => {
		const recipe: Recipe = {
			product: { id: 1, name: 'Stew' },
			slots: [
				{ options: [{ id: 2, name: 'Meat' }], quantity: 3 },
				{ options: [{ id: 3, name: 'Truffle' }, { id: 4, name: 'Morel' }], quantity: 1 },
				{ options: [{ id: 5, name: 'Onion' }], quantity: 2 },
				{ options: [{ id: 6, name: 'Saffron' }], quantity: 1 },
			],
			category: 'Cooking',
			source: 'test',
		}
		const snapshot = snapshotOf({
			1: { price: 1000, stock: 10 },
			2: { price: 10, stock: 100 },
			5: { price: 7, stock: 100 },
		})

		const result = evaluateRecipe(recipe, { snapshot, vendors: noVendors }, params())

		expect(result.craftable).toBe(false)
		expect(result.cost).toBe(44)
		// first option of the first unsatisfied slot
		expect(result.missing?.name).toBe('Truffle')
	})

	test('a slot without options can never be filled', () => {
		const recipe: Recipe = {
			product: { id: 1, name: 'Stew' },
			slots: [
				{ options: [{ id: 2, name: 'Meat' }], quantity: 1 },
				{ options: [], quantity: 2 },
			],
			category: 'Cooking',
			source: 'test',
		}
		const snapshot = snapshotOf({
			1: { price: 1000, stock: 10 },
			2: { price: 10, stock: 100 },
		})

		const result = evaluateRecipe(recipe, { snapshot, vendors: noVendors }, params({ minStock: 0 }))

		expect(result.craftable).toBe(false)
		expect(result.cost).toBe(10)
		expect(result.missing).toEqual({ id: 0, name: '?' })
	})

	test('vendor ingredients from the default list add nothing to the cost', () => {
		const recipe: Recipe = {
			product: { id: 9601, name: 'Cheese' },
			slots: [
				{ options: [{ id: 9001, name: 'Cooking Wine' }], quantity: 10 },
				{ options: [{ id: 9059, name: 'Mineral Water' }], quantity: 3 },
			],
			category: 'Cooking',
			source: 'test',
		}

		const result = evaluateRecipe(
			recipe,
			{ snapshot: new Map(), vendors: DEFAULT_VENDOR_CATALOG },
			params({ minStock: 1000 })
		)

		expect(result.craftable).toBe(true)
		expect(result.cost).toBe(0)
	})

	test('items outside the default vendor list need market stock', () => {
		const recipe: Recipe = {
			product: { id: 9602, name: 'Fried Fish' },
			slots: [
				{ options: [{ id: 9017, name: 'Frying Oil' }], quantity: 1 },
				{ options: [{ id: 9003, name: 'Salt' }], quantity: 2 },
			],
			category: 'Cooking',
			source: 'test',
		}
		const snapshot = snapshotOf({ 9003: { price: 15, stock: 40 } })

		const result = evaluateRecipe(recipe, { snapshot, vendors: DEFAULT_VENDOR_CATALOG }, params())

		expect(result.craftable).toBe(false)
		expect(result.cost).toBe(30)
		expect(result.missing).toEqual({ id: 9017, name: 'Frying Oil' })
	})

	test('a recipe without slots is craftable at zero cost', () => {
		const recipe: Recipe = {
			product: { id: 8902, name: 'Distilled Essence' },
			slots: [],
			category: 'Alchemy',
			source: 'test',
		}
		const result = evaluateRecipe(recipe, { snapshot: snapshotOf({ 8902: { price: 40, stock: 1 } }), vendors: noVendors }, params())

		expect(result.craftable).toBe(true)
		expect(result.cost).toBe(0)
	})

	test('unpriced products sell for 0', () => {
		const snapshot = snapshotOf({ 200: { price: 50, stock: 5 } })
		const result = evaluateRecipe(breadRecipe(), { snapshot, vendors: noVendors }, params())

		expect(result.sellPrice).toBe(0)
		expect(result.profitPerCycle).toBe(-100)
	})

	test('processing uses the fixed multiplier regardless of mastery', () => {
		const result = evaluateRecipe(
			breadRecipe('Processing'),
			{ snapshot: breadMarket, vendors: noVendors },
			params({ mastery: 3000 })
		)

		expect(result.yieldMultiplier).toBe(2.5)
		expect(result.profitPerCycle).toBeCloseTo(500 * 2.5 * 0.845 - 100, 6)
	})

	test('uses a custom yield table when given', () => {
		const result = evaluateRecipe(
			breadRecipe(),
			{
				snapshot: breadMarket,
				vendors: noVendors,
				yieldTable: { Cooking: () => 1, Alchemy: () => 1, Processing: () => 1, Other: () => 1 },
				cyclesPerHour: 10,
			},
			params({ taxRate: 1 })
		)

		expect(result.profitPerCycle).toBe(400)
		expect(result.profitPerHour).toBe(4000)
	})

	test('recursive mode accepts an ingredient that can be crafted from stocked materials', () => {
		const flour: Recipe = {
			product: { id: 200, name: 'Flour' },
			slots: [{ options: [{ id: 300, name: 'Wheat' }], quantity: 5 }],
			category: 'Processing',
			source: 'test',
		}
		const snapshot = snapshotOf({
			100: { price: 500, stock: 0 },
			300: { price: 10, stock: 50 },
		})
		const p = params({ recursive: true, maxDepth: 2 })
		const resolver = new AvailabilityResolver([breadRecipe(), flour], snapshot, noVendors, p)

		const flat = evaluateRecipe(breadRecipe(), { snapshot, vendors: noVendors }, { ...p, recursive: false })
		const recursive = evaluateRecipe(breadRecipe(), { snapshot, vendors: noVendors, resolver }, p)

		expect(flat.craftable).toBe(false)
		expect(recursive.craftable).toBe(true)
		// flour has no market price, so it adds nothing to the cost
		expect(recursive.cost).toBe(0)
	})
})

describe('masteryYield', () => {
	test('grows with mastery and stops at the cap', () => {
		expect(masteryYield(0)).toBeCloseTo(2.35, 10)
		expect(masteryYield(2000)).toBeCloseTo(2.5, 10)
		expect(masteryYield(YIELD_POLICY.masteryCap)).toBeCloseTo(2.65, 10)
		expect(masteryYield(YIELD_POLICY.masteryCap * 2)).toBeCloseTo(2.65, 10)
		expect(masteryYield(1000)).toBeGreaterThan(masteryYield(500))
	})
})

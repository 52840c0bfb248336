import { describe, test, expect } from 'vitest'
import { rankRecipes, toRankedRow } from './ranking-aggregator'
import { normalizeCategory } from './catalog-normalizer'
import { createVendorCatalog } from '../constants/vendor-items'
import type { MarketEntry, Recipe, ScanParameters, YieldTable } from '../types'

// ============================================================================
// HELPERS
// ============================================================================

const vendors = createVendorCatalog([{ id: 9059, name: 'Mineral Water', cost: 30 }])

// Yield 1 everywhere and one cycle per hour keeps the arithmetic readable
const flatYield: YieldTable = { Cooking: () => 1, Alchemy: () => 1, Processing: () => 1, Other: () => 1 }
const options = { vendors, yieldTable: flatYield, cyclesPerHour: 1 }

function params(overrides: Partial<ScanParameters> = {}): ScanParameters {
	return {
		mastery: 0,
		taxRate: 1,
		minStock: 1,
		maxDepth: 3,
		requireStock: false,
		recursive: false,
		...overrides,
	}
}

function recipe(productId: number, name: string, slots: Array<[number[], number]>): Recipe {
	return {
		product: { id: productId, name },
		slots: slots.map(([ids, quantity]) => ({
			options: ids.map((id) => ({ id, name: `Item ${id}` })),
			quantity,
		})),
		category: 'Cooking',
		source: 'test',
	}
}

function snapshotOf(entries: Record<number, MarketEntry>): Map<number, MarketEntry> {
	return new Map(Object.entries(entries).map(([id, entry]) => [Number(id), entry]))
}

const catalog: Recipe[] = [
	recipe(1, 'Beer', [[[10], 2], [[9059], 1]]), // 100 - (2*10 + 30) = 50
	recipe(2, 'Cheese', [[[11], 1]]), // 300 - 100 = 200, but 11 has no stock
	recipe(3, 'Stew', [[[10], 1]]), // 60 - 10 = 50, ties with beer
	recipe(4, 'Unpriced', [[[10], 1]]),
	recipe(5, 'Bread', [[[10], 1]]), // 400 - 10 = 390
]

const market = snapshotOf({
	1: { price: 100, stock: 10 },
	2: { price: 300, stock: 10 },
	3: { price: 60, stock: 10 },
	5: { price: 400, stock: 10 },
	10: { price: 10, stock: 50 },
	11: { price: 100, stock: 0 },
})

// ============================================================================
// TESTS
// ============================================================================

describe('rankRecipes', () => {
	test('sorts by hourly profit and keeps uncraftable recipes flagged', () => {
		const result = rankRecipes(catalog, market, params(), options)

		expect(result.rows.map((row) => row.name)).toEqual(['Bread', 'Cheese', 'Beer', 'Stew'])
		expect(result.rows[1]).toEqual({
			productId: 2,
			name: 'Cheese',
			category: 'Cooking',
			craftable: false,
			cost: 0,
			sellPrice: 300,
			profitPerHour: 300,
			missing: 'Item 11',
		})
		expect(result.evaluated).toBe(5)
		expect(result.excludedUnsellable).toBe(1)
		expect(result.excludedUncraftable).toBe(0)
		expect(result.empty).toBe(false)
	})

	test('drops uncraftable recipes when all ingredients must be in stock', () => {
		const result = rankRecipes(catalog, market, params({ requireStock: true }), options)

		expect(result.rows.map((row) => row.name)).toEqual(['Bread', 'Beer', 'Stew'])
		expect(result.excludedUncraftable).toBe(1)
	})

	test('ties keep catalog order', () => {
		const result = rankRecipes(catalog, market, params({ requireStock: true }), options)

		expect(result.rows[1]).toMatchObject({ name: 'Beer', profitPerHour: 50 })
		expect(result.rows[2]).toMatchObject({ name: 'Stew', profitPerHour: 50 })
	})

	test('never ranks recipes without a sell price', () => {
		const result = rankRecipes(catalog, market, params(), options)

		expect(result.rows.some((row) => row.sellPrice === 0)).toBe(false)
		expect(result.rows.find((row) => row.productId === 4)).toBeUndefined()
	})

	test('product ids shared across categories are ranked separately', () => {
		const cooking = recipe(1, 'Beer', [[[10], 1]])
		const processing: Recipe = { ...recipe(1, 'Beer', [[[10], 3]]), category: 'Processing', source: 'p' }

		const result = rankRecipes([cooking, processing], market, params(), options)

		expect(result.rows.map((row) => [row.category, row.profitPerHour])).toEqual([
			['Cooking', 90],
			['Processing', 70],
		])
	})

	test('an ingredient group with no options keeps the recipe out when stock is required', () => {
		const { recipes } = normalizeCategory('recipesCooking.json', {
			recipes: [
				{
					product: { id: 1, name: 'Beer' },
					ingredients: [{ item: [], amount: 2 }, { item: [{ id: 10, name: 'Meat' }] }],
				},
			],
		})

		const strict = rankRecipes(recipes, market, params({ requireStock: true }), options)
		const flagged = rankRecipes(recipes, market, params(), options)

		expect(strict.rows).toEqual([])
		expect(strict.excludedUncraftable).toBe(1)
		expect(flagged.rows.map((row) => [row.craftable, row.cost, row.missing])).toEqual([[false, 10, '?']])
	})

	test('is repeatable for the same inputs', () => {
		const first = rankRecipes(catalog, market, params(), options)
		const second = rankRecipes(catalog, market, params(), options)

		expect(second).toEqual(first)
	})

	test('recursive mode lets a craftable ingredient satisfy a slot', () => {
		const recipes = [recipe(2, 'Cheese', [[[11], 1]]), recipe(11, 'Milk', [[[10], 1]])]

		const flat = rankRecipes(recipes, market, params({ requireStock: true }), options)
		const recursive = rankRecipes(recipes, market, params({ requireStock: true, recursive: true }), options)

		// Milk is sellable too: 100 - 10
		expect(flat.rows.map((row) => row.name)).toEqual(['Milk'])
		expect(recursive.rows.map((row) => [row.name, row.craftable, row.cost])).toEqual([
			['Cheese', true, 100],
			['Milk', true, 10],
		])
	})

	test('signals nothing to show for an empty catalog or snapshot', () => {
		expect(rankRecipes([], market, params(), options)).toEqual({
			rows: [],
			evaluated: 0,
			excludedUnsellable: 0,
			excludedUncraftable: 0,
			empty: true,
		})
		expect(rankRecipes(catalog, new Map(), params(), options).empty).toBe(true)
	})
})

describe('toRankedRow', () => {
	test('truncates money values toward zero', () => {
		const row = toRankedRow({
			recipe: recipe(7, 'Tea', []),
			craftable: true,
			cost: 10.9,
			sellPrice: 99.5,
			yieldMultiplier: 1,
			profitPerCycle: -1.5,
			profitPerHour: -1350.7,
		})

		expect(row).toEqual({
			productId: 7,
			name: 'Tea',
			category: 'Cooking',
			craftable: true,
			cost: 10,
			sellPrice: 99,
			profitPerHour: -1350,
			missing: undefined,
		})
	})
})

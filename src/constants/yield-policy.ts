import type { RecipeCategory, YieldFunction, YieldTable } from '../types'

// Game-balance values; tune here rather than in the evaluator
export const YIELD_POLICY = {
	processingMultiplier: 2.5,
	baseMultiplier: 1.0,
	masteryFlatBonus: 1.35,
	masteryScale: 0.3,
	masteryDivisor: 4000,
	// Mastery beyond this no longer raises the multiplier
	masteryCap: 4000,
}

export const DEFAULT_TAX_RATE = 0.845

// One crafting action every 4 seconds
export const CYCLES_PER_HOUR = 900

export function masteryYield(mastery: number): number {
	const effective = Math.min(Math.max(mastery, 0), YIELD_POLICY.masteryCap)
	return (
		YIELD_POLICY.baseMultiplier +
		(effective / YIELD_POLICY.masteryDivisor) * YIELD_POLICY.masteryScale +
		YIELD_POLICY.masteryFlatBonus
	)
}

const processingYield: YieldFunction = () => YIELD_POLICY.processingMultiplier

export const DEFAULT_YIELD_TABLE: YieldTable = {
	Processing: processingYield,
	Cooking: masteryYield,
	Alchemy: masteryYield,
	Other: masteryYield,
}

export function yieldFor(category: RecipeCategory, mastery: number, table: YieldTable = DEFAULT_YIELD_TABLE): number {
	return table[category](mastery)
}

import type { Region } from '../types'

export const REGIONS: readonly Region[] = ['NA', 'EU', 'SEA', 'KR', 'SA', 'RU', 'JP']

export const ARSHA_BASE_URL = 'https://api.arsha.io/v2'

// Ids that make the price endpoint fail the whole batch they appear in
export const BLACKLISTED_IDS: ReadonlySet<number> = new Set([
	5600, 9059, 9001, 9002, 9005, 9017, 9066, 9016, 9015, 9018, 6656, 6655,
])

// Beer: cheap, always listed, used to check the endpoint answers at all
export const PROBE_ITEM_ID = 9213

/**
 * Parse a region from user input or the environment, case-insensitively.
 */
export function parseRegion(value: string | undefined): Region | null {
	if (!value) return null
	const upper = value.trim().toUpperCase()
	return REGIONS.find((region) => region === upper) ?? null
}

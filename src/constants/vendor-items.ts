import vendorData from './vendor-items.json' with { type: 'json' }
import type { VendorCatalog } from '../types'

export interface VendorItem {
	id: number
	name: string
	cost?: number
}

/**
 * Build a vendor lookup. Vendor items are never priced from the market and
 * always count as available at their listed cost (0 when none is listed).
 */
export function createVendorCatalog(items: VendorItem[]): VendorCatalog {
	const costs = new Map<number, number>()
	for (const item of items) {
		costs.set(item.id, item.cost ?? 0)
	}

	return {
		isVendorItem: (itemId) => costs.has(itemId),
		nominalCost: (itemId) => costs.get(itemId) ?? 0,
	}
}

export const VENDOR_ITEMS: VendorItem[] = vendorData.items

export const DEFAULT_VENDOR_CATALOG = createVendorCatalog(VENDOR_ITEMS)

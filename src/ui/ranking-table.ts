import type { RankedRow } from '../types'
import { formatSilver, renderTable, type Column } from './table'

export const RANKING_COLUMNS: Column[] = [
	{ header: '#', width: 4, align: 'right' },
	{ header: 'Item', width: 30 },
	{ header: 'Category', width: 11 },
	{ header: 'Stock', width: 6, align: 'center' },
	{ header: 'Cost', width: 12, align: 'right' },
	{ header: 'Price', width: 12, align: 'right' },
	{ header: 'Profit/Hr', width: 11, align: 'right' },
	{ header: 'Missing', width: 24 },
]

function formatInt(value: number): string {
	return value.toLocaleString('en-US')
}

export function rankingRowCells(row: RankedRow, rank: number): string[] {
	return [
		String(rank),
		row.name,
		row.category,
		row.craftable ? '✅' : '❌',
		formatInt(row.cost),
		formatInt(row.sellPrice),
		formatSilver(row.profitPerHour),
		row.missing ?? '',
	]
}

/**
 * Render the top `limit` rows of a ranking
 */
export function renderRanking(rows: RankedRow[], limit: number = rows.length): string {
	const cells = rows.slice(0, limit).map((row, index) => rankingRowCells(row, index + 1))
	return renderTable({ columns: RANKING_COLUMNS, borderStyle: 'single' }, cells)
}

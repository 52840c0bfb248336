/**
 * UI Module Index
 *
 * Re-exports all UI utilities
 */

export {
	renderTable,
	padCell,
	formatSilver,
	formatAge,
	type Align,
	type BorderStyle,
	type Column,
	type TableOptions,
} from './table'
export { renderRanking, RANKING_COLUMNS } from './ranking-table'

/**
 * Box-drawn table formatting for CLI output
 */

// ============================================================================
// TYPES
// ============================================================================

export type Align = 'left' | 'right' | 'center'

export type BorderStyle = 'single' | 'double' | 'none'

export interface Column {
	header: string
	width: number
	align?: Align
}

export interface TableOptions {
	columns: Column[]
	borderStyle?: BorderStyle
}

interface BorderChars {
	horizontal: string
	vertical: string
	top: [string, string, string] | null // left, mid, right
	mid: [string, string, string]
	bottom: [string, string, string] | null
}

const BORDERS: Record<BorderStyle, BorderChars> = {
	single: {
		horizontal: '─',
		vertical: '│',
		top: ['┌', '┬', '┐'],
		mid: ['├', '┼', '┤'],
		bottom: ['└', '┴', '┘'],
	},
	double: {
		horizontal: '═',
		vertical: '║',
		top: ['╔', '╦', '╗'],
		mid: ['╠', '╬', '╣'],
		bottom: ['╚', '╩', '╝'],
	},
	none: {
		horizontal: ' ',
		vertical: ' ',
		top: null,
		mid: ['', ' ', ''],
		bottom: null,
	},
}

// ============================================================================
// TABLE RENDERING
// ============================================================================

/**
 * Render a table with the given columns and rows. Cells wider than their column are cut with "…".
 */
export function renderTable(options: TableOptions, rows: string[][]): string {
	const { columns, borderStyle = 'single' } = options
	const chars = BORDERS[borderStyle]
	const lines: string[] = []

	const rule = ([left, mid, right]: [string, string, string]) =>
		left + columns.map((col) => chars.horizontal.repeat(col.width)).join(mid) + right

	const line = (cells: string[]) =>
		chars.vertical +
		columns.map((col, i) => padCell(cells[i] ?? '', col.width, col.align ?? 'left')).join(chars.vertical) +
		chars.vertical

	if (chars.top) lines.push(rule(chars.top))
	lines.push(line(columns.map((col) => col.header)))
	lines.push(rule(chars.mid))
	for (const row of rows) {
		lines.push(line(row))
	}
	if (chars.bottom) lines.push(rule(chars.bottom))

	return lines.join('\n')
}

export function padCell(text: string, width: number, align: Align): string {
	const truncated = text.length > width ? text.slice(0, width - 1) + '…' : text

	switch (align) {
		case 'right':
			return truncated.padStart(width)
		case 'center': {
			const leftPad = Math.floor((width - truncated.length) / 2)
			return truncated.padStart(leftPad + truncated.length).padEnd(width)
		}
		case 'left':
		default:
			return truncated.padEnd(width)
	}
}

// ============================================================================
// FORMATTING HELPERS
// ============================================================================

/**
 * Format an amount of silver with K/M/B suffixes, keeping the sign
 */
export function formatSilver(amount: number): string {
	const sign = amount < 0 ? '-' : ''
	const abs = Math.abs(amount)
	if (abs >= 1_000_000_000) return sign + (abs / 1_000_000_000).toFixed(2) + 'B'
	if (abs >= 1_000_000) return sign + (abs / 1_000_000).toFixed(1) + 'M'
	if (abs >= 1_000) return sign + (abs / 1_000).toFixed(1) + 'K'
	return sign + String(Math.trunc(abs))
}

/**
 * Format data age in minutes/hours/days
 */
export function formatAge(minutes: number): string {
	if (minutes < 60) return `${minutes}m`
	const hours = Math.floor(minutes / 60)
	if (hours >= 48) return `${Math.floor(hours / 24)}d`
	const mins = minutes % 60
	if (mins === 0) return `${hours}h`
	return `${hours}h${mins}m`
}

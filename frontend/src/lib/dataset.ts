// dataset.ts — one-time CSV load plus normalization into an immutable, queryable table

import Papa from 'papaparse'
import { DATA_URL, DEBUG_MODE } from '../config'
import { deriveCategory, groupCodeOf } from './categories'
import { SourceUnavailable } from './errors'
import { NUTRIENT_KEYS } from './nutrients'

export type CellValue = string | number | null | undefined
export type RawRow = Readonly<Record<string, CellValue>>

export interface FoodRecord {
  readonly code: string
  readonly name: string
  readonly scie: string
  readonly regn: string
  readonly groupCode: string
  readonly group: string
  /** Every numeric column of the source plus every known nutrient key; never missing */
  readonly nutrients: Readonly<Record<string, number>>
}

export interface Dataset {
  /** Where the table came from (URL or a caller-chosen label) */
  readonly source: string
  /** Content hash of the source text; empty when built from rows in memory */
  readonly sourceId: string
  readonly columns: readonly string[]
  readonly records: readonly FoodRecord[]
}

export const TEXT_FIELDS = ['code', 'name', 'scie', 'regn'] as const

/**
 * Logs debug messages if DEBUG_MODE is enabled
 */
function log(...args: unknown[]): void {
  if (DEBUG_MODE) {
    console.log('[IFCT Dataset]', ...args)
  }
}

function isBlank(cell: CellValue): boolean {
  return cell === null || cell === undefined || (typeof cell === 'string' && cell.trim() === '')
}

function toNumber(cell: CellValue): number | undefined {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : undefined
  if (isBlank(cell) || typeof cell !== 'string') return undefined
  const n = Number(cell.trim())
  return Number.isFinite(n) ? n : undefined
}

function textOf(cell: CellValue): string {
  if (cell === null || cell === undefined) return ''
  return typeof cell === 'number' ? String(cell) : cell
}

const isTextField = (column: string) => (TEXT_FIELDS as readonly string[]).includes(column)

export function parseFoodCsv(text: string): RawRow[] {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
    transform: (value) => value.trim(),
  })
  if (result.errors.length) {
    log(`${result.errors.length} CSV parse issue(s), first:`, result.errors[0].message)
  }
  return result.data
}

/**
 * Columns whose every non-blank cell is a finite number. A column with no values
 * at all counts as numeric. Identity columns (code, name, scie, regn) never do.
 */
export function numericColumns(rows: readonly RawRow[]): string[] {
  const seen: string[] = []
  const rejected = new Set<string>()
  for (const row of rows) {
    for (const [column, cell] of Object.entries(row)) {
      if (column === '' || isTextField(column)) continue
      if (!seen.includes(column)) seen.push(column)
      if (!isBlank(cell) && toNumber(cell) === undefined) rejected.add(column)
    }
  }
  return seen.filter((c) => !rejected.has(c))
}

/**
 * Derives each record's category and fills every missing numeric value with 0.
 * Known nutrient keys are always present (0 when the source lacks the column, or
 * when a cell does not parse). Running it again on `records.map(toRow)` yields the same records.
 */
export function normalizeRows(
  rows: readonly RawRow[],
  meta: { source?: string; sourceId?: string } = {},
): Dataset {
  const extra = numericColumns(rows).filter((c) => !(NUTRIENT_KEYS as readonly string[]).includes(c))
  const nutrientColumns = [...NUTRIENT_KEYS, ...extra]

  const records = rows.map((row): FoodRecord => {
    const code = textOf(row.code)
    const nutrients: Record<string, number> = {}
    for (const key of nutrientColumns) nutrients[key] = toNumber(row[key]) ?? 0
    return Object.freeze({
      code,
      name: textOf(row.name),
      scie: textOf(row.scie),
      regn: textOf(row.regn),
      groupCode: groupCodeOf(code),
      group: deriveCategory(code),
      nutrients: Object.freeze(nutrients),
    })
  })

  return Object.freeze({
    source: meta.source ?? 'memory',
    sourceId: meta.sourceId ?? '',
    columns: Object.freeze([...TEXT_FIELDS, ...nutrientColumns]),
    records: Object.freeze(records),
  })
}

/** Flattens a record back to a source-shaped row (identity fields + nutrients). */
export function toRow(record: FoodRecord): RawRow {
  return {
    code: record.code,
    name: record.name,
    scie: record.scie,
    regn: record.regn,
    ...record.nutrients,
  }
}

export function emptyDataset(source: string): Dataset {
  return Object.freeze({ source, sourceId: '', columns: Object.freeze([]), records: Object.freeze([]) })
}

// FNV-1a 32-bit over UTF-16 code units, as hex
export function hashText(text: string): string {
  let h = 2166136261 >>> 0
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i)
    h = Math.imul(h, 16777619)
  }
  return (h >>> 0).toString(16).padStart(8, '0')
}

export function buildDataset(text: string, source: string): Dataset {
  const dataset = normalizeRows(parseFoodCsv(text), { source, sourceId: hashText(text) })
  log(`Normalized ${dataset.records.length} records from ${source} (${dataset.sourceId})`)
  return dataset
}

async function fetchText(url: string): Promise<string> {
  let res = await fetch(url, { cache: 'no-store' })
  if (!res.ok && url.startsWith('/')) {
    // Fallback to relative path in case the app is served under a sub-path
    res = await fetch(url.slice(1), { cache: 'no-store' })
  }
  if (!res.ok) throw new Error(`HTTP ${res.status}`)
  // Dev servers answer unknown paths with the SPA index page
  if ((res.headers.get('content-type') || '').includes('text/html')) {
    throw new Error('Received an HTML page instead of CSV')
  }
  return res.text()
}

const cache = new Map<string, Promise<Dataset>>()

/**
 * Loads and normalizes the dataset at `url`. The first call per URL reads the
 * source; later calls (including concurrent ones) share that result. A failed
 * load is not cached, so a retry reads again.
 */
export function loadDataset(url: string = DATA_URL): Promise<Dataset> {
  const hit = cache.get(url)
  if (hit) {
    log('Cache hit:', url)
    return hit
  }
  log('Cache miss, reading', url)
  const pending = (async () => {
    try {
      return buildDataset(await fetchText(url), url)
    } catch (err) {
      cache.delete(url)
      throw new SourceUnavailable(url, err)
    }
  })()
  cache.set(url, pending)
  return pending
}

/** Drops the cached dataset for `url` so the next load re-reads a changed source. */
export function invalidateDataset(url: string = DATA_URL): boolean {
  return cache.delete(url)
}

export function clearDatasetCache(): void {
  cache.clear()
}

export interface LoadResult {
  dataset: Dataset
  error: string | null
}

/** Boundary helper: an unavailable source becomes an empty dataset plus a notice. */
export async function loadDatasetOrEmpty(url: string = DATA_URL): Promise<LoadResult> {
  try {
    return { dataset: await loadDataset(url), error: null }
  } catch (err) {
    if (err instanceof SourceUnavailable) {
      console.error('[IFCT Dataset] Failed to load dataset:', err.cause ?? err)
      return { dataset: emptyDataset(url), error: err.message }
    }
    throw err
  }
}

export function exportCandidatesCsv(records: readonly FoodRecord[]): string {
  return Papa.unparse(records.map(toRow))
}

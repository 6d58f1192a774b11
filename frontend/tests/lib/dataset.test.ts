import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import {
  clearDatasetCache,
  emptyDataset,
  exportCandidatesCsv,
  hashText,
  invalidateDataset,
  loadDataset,
  loadDatasetOrEmpty,
  normalizeRows,
  numericColumns,
  parseFoodCsv,
  toRow,
} from '../../src/lib/dataset'
import { SourceUnavailable } from '../../src/lib/errors'
import { NUTRIENT_KEYS, energyDisplay } from '../../src/lib/nutrients'

const CSV = [
  'code,name,scie,regn,enerc,protcnt,moist,note',
  'P014,Rohu,Labeo rohita,Eastern India,97,16.9,76.2,fresh',
  'e052,Mango (ripe),Mangifera indica,North India,74,,,',
  '"A015","Rice, raw, milled",Oryza sativa,All India,356,7.94,9.9,',
].join('\n')

function csvResponse(text: string): Response {
  return new Response(text, { status: 200, headers: { 'content-type': 'text/csv' } })
}

describe('parseFoodCsv', () => {
  it('reads a header row and keeps quoted commas', () => {
    const rows = parseFoodCsv(CSV)
    expect(rows).toHaveLength(3)
    expect(rows[2].name).toBe('Rice, raw, milled')
    expect(rows[0].enerc).toBe('97')
  })

  it('trims headers and cells and skips blank lines', () => {
    const rows = parseFoodCsv(' code , name \n P014 , Rohu \n\n')
    expect(rows).toEqual([{ code: 'P014', name: 'Rohu' }])
  })
})

describe('numericColumns', () => {
  it('keeps columns whose non-blank cells all parse as numbers', () => {
    expect(numericColumns(parseFoodCsv(CSV))).toEqual(['enerc', 'protcnt', 'moist'])
  })

  it('treats an all-blank column as numeric and never the identity columns', () => {
    const rows = [{ code: '1', name: '2', scie: '', regn: '', empty: '' }]
    expect(numericColumns(rows)).toEqual(['empty'])
  })
})

describe('normalizeRows', () => {
  it('derives the category and formats energy for a known prefix', () => {
    const { records } = normalizeRows([{ code: 'P014', name: 'Rohu', enerc: 97, protcnt: 16.9 }])
    expect(records[0].group).toBe('Marine Fish')
    expect(records[0].groupCode).toBe('P')
    expect(records[0].nutrients.protcnt).toBe(16.9)
    expect(energyDisplay(records[0])).toBe('97 kcal')
  })

  it('normalizes every nutrient of an unmapped, empty row to 0', () => {
    const { records } = normalizeRows([{ code: 'Z999', name: 'Mystery Item' }])
    const [item] = records
    expect(item.group).toBe('Other')
    expect(item.scie).toBe('')
    expect(Object.keys(item.nutrients)).toEqual([...NUTRIENT_KEYS])
    expect(Object.values(item.nutrients).every((v) => v === 0)).toBe(true)
  })

  it('fills blanks in numeric columns with 0 and ignores non-numeric extras', () => {
    const dataset = normalizeRows(parseFoodCsv(CSV), { source: 'inline.csv' })
    const mango = dataset.records[1]
    expect(mango.group).toBe('Fruits')
    expect(mango.nutrients.protcnt).toBe(0)
    expect(mango.nutrients.moist).toBe(0)
    expect(dataset.records[0].nutrients.moist).toBe(76.2)
    expect('note' in mango.nutrients).toBe(false)
    expect(dataset.columns.slice(0, 5)).toEqual(['code', 'name', 'scie', 'regn', 'enerc'])
    expect(dataset.columns[dataset.columns.length - 1]).toBe('moist')
    expect(dataset.source).toBe('inline.csv')
  })

  it('maps unparsable cells of known nutrient columns to 0', () => {
    const { records } = normalizeRows(parseFoodCsv('code,name,vitc\nC010,Spinach,tr'))
    expect(records[0].nutrients.vitc).toBe(0)
  })

  it('keeps source order and produces frozen records', () => {
    const dataset = normalizeRows(parseFoodCsv(CSV))
    expect(dataset.records.map((r) => r.code)).toEqual(['P014', 'e052', 'A015'])
    expect(Object.isFrozen(dataset.records)).toBe(true)
    expect(Object.isFrozen(dataset.records[0])).toBe(true)
    expect(Object.isFrozen(dataset.records[0].nutrients)).toBe(true)
  })

  it('is idempotent', () => {
    const first = normalizeRows(parseFoodCsv(CSV))
    const second = normalizeRows(first.records.map(toRow))
    expect(second.records).toEqual(first.records)
    expect(second.columns).toEqual(first.columns)
  })
})

describe('hashText', () => {
  it('computes FNV-1a 32-bit as hex', () => {
    expect(hashText('')).toBe('811c9dc5')
    expect(hashText('a')).toBe('e40c292c')
  })
})

describe('exportCandidatesCsv', () => {
  it('writes identity fields then nutrients, readable by the loader', () => {
    const { records } = normalizeRows([{ code: 'P014', name: 'Rohu', enerc: 97 }])
    const csv = exportCandidatesCsv(records)
    const [header, line] = csv.split('\r\n')
    expect(header.split(',').slice(0, 6)).toEqual(['code', 'name', 'scie', 'regn', 'enerc', 'protcnt'])
    expect(line.startsWith('P014,Rohu,,,97,0,')).toBe(true)
    expect(normalizeRows(parseFoodCsv(csv)).records).toEqual(records)
  })
})

describe('loadDataset', () => {
  let fetchMock: Mock<(url: string, init?: RequestInit) => Promise<Response>>

  beforeEach(() => {
    clearDatasetCache()
    fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => csvResponse(CSV))
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('reads the source once and serves later calls from the cache', async () => {
    const first = await loadDataset('/foods.csv')
    const second = await loadDataset('/foods.csv')
    expect(second).toBe(first)
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(fetchMock).toHaveBeenCalledWith('/foods.csv', { cache: 'no-store' })
    expect(first.records).toHaveLength(3)
    expect(first.sourceId).toBe(hashText(CSV))
    expect(first.source).toBe('/foods.csv')
  })

  it('shares one read between concurrent callers', async () => {
    const [a, b] = await Promise.all([loadDataset('/foods.csv'), loadDataset('/foods.csv')])
    expect(a).toBe(b)
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('re-reads after invalidation', async () => {
    const first = await loadDataset('/foods.csv')
    fetchMock.mockImplementation(async () => csvResponse('code,name\nS003,Catla'))
    expect(invalidateDataset('/foods.csv')).toBe(true)
    const second = await loadDataset('/foods.csv')
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(second.sourceId).not.toBe(first.sourceId)
    expect(second.records.map((r) => r.group)).toEqual(['Freshwater Fish'])
  })

  it('falls back to the relative path when the absolute one fails', async () => {
    fetchMock.mockImplementation(async (url: string) =>
      url === 'foods.csv' ? csvResponse(CSV) : new Response('missing', { status: 404 }),
    )
    const dataset = await loadDataset('/foods.csv')
    expect(dataset.records).toHaveLength(3)
    expect(fetchMock).toHaveBeenNthCalledWith(1, '/foods.csv', { cache: 'no-store' })
    expect(fetchMock).toHaveBeenNthCalledWith(2, 'foods.csv', { cache: 'no-store' })
  })

  it('raises SourceUnavailable for a missing file and does not cache the failure', async () => {
    fetchMock.mockImplementation(async () => new Response('missing', { status: 404 }))
    await expect(loadDataset('/missing.csv')).rejects.toBeInstanceOf(SourceUnavailable)
    expect(fetchMock).toHaveBeenCalledTimes(2)
    await expect(loadDataset('/missing.csv')).rejects.toBeInstanceOf(SourceUnavailable)
    expect(fetchMock).toHaveBeenCalledTimes(4)
  })

  it('raises SourceUnavailable on network errors, keeping the cause', async () => {
    const failure = new TypeError('Failed to fetch')
    fetchMock.mockImplementation(async () => {
      throw failure
    })
    const error = await loadDataset('data.csv').catch((err: unknown) => err)
    expect(error).toBeInstanceOf(SourceUnavailable)
    expect(error instanceof SourceUnavailable && error.cause).toBe(failure)
    expect(error instanceof SourceUnavailable && error.code).toBe('SOURCE_UNAVAILABLE')
  })

  it('rejects an HTML page served in place of the CSV', async () => {
    fetchMock.mockImplementation(
      async () => new Response('<!doctype html><html></html>', { status: 200, headers: { 'content-type': 'text/html' } }),
    )
    await expect(loadDataset('/foods.csv')).rejects.toBeInstanceOf(SourceUnavailable)
  })
})

describe('loadDatasetOrEmpty', () => {
  beforeEach(() => {
    clearDatasetCache()
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('degrades to an empty dataset with a notice', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })))
    const result = await loadDatasetOrEmpty('/missing.csv')
    expect(result.dataset).toEqual(emptyDataset('/missing.csv'))
    expect(result.dataset.records).toHaveLength(0)
    expect(result.error).toBe("File '/missing.csv' not found. Please make sure it is served alongside the app.")
  })

  it('passes the dataset through when the source loads', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => csvResponse(CSV)))
    const result = await loadDatasetOrEmpty('/foods.csv')
    expect(result.error).toBeNull()
    expect(result.dataset.records).toHaveLength(3)
  })
})

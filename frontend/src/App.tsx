/*
  App.tsx — IFCT Explorer (React)

  Sidebar: category filter → food item picker, dataset caption, CSV export.
  Main: item header (scientific name, region, energy) and six tabs:
   - Macros: macro metric cards, protein/carbs/fat doughnut, carbohydrate breakdown table.
   - Minerals: macro minerals and trace elements bar charts.
   - Vitamins: water/fat soluble metrics (D, E and K shown as sums), B vitamin table.
   - Fats: fatty acid radar, cholesterol and omega-3.
   - Amino Acids: essential amino acid radar.
   - Bioactives: polyphenols, specific phenolics, anti-nutrients.

  Everything below the dataset is recomputed from the current selection; the dataset
  itself is loaded once and cached by lib/dataset.
*/
import React, { useMemo, useRef, useState } from 'react'
import { Bar, Doughnut, Radar } from 'react-chartjs-2'
import {
  Chart as ChartJS,
  CategoryScale,
  LinearScale,
  BarElement,
  PointElement,
  LineElement,
  ArcElement,
  RadialLinearScale,
  Filler,
  Tooltip,
  Legend,
} from 'chart.js'
import { ALL_CATEGORIES, APP_TITLE, DATA_URL, DEBUG_MODE, PALETTE } from './config'
import { barData, barOptions, doughnutOptions, pieData, radarData, radarOptions } from './lib/charts'
import {
  emptyDataset,
  exportCandidatesCsv,
  invalidateDataset,
  loadDatasetOrEmpty,
  type Dataset,
  type FoodRecord,
} from './lib/dataset'
import { SelectionNotFound } from './lib/errors'
import {
  GROUPINGS,
  energyDisplay,
  formatAmount,
  presentGrouping,
  type GroupingId,
  type PresentedField,
  type PresentedSection,
} from './lib/nutrients'
import { candidateSet, categoryOptions, itemOptions, reconcileSelection, resolveSelection } from './lib/selection'

ChartJS.register(CategoryScale, LinearScale, BarElement, PointElement, LineElement, ArcElement, RadialLinearScale, Filler, Tooltip, Legend)

function log(...args: unknown[]): void {
  if (DEBUG_MODE) {
    console.log('[IFCT Explorer]', ...args)
  }
}

export default function App() {
  const [dataset, setDataset] = useState<Dataset | null>(null)
  const [error, setError] = useState<string | null>(null)
  const [loading, setLoading] = useState<boolean>(true)
  const [filter, setFilter] = useState<string>(ALL_CATEGORIES)
  const [selectedItem, setSelectedItem] = useState<string | null>(null)
  const [activeTab, setActiveTab] = useState<GroupingId>('macros')

  async function loadData(reload = false) {
    setLoading(true)
    setError(null)
    if (reload) invalidateDataset(DATA_URL)
    try {
      const result = await loadDatasetOrEmpty(DATA_URL)
      setDataset(result.dataset)
      setError(result.error)
    } catch (err) {
      console.error('[IFCT Explorer] Unexpected load failure:', err)
      setDataset(emptyDataset(DATA_URL))
      setError(err instanceof Error ? err.message : String(err))
    } finally {
      setLoading(false)
    }
  }

  // Guard against React 18 StrictMode double-invoking effects in dev: load once.
  const didLoadRef = useRef(false)
  React.useEffect(() => {
    if (didLoadRef.current) return
    didLoadRef.current = true
    void loadData()
  }, [])

  const categories = useMemo(() => (dataset ? categoryOptions(dataset) : [ALL_CATEGORIES]), [dataset])
  const candidates = useMemo(() => (dataset ? candidateSet(dataset, filter) : []), [dataset, filter])
  const items = useMemo(() => itemOptions(candidates), [candidates])
  const currentItem = reconcileSelection(items, selectedItem)

  const record = useMemo<FoodRecord | null>(() => {
    if (!dataset || currentItem === null) return null
    try {
      return resolveSelection(dataset, filter, currentItem)
    } catch (err) {
      if (err instanceof SelectionNotFound) {
        log('Selection not in candidate set:', err.message)
        return null
      }
      throw err
    }
  }, [dataset, filter, currentItem])

  const grouping = useMemo(() => (record ? presentGrouping(record, activeTab) : null), [record, activeTab])

  function onExport() {
    const csv = exportCandidatesCsv(candidates)
    const slug = filter === ALL_CATEGORIES ? 'all' : filter.toLowerCase().replace(/[^a-z0-9]+/g, '-')
    downloadText(`ifct-${slug}.csv`, csv)
  }

  if (loading) {
    return (
      <div className="container">
        <div className="callout muted">Loading dataset…</div>
      </div>
    )
  }

  if (error) {
    return (
      <div className="container">
        <div className="callout error" role="alert">
          <div>{error}</div>
          <button className="primary" onClick={() => void loadData(true)} style={{ marginTop: '.5rem' }}>
            Retry Load Data
          </button>
        </div>
      </div>
    )
  }

  if (!dataset || !dataset.records.length) {
    return (
      <div className="container">
        <div className="callout muted">The dataset has no items.</div>
      </div>
    )
  }

  return (
    <div className="layout">
      <aside className="sidebar">
        <div className="title">🥗 {APP_TITLE}</div>
        <div className="muted">Loaded {dataset.records.length} items from database</div>
        <hr />
        <label htmlFor="group-filter">Filter by Group</label>
        <select
          id="group-filter"
          value={filter}
          onChange={(e) => setFilter(e.target.value)}
        >
          {categories.map((c) => (
            <option key={c} value={c}>{c}</option>
          ))}
        </select>
        <label htmlFor="item-select">Select Food Item</label>
        <select
          id="item-select"
          value={currentItem ?? ''}
          onChange={(e) => setSelectedItem(e.target.value)}
        >
          {items.map((n) => (
            <option key={n} value={n}>{n}</option>
          ))}
        </select>
        <button className="primary" onClick={onExport} disabled={!candidates.length}>
          Download {candidates.length} item{candidates.length === 1 ? '' : 's'} (CSV)
        </button>
        <hr />
        <div className="callout info">Displaying IFCT 2017 Standard Data per 100g edible portion.</div>
      </aside>

      <main className="container">
        {record && grouping && (
          <>
            <div className="item-header">
              <div>
                <h1 className="title">{record.name}</h1>
                <div className="muted">
                  <strong>Scientific Name:</strong> <em>{record.scie}</em> | <strong>Region:</strong> {record.regn}
                </div>
              </div>
              <Metric label="Energy" display={energyDisplay(record)} />
            </div>
            <hr />
            <div className="tabs" role="tablist">
              {GROUPINGS.map((g) => (
                <button
                  key={g.id}
                  role="tab"
                  aria-selected={activeTab === g.id}
                  onClick={() => setActiveTab(g.id)}
                  className={`tab-btn ${activeTab === g.id ? 'active' : ''}`}
                >
                  {g.icon} {g.label}
                </button>
              ))}
            </div>
            <div className="grid">
              {grouping.sections.map((s, i) => (
                <SectionView key={`${grouping.id}-${i}`} section={s} />
              ))}
            </div>
          </>
        )}
      </main>
    </div>
  )
}

function Metric({ label, display }: { label: string; display: string }) {
  return (
    <div className="metric">
      <div className="metric-label">{label}</div>
      <div className="metric-value">{display}</div>
    </div>
  )
}

function SectionView({ section }: { section: PresentedSection }) {
  const title = section.title ? <h4>{section.title}</h4> : null
  const color = section.colors?.[0] ?? PALETTE.gold
  return (
    <div className={`card ${section.span === 'full' ? 'span-full' : ''}`}>
      {title}
      {section.kind === 'metrics' && (
        <div className="metrics">
          {section.fields.map((f) => (
            <Metric key={f.label} label={f.label} display={f.display} />
          ))}
        </div>
      )}
      {section.kind === 'table' && <ValueTable fields={section.fields} valueHeader={section.valueHeader ?? 'Value'} />}
      {section.kind === 'list' && (
        <ul>
          {section.fields.map((f) => (
            <li key={f.label}>{f.label}: {f.display}</li>
          ))}
        </ul>
      )}
      {section.kind === 'pie' && (
        <div className="chart">
          <Doughnut data={pieData(section.fields, section.colors ?? [color])} options={doughnutOptions} />
        </div>
      )}
      {section.kind === 'bar' && (
        <div className="chart">
          <Bar data={barData(section.fields, section.title ?? '', color)} options={barOptions(section.fields[0]?.unit ?? '')} />
        </div>
      )}
      {section.kind === 'radar' && (
        <div className="chart">
          <Radar data={radarData(section.fields, section.title ?? '', color)} options={radarOptions} />
        </div>
      )}
    </div>
  )
}

function ValueTable({ fields, valueHeader }: { fields: readonly PresentedField[]; valueHeader: string }) {
  return (
    <table>
      <thead>
        <tr>
          <th>Component</th>
          <th>{valueHeader}</th>
        </tr>
      </thead>
      <tbody>
        {fields.map((f) => (
          <tr key={f.label}>
            <td>{f.label}</td>
            <td>{formatAmount(f.value)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  )
}

function downloadText(filename: string, text: string) {
  const blob = new Blob([text], { type: 'text/csv;charset=utf-8' })
  const url = URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  a.click()
  URL.revokeObjectURL(url)
}

/*
  nutrients.ts — nutrient field catalogue and the six tab groupings.

  Every grouping is a fixed list of sections; every section is a list of
  (label, field key(s), unit) triples. A triple with several keys is a composite
  (e.g. Vitamin D2+D3) and shows the sum of its source fields. Values are read
  straight from the normalized record: the loader already mapped missing values to 0.
*/
import { PALETTE } from '../config'
import type { FoodRecord } from './dataset'

export const NUTRIENT_KEYS = [
  'enerc',
  // macros
  'protcnt', 'choavldf', 'fatce', 'fibtg', 'starch', 'fsugar', 'fibsol', 'fibins',
  // minerals
  'ca', 'mg', 'p', 'na', 'k', 'fe', 'zn', 'cu', 'mn',
  // vitamins
  'vitc', 'folsum', 'thia', 'ribf', 'nia', 'pantac', 'vitb6c',
  'retol', 'ergcal', 'chocal', 'vite', 'tocpha', 'vitk1', 'vitk2',
  // fats
  'fasat', 'fams', 'fapu', 'cholc', 'ala',
  // amino acids
  'arg', 'his', 'ile', 'leu', 'lys', 'met', 'phe', 'thr', 'trp', 'val',
  // bioactives
  'polyph', 'gallac', 'querce', 'phytac', 'oxalt', 'sapon',
] as const

export type NutrientKey = (typeof NUTRIENT_KEYS)[number]

export type Unit = 'g' | 'mg' | 'µg' | 'kcal' | 'mg/g N'

export interface FieldSpec {
  label: string
  keys: readonly NutrientKey[]
  unit: Unit
}

export type SectionKind = 'metrics' | 'table' | 'list' | 'pie' | 'bar' | 'radar'

export interface SectionSpec {
  title?: string
  kind: SectionKind
  /** 'full' spans the tab width, 'half' takes one of two columns */
  span: 'full' | 'half'
  /** Header of the value column for tables */
  valueHeader?: string
  colors?: readonly string[]
  fields: readonly FieldSpec[]
}

export type GroupingId = 'macros' | 'minerals' | 'vitamins' | 'fats' | 'amino' | 'bioactives'

export interface GroupingSpec {
  id: GroupingId
  label: string
  icon: string
  sections: readonly SectionSpec[]
}

function field(label: string, key: NutrientKey | readonly NutrientKey[], unit: Unit): FieldSpec {
  return { label, keys: typeof key === 'string' ? [key] : key, unit }
}

export const GROUPINGS: readonly GroupingSpec[] = [
  {
    id: 'macros',
    label: 'Macros',
    icon: '🍽️',
    sections: [
      {
        kind: 'metrics',
        span: 'full',
        fields: [
          field('Protein', 'protcnt', 'g'),
          field('Carbs (Avail)', 'choavldf', 'g'),
          field('Total Fat', 'fatce', 'g'),
          field('Fiber', 'fibtg', 'g'),
        ],
      },
      {
        title: 'Macronutrient Split',
        kind: 'pie',
        span: 'half',
        colors: [PALETTE.protein, PALETTE.carbs, PALETTE.fat],
        fields: [field('Protein', 'protcnt', 'g'), field('Carbs', 'choavldf', 'g'), field('Fat', 'fatce', 'g')],
      },
      {
        title: 'Carbohydrate Breakdown',
        kind: 'table',
        span: 'half',
        valueHeader: 'Value (g)',
        fields: [
          field('Starch', 'starch', 'g'),
          field('Total Sugars', 'fsugar', 'g'),
          field('Soluble Fiber', 'fibsol', 'g'),
          field('Insoluble Fiber', 'fibins', 'g'),
        ],
      },
    ],
  },
  {
    id: 'minerals',
    label: 'Minerals',
    icon: '💎',
    sections: [
      {
        title: 'Macro Minerals (mg)',
        kind: 'bar',
        span: 'half',
        colors: [PALETTE.gold],
        fields: [
          field('Calcium', 'ca', 'mg'),
          field('Magnesium', 'mg', 'mg'),
          field('Phosphorus', 'p', 'mg'),
          field('Sodium', 'na', 'mg'),
          field('Potassium', 'k', 'mg'),
        ],
      },
      {
        title: 'Trace Elements (mg)',
        kind: 'bar',
        span: 'half',
        colors: [PALETTE.trace],
        fields: [
          field('Iron', 'fe', 'mg'),
          field('Zinc', 'zn', 'mg'),
          field('Copper', 'cu', 'mg'),
          field('Manganese', 'mn', 'mg'),
        ],
      },
    ],
  },
  {
    id: 'vitamins',
    label: 'Vitamins',
    icon: '💊',
    sections: [
      {
        title: 'Water Soluble',
        kind: 'metrics',
        span: 'half',
        fields: [field('Vitamin C', 'vitc', 'mg'), field('Total Folates', 'folsum', 'µg')],
      },
      {
        title: 'Fat Soluble',
        kind: 'metrics',
        span: 'half',
        fields: [
          field('Vitamin A (Retinol)', 'retol', 'µg'),
          field('Vitamin D2+D3', ['ergcal', 'chocal'], 'µg'),
          field('Vitamin E', ['vite', 'tocpha'], 'mg'),
          field('Vitamin K', ['vitk1', 'vitk2'], 'µg'),
        ],
      },
      {
        title: 'B Vitamins',
        kind: 'table',
        span: 'half',
        valueHeader: 'Value (mg)',
        fields: [
          field('Thiamin (B1)', 'thia', 'mg'),
          field('Riboflavin (B2)', 'ribf', 'mg'),
          field('Niacin (B3)', 'nia', 'mg'),
          field('Pantothenic (B5)', 'pantac', 'mg'),
          field('Vitamin B6', 'vitb6c', 'mg'),
        ],
      },
    ],
  },
  {
    id: 'fats',
    label: 'Fats',
    icon: '💧',
    sections: [
      {
        title: 'Fat Composition',
        kind: 'radar',
        span: 'half',
        colors: [PALETTE.coral],
        fields: [
          field('Saturated (SFA)', 'fasat', 'g'),
          field('Monounsat (MUFA)', 'fams', 'g'),
          field('Polyunsat (PUFA)', 'fapu', 'g'),
        ],
      },
      {
        title: 'Lipid Health',
        kind: 'metrics',
        span: 'half',
        fields: [field('Cholesterol', 'cholc', 'mg'), field('Omega-3 (Alpha-Linolenic)', 'ala', 'mg')],
      },
    ],
  },
  {
    id: 'amino',
    label: 'Amino Acids',
    icon: '🧬',
    sections: [
      {
        title: 'Essential Amino Acids (mg/g N)',
        kind: 'radar',
        span: 'full',
        colors: [PALETTE.lime],
        fields: [
          field('Arg', 'arg', 'mg/g N'),
          field('His', 'his', 'mg/g N'),
          field('Ile', 'ile', 'mg/g N'),
          field('Leu', 'leu', 'mg/g N'),
          field('Lys', 'lys', 'mg/g N'),
          field('Met', 'met', 'mg/g N'),
          field('Phe', 'phe', 'mg/g N'),
          field('Thr', 'thr', 'mg/g N'),
          field('Trp', 'trp', 'mg/g N'),
          field('Val', 'val', 'mg/g N'),
        ],
      },
    ],
  },
  {
    id: 'bioactives',
    label: 'Bioactives',
    icon: '🌿',
    sections: [
      {
        title: 'Polyphenols & Antioxidants',
        kind: 'metrics',
        span: 'half',
        fields: [field('Total Polyphenols', 'polyph', 'mg')],
      },
      {
        title: 'Anti-Nutrients',
        kind: 'metrics',
        span: 'half',
        fields: [field('Phytate', 'phytac', 'mg'), field('Total Oxalates', 'oxalt', 'mg'), field('Saponins', 'sapon', 'mg')],
      },
      {
        title: 'Specific Phenolics',
        kind: 'list',
        span: 'half',
        fields: [field('Gallic Acid', 'gallac', 'mg'), field('Quercetin', 'querce', 'mg')],
      },
    ],
  },
]

export interface PresentedField {
  label: string
  value: number
  unit: Unit
  display: string
}

export interface PresentedSection extends Omit<SectionSpec, 'fields'> {
  fields: PresentedField[]
}

export interface PresentedGrouping {
  id: GroupingId
  label: string
  icon: string
  sections: PresentedSection[]
}

// Display precision; stored values are never rounded
export function formatAmount(value: number): string {
  return String(Math.round(value * 1000) / 1000)
}

export function formatValue(value: number, unit: Unit): string {
  return `${formatAmount(value)} ${unit}`
}

export function fieldValue(record: FoodRecord, spec: FieldSpec): number {
  return spec.keys.reduce((sum, key) => sum + record.nutrients[key], 0)
}

/** Header metric: energy truncated to whole kcal */
export function energyDisplay(record: FoodRecord): string {
  return `${Math.trunc(record.nutrients.enerc)} kcal`
}

function presentField(record: FoodRecord, spec: FieldSpec): PresentedField {
  const value = fieldValue(record, spec)
  return { label: spec.label, value, unit: spec.unit, display: formatValue(value, spec.unit) }
}

export function presentGrouping(record: FoodRecord, id: GroupingId): PresentedGrouping {
  const spec = GROUPINGS.find((g) => g.id === id)
  if (!spec) throw new Error(`Unknown grouping: ${id}`)
  return {
    id: spec.id,
    label: spec.label,
    icon: spec.icon,
    sections: spec.sections.map(({ fields, ...section }) => ({
      ...section,
      fields: fields.map((f) => presentField(record, f)),
    })),
  }
}

export function presentRecord(record: FoodRecord): PresentedGrouping[] {
  return GROUPINGS.map((g) => presentGrouping(record, g.id))
}

// selection.ts — category filter, item options and single-record resolution

import { ALL_CATEGORIES } from '../config'
import type { Dataset, FoodRecord } from './dataset'
import { SelectionNotFound } from './errors'

/** "All" followed by every distinct category, alphabetically. */
export function categoryOptions(dataset: Dataset): string[] {
  const groups = Array.from(new Set(dataset.records.map((r) => r.group))).sort()
  return [ALL_CATEGORIES, ...groups]
}

export function candidateSet(dataset: Dataset, filter: string): readonly FoodRecord[] {
  if (filter === ALL_CATEGORIES) return dataset.records
  return dataset.records.filter((r) => r.group === filter)
}

/** Distinct names in first-seen order. */
export function itemOptions(candidates: readonly FoodRecord[]): string[] {
  return Array.from(new Set(candidates.map((r) => r.name)))
}

/**
 * Resolves `name` within the filtered candidates. Duplicate names resolve to the
 * first record in dataset order.
 */
export function resolveSelection(dataset: Dataset, filter: string, name: string): FoodRecord {
  const record = candidateSet(dataset, filter).find((r) => r.name === name)
  if (!record) throw new SelectionNotFound(name, filter)
  return record
}

/** Keeps the current item while it is still offered, else falls back to the first option. */
export function reconcileSelection(options: readonly string[], current: string | null): string | null {
  if (current !== null && options.includes(current)) return current
  return options.length ? options[0] : null
}

// categories.ts — IFCT food groups keyed by the first letter of the item code

export const CATEGORY_BY_CODE: Readonly<Record<string, string>> = Object.freeze({
  A: 'Cereals & Millets',
  B: 'Grain Legumes',
  C: 'Green Leafy Veg',
  D: 'Other Veg',
  E: 'Fruits',
  F: 'Roots & Tubers',
  G: 'Condiments & Spices',
  H: 'Nuts & Oil Seeds',
  I: 'Sugars',
  J: 'Mushrooms',
  K: 'Misc',
  L: 'Milk & Dairy',
  M: 'Egg Products',
  N: 'Poultry',
  O: 'Animal Meat',
  P: 'Marine Fish',
  Q: 'Marine Shellfish',
  R: 'Marine Mollusks',
  S: 'Freshwater Fish',
})

export const OTHER_CATEGORY = 'Other'

/** Uppercased first character of a code, e.g. 'a001' -> 'A'. Empty for an empty code. */
export function groupCodeOf(code: string): string {
  return code.charAt(0).toUpperCase()
}

export function deriveCategory(code: string): string {
  const key = groupCodeOf(code)
  return Object.prototype.hasOwnProperty.call(CATEGORY_BY_CODE, key) ? CATEGORY_BY_CODE[key] : OTHER_CATEGORY
}

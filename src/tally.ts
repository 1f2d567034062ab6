import type { Category } from './types.ts'

export type CategoryTally = ReadonlyMap<Category, number>

// Display order for run summaries
export const CATEGORY_ORDER: readonly Category[] = [
  'exact_match',
  'annotation_suffix',
  'extra_annotation',
  'base_match',
  'same_family_tiebreak',
  'auto_chromosome',
  'manual_override',
  'partial_overlap',
  'different',
  'new_unclassified',
  'old_unclassified',
  'old_only',
  'new_only',
]

export const REVIEW_CATEGORIES: ReadonlySet<Category> = new Set<Category>([
  'different',
  'partial_overlap',
  'new_unclassified',
])

export function emptyTally(): CategoryTally {
  return new Map()
}

export function tallyOf(categories: Iterable<Category>): CategoryTally {
  const tally = new Map<Category, number>()
  for (const category of categories) {
    tally.set(category, (tally.get(category) ?? 0) + 1)
  }
  return tally
}

// Per-category sum; commutative and associative with emptyTally() as identity
export function mergeTallies(a: CategoryTally, b: CategoryTally): CategoryTally {
  const merged = new Map(a)
  for (const [category, count] of b) {
    merged.set(category, (merged.get(category) ?? 0) + count)
  }
  return merged
}

export function tallyTotal(tally: CategoryTally) {
  let total = 0
  for (const count of tally.values()) {
    total += count
  }
  return total
}

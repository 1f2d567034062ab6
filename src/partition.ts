import { toError } from './errors.ts'

export interface KeyedFailure {
  key: string
  error: Error
}

export interface PartitionOutcome<R> {
  results: Map<string, R>
  failures: KeyedFailure[]
}

// Groups keep first-seen order
export function groupBy<T>(items: Iterable<T>, keyOf: (item: T) => string) {
  const groups = new Map<string, T[]>()
  for (const item of items) {
    const key = keyOf(item)
    const list = groups.get(key)
    if (list) {
      list.push(item)
    } else {
      groups.set(key, [item])
    }
  }
  return groups
}

// Runs fn once per key. Keys share nothing, so a key that throws is recorded
// and the remaining keys still run.
export function mapPartitions<T, R>(
  groups: ReadonlyMap<string, T[]>,
  fn: (key: string, items: T[]) => R,
): PartitionOutcome<R> {
  const results = new Map<string, R>()
  const failures: KeyedFailure[] = []

  for (const [key, items] of groups) {
    try {
      results.set(key, fn(key, items))
    } catch (e) {
      failures.push({ key, error: toError(e) })
    }
  }

  return { results, failures }
}

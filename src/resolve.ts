import type { ComparisonResult, FragmentKey, FragmentRecord } from './types.ts'
import type { CompareConfig } from './config.ts'
import { compareFragment } from './compare.ts'
import { fragmentKey, indexFragments } from './evidence.ts'
import { groupBy, mapPartitions, type KeyedFailure } from './partition.ts'
import {
  REVIEW_CATEGORIES,
  emptyTally,
  mergeTallies,
  tallyOf,
  type CategoryTally,
} from './tally.ts'

export interface ResolutionRun {
  rows: ComparisonResult[]
  tally: CategoryTally
  needsReview: ComparisonResult[]
  failures: KeyedFailure[]
}

function compareKeys(a: FragmentKey, b: FragmentKey) {
  if (a.assemblyId !== b.assemblyId) {
    return a.assemblyId < b.assemblyId ? -1 : 1
  }
  if (a.contigId !== b.contigId) {
    return a.contigId < b.contigId ? -1 : 1
  }
  return 0
}

export function resolveFragment(
  key: FragmentKey,
  oldRecord: FragmentRecord | undefined,
  newRecord: FragmentRecord | undefined,
  overrides: ReadonlyMap<string, string>,
  config: CompareConfig,
): ComparisonResult {
  const contigLength = newRecord?.length || oldRecord?.length || 0
  const { category, resolvedCall } = compareFragment(
    oldRecord?.call,
    newRecord?.call,
    {
      contigLength,
      autoChromosomeBp: config.autoChromosomeBp,
      override: overrides.get(fragmentKey(key)),
    },
  )
  return {
    assemblyId: key.assemblyId,
    contigId: key.contigId,
    contigLength,
    oldCall: oldRecord?.call ?? '',
    newCall: newRecord?.call ?? '',
    category,
    resolvedCall,
  }
}

// One row per fragment key present in either source, in (assembly, contig)
// order. Assemblies are resolved independently of one another.
export function resolveCalls(
  oldRecords: FragmentRecord[],
  newRecords: FragmentRecord[],
  overrides: ReadonlyMap<string, string>,
  config: CompareConfig,
): ResolutionRun {
  const oldByKey = indexFragments(oldRecords)
  const newByKey = indexFragments(newRecords)

  const keys = new Map<string, FragmentKey>()
  for (const r of [...oldRecords, ...newRecords]) {
    keys.set(fragmentKey(r), { assemblyId: r.assemblyId, contigId: r.contigId })
  }
  const sorted = [...keys.values()].sort(compareKeys)

  const { results, failures } = mapPartitions(
    groupBy(sorted, k => k.assemblyId),
    (_assemblyId, group) =>
      group.map(key =>
        resolveFragment(
          key,
          oldByKey.get(fragmentKey(key)),
          newByKey.get(fragmentKey(key)),
          overrides,
          config,
        ),
      ),
  )

  const rows = [...results.values()].flat()
  const tally = [...results.values()]
    .map(group => tallyOf(group.map(r => r.category)))
    .reduce(mergeTallies, emptyTally())

  return {
    rows,
    tally,
    needsReview: rows.filter(r => REVIEW_CATEGORIES.has(r.category)),
    failures,
  }
}

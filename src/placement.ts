import type {
  AssemblyPlacement,
  ChromosomeType,
  FragmentRecord,
  PlacementEntry,
  Topology,
  UnlocalisedEntry,
} from './types.ts'
import type { PlacementConfig } from './config.ts'
import { isEmptyCall } from './normalize.ts'
import { groupBy, mapPartitions, type KeyedFailure } from './partition.ts'

export type CompletenessThresholds = Pick<
  PlacementConfig,
  'refCov' | 'queryCov' | 'identity'
>

export function inferTopology(replicon: string): Topology {
  const name = replicon.trim().toLowerCase()
  if (name.startsWith('cp')) {
    return 'Circular'
  }
  // lp*, chromosome and anything unrecognised
  return 'Linear'
}

export function inferChromosomeType(replicon: string): ChromosomeType {
  return replicon.trim().toLowerCase() === 'chromosome'
    ? 'Chromosome'
    : 'Plasmid'
}

export function topologyType(replicon: string) {
  return `${inferTopology(replicon)}-${inferChromosomeType(replicon)}` as const
}

// 'chromosome' is reserved in the chromosome list and '+' is not allowed
export function sanitizeRepliconName(replicon: string) {
  const name = replicon.replace(/\+/g, '-')
  return name.toLowerCase() === 'chromosome' ? 'main' : name
}

// contig_1 [gcode=11] [topology=linear] -> contig_1
export function objectName(contigId: string) {
  return contigId.trim().split(/\s+/)[0] ?? ''
}

export function referenceCoverage(record: FragmentRecord) {
  const { refLength, refCoveredLength } = record
  if (refLength === undefined || refCoveredLength === undefined) {
    return undefined
  }
  return refLength > 0 ? refCoveredLength / refLength : undefined
}

export function passesCompleteness(
  record: FragmentRecord,
  thresholds: CompletenessThresholds,
) {
  const refCov = referenceCoverage(record)
  const queryCov = (record.queryCoveragePercent ?? 0) / 100
  const identity = (record.identityPercent ?? 0) / 100
  return (
    refCov !== undefined &&
    refCov >= thresholds.refCov &&
    queryCov >= thresholds.queryCov &&
    identity >= thresholds.identity
  )
}

function placementEntry(record: FragmentRecord, replicon: string): PlacementEntry {
  return {
    objectName: objectName(record.contigId),
    chromosomeName: sanitizeRepliconName(replicon),
    chromosomeType: topologyType(replicon),
  }
}

// Longest contig per replicon is the primary; the rest are unlocalised
export function placeClassified(
  assemblyId: string,
  records: FragmentRecord[],
): AssemblyPlacement {
  const byReplicon = new Map<string, FragmentRecord[]>()
  let unplaced = 0

  for (const record of records) {
    const call = record.call.trim()
    if (isEmptyCall(call)) {
      unplaced++
      continue
    }
    const list = byReplicon.get(call)
    if (list) {
      list.push(record)
    } else {
      byReplicon.set(call, [record])
    }
  }

  const placed: PlacementEntry[] = []
  const unlocalised: UnlocalisedEntry[] = []
  const groups = [...byReplicon].sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  )

  for (const [replicon, group] of groups) {
    const byLength = [...group].sort((a, b) => b.length - a.length)
    byLength.forEach((record, i) => {
      if (i === 0) {
        placed.push(placementEntry(record, replicon))
      } else {
        unlocalised.push({
          objectName: objectName(record.contigId),
          chromosomeName: sanitizeRepliconName(replicon),
        })
      }
    })
  }

  return { assemblyId, placed, unlocalised, unplaced }
}

// Every fragment stands on its own; there is no unlocalised tier
export function placeComplete(
  assemblyId: string,
  records: FragmentRecord[],
  thresholds: CompletenessThresholds,
): AssemblyPlacement {
  const placed: PlacementEntry[] = []
  let unplaced = 0

  for (const record of records) {
    const call = record.call.trim()
    if (!record.contigId.trim() || !call) {
      continue
    }
    if (passesCompleteness(record, thresholds)) {
      placed.push(placementEntry(record, call))
    } else {
      unplaced++
    }
  }

  return { assemblyId, placed, unlocalised: [], unplaced }
}

export function placeAssembly(
  assemblyId: string,
  records: FragmentRecord[],
  config: PlacementConfig,
) {
  return config.mode === 'classified'
    ? placeClassified(assemblyId, records)
    : placeComplete(assemblyId, records, config)
}

export interface PlacementRun {
  // every assembly, sorted by id
  placements: AssemblyPlacement[]
  // assemblies left at contig level because nothing could be placed
  withoutEntries: string[]
  failures: KeyedFailure[]
}

export function placeAssemblies(
  records: FragmentRecord[],
  config: PlacementConfig,
): PlacementRun {
  const groups = groupBy(
    records.filter(r => r.assemblyId !== ''),
    r => r.assemblyId,
  )
  const { results, failures } = mapPartitions(groups, (assemblyId, group) =>
    placeAssembly(assemblyId, group, config),
  )

  const placements: AssemblyPlacement[] = []
  const withoutEntries: string[] = []
  for (const assemblyId of [...results.keys()].sort()) {
    const placement = results.get(assemblyId)
    if (!placement) {
      continue
    }
    placements.push(placement)
    if (placement.placed.length === 0) {
      withoutEntries.push(assemblyId)
    }
  }

  return { placements, withoutEntries, failures }
}

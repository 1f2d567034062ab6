import type {
  AssemblyPlacement,
  ClusterAnnotation,
  ComparisonResult,
} from './types.ts'
import { formatCounts } from './consensus.ts'

export const COMPARISON_COLUMNS = [
  'assembly_id',
  'contig_id',
  'contig_len',
  'old_call',
  'new_call',
  'category',
  'resolved_call',
] as const

export const RESOLVED_COLUMNS = [
  'assembly_id',
  'contig_id',
  'resolved_call',
] as const

export const CLUSTER_COLUMNS = [
  'cluster_id',
  'name',
  'consensus_replicon',
  'top_replicon',
  'replicon_type',
  'top_replicon_type',
  'consensus_fraction',
  'n_isolates',
  'replicon_detail',
  'top_family',
  'n_families',
  'family_consensus_frac',
  'is_single_family',
  'cross_family_score',
  'family_detail',
] as const

function tsv(lines: Array<ReadonlyArray<string | number>>) {
  return lines.map(fields => fields.join('\t') + '\n').join('')
}

export function round3(x: number) {
  return Math.round(x * 1000) / 1000
}

export function formatComparisonTable(rows: ComparisonResult[]) {
  return tsv([
    COMPARISON_COLUMNS,
    ...rows.map(r => [
      r.assemblyId,
      r.contigId,
      r.contigLength,
      r.oldCall,
      r.newCall,
      r.category,
      r.resolvedCall,
    ]),
  ])
}

export function formatResolvedTable(rows: ComparisonResult[]) {
  return tsv([
    RESOLVED_COLUMNS,
    ...rows.map(r => [r.assemblyId, r.contigId, r.resolvedCall]),
  ])
}

// OBJECT_NAME CHROMOSOME_NAME CHROMOSOME_TYPE, no header
export function formatChromosomeList(placement: AssemblyPlacement) {
  return tsv(
    placement.placed.map(p => [p.objectName, p.chromosomeName, p.chromosomeType]),
  )
}

// OBJECT_NAME CHROMOSOME_NAME, no header
export function formatUnlocalisedList(placement: AssemblyPlacement) {
  return tsv(placement.unlocalised.map(u => [u.objectName, u.chromosomeName]))
}

export function chromosomeListFileName(assemblyId: string) {
  return `${assemblyId}.chromosome_list.tsv`
}

export function unlocalisedListFileName(assemblyId: string) {
  return `${assemblyId}.unlocalised_list.tsv`
}

export function clusterRow(a: ClusterAnnotation) {
  const { consensus, diversity } = a
  return [
    a.clusterId,
    a.name,
    consensus.consensusReplicon,
    consensus.topReplicon,
    a.repliconType,
    a.topRepliconType,
    round3(consensus.consensusFraction),
    consensus.nIsolates,
    formatCounts(consensus.counts),
    diversity.topFamily,
    diversity.nFamilies,
    round3(diversity.familyConsensusFraction),
    diversity.isSingleFamily ? 1 : 0,
    round3(diversity.crossFamilyScore),
    formatCounts(diversity.familyCounts),
  ]
}

export function formatClusterTable(annotations: ClusterAnnotation[]) {
  return tsv([CLUSTER_COLUMNS, ...annotations.map(clusterRow)])
}

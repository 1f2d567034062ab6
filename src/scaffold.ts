import type { ClusterAnnotation } from './types.ts'
import type { ConsensusConfig } from './config.ts'
import { annotateCluster, unmatchedCluster } from './consensus.ts'
import { groupBy, mapPartitions, type KeyedFailure } from './partition.ts'
import { hasColumn, requireColumns, type Table } from './table.ts'

// NZ_CP019844.1 Borreliella burgdorferi ... -> cp019844.1
const ACCESSION_IN_CONTIG = /([A-Z]{2}_)?([A-Z]{2}\d+\.\d+)/
const ACCESSION_REPLICON = /^[a-z]{2}\d{6}\.\d+$/

export const REFOUND_SCAFFOLD = 'refound'

export function buildAccessionLookup(table: Table) {
  requireColumns(table, ['contig_id', 'plasmid_name'])
  const lookup = new Map<string, string>()

  for (const row of table.rows) {
    const contigId = row['contig_id'] ?? ''
    const plasmidName = row['plasmid_name']?.trim() ?? ''
    if (!contigId || !plasmidName) {
      continue
    }
    const accession = ACCESSION_IN_CONTIG.exec(contigId)?.[2]?.toLowerCase()
    if (accession && !lookup.has(accession)) {
      lookup.set(accession, plasmidName.toLowerCase())
    }
  }

  return lookup
}

// B331P_lp54_contig_1 -> lp54
// B500_CP019844.1_contig_1 -> cp019844.1, then the accession lookup
export function parseRepliconFromScaffold(
  scaffoldName: string,
  accessions: ReadonlyMap<string, string> = new Map(),
) {
  const parts = scaffoldName.split('_')
  const contigIdx = parts.findIndex(p => p.toLowerCase() === 'contig')
  let replicon: string

  if (contigIdx >= 0) {
    if (contigIdx <= 1) {
      return 'unknown'
    }
    replicon = parts.slice(1, contigIdx).join('_').toLowerCase()
  } else {
    if (parts.length <= 1) {
      return 'unknown'
    }
    replicon = parts.slice(1).join('_').toLowerCase()
  }

  if (ACCESSION_REPLICON.test(replicon)) {
    return accessions.get(replicon) ?? replicon
  }
  return replicon
}

export interface ScaffoldLookup {
  // `${isolateIdx}_${scaffoldIdx}` -> replicon
  replicons: Map<string, string>
  skipped: number
}

// clustering_id is isolateIdx_scaffoldIdx_geneIdx
export function buildScaffoldLookup(
  table: Table,
  accessions: ReadonlyMap<string, string> = new Map(),
): ScaffoldLookup {
  requireColumns(table, ['scaffold_name', 'clustering_id'])
  const replicons = new Map<string, string>()
  let skipped = 0

  for (const row of table.rows) {
    const scaffold = row['scaffold_name']?.trim() ?? ''
    const clusteringId = row['clustering_id']?.trim() ?? ''
    if (!scaffold || !clusteringId) {
      skipped++
      continue
    }
    const parts = clusteringId.split('_')
    if (parts.length < 3) {
      skipped++
      continue
    }
    const key = `${parts[0]}_${parts[1]}`
    if (!replicons.has(key)) {
      replicons.set(key, parseRepliconFromScaffold(scaffold, accessions))
    }
  }

  return { replicons, skipped }
}

export interface ClusterCalls {
  calls: string[]
  refound: number
  unmatched: number
}

export function collectClusterCalls(
  geneIds: string[],
  scaffolds: ReadonlyMap<string, string>,
): ClusterCalls {
  const calls: string[] = []
  let refound = 0
  let unmatched = 0

  for (const geneId of geneIds) {
    const parts = geneId.trim().split('_')
    if (parts.length < 3) {
      unmatched++
      continue
    }
    if (parts[1] === REFOUND_SCAFFOLD) {
      refound++
      continue
    }
    const replicon = scaffolds.get(`${parts[0]}_${parts[1]}`)
    if (replicon === undefined) {
      unmatched++
    } else {
      calls.push(replicon)
    }
  }

  return { calls, refound, unmatched }
}

export interface ClusterRun {
  annotations: ClusterAnnotation[]
  refound: number
  partiallyMatched: number
  unmatchedClusters: number
  failures: KeyedFailure[]
}

// Cluster table: cluster_id, geneIDs (';' separated), optional name
export function annotateClusters(
  table: Table,
  scaffolds: ReadonlyMap<string, string>,
  config: ConsensusConfig,
): ClusterRun {
  requireColumns(table, ['cluster_id', 'geneIDs'])
  const withName = hasColumn(table, 'name')
  const rows = table.rows.filter(r => (r['cluster_id']?.trim() ?? '') !== '')

  const { results, failures } = mapPartitions(
    groupBy(rows, r => r['cluster_id']?.trim() ?? ''),
    (clusterId, group) => {
      const geneIds = group
        .flatMap(r => (r['geneIDs'] ?? '').split(';'))
        .filter(g => g.trim() !== '')
      const collected = collectClusterCalls(geneIds, scaffolds)
      const name = withName ? (group[0]?.['name']?.trim() ?? '') : ''
      return {
        collected,
        annotation:
          collected.calls.length === 0
            ? unmatchedCluster(clusterId, name)
            : annotateCluster(clusterId, collected.calls, config.threshold, name),
      }
    },
  )

  const run: ClusterRun = {
    annotations: [],
    refound: 0,
    partiallyMatched: 0,
    unmatchedClusters: 0,
    failures,
  }
  for (const { collected, annotation } of results.values()) {
    run.annotations.push(annotation)
    run.refound += collected.refound
    if (collected.calls.length === 0) {
      run.unmatchedClusters++
    } else if (collected.unmatched > 0) {
      run.partiallyMatched++
    }
  }
  return run
}

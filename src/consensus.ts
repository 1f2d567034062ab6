import type {
  ClusterAnnotation,
  ConsensusResult,
  DiversityResult,
  FamilyCount,
  RepliconCount,
} from './types.ts'
import { DEFAULT_CONSENSUS_THRESHOLD } from './config.ts'
import { classifyRepliconType, familyOf } from './family.ts'
import { normalizeCall } from './normalize.ts'

export const UNKNOWN = 'unknown'
export const MULTI_REPLICON = 'multi-replicon'
export const UNMATCHED = 'unmatched'

// Counts ordered by frequency; equal counts keep first-encountered order
function countOrdered(labels: string[]) {
  const counts = new Map<string, number>()
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1)
  }
  return [...counts].sort((a, b) => b[1] - a[1])
}

export function assignConsensus(
  calls: string[],
  threshold = DEFAULT_CONSENSUS_THRESHOLD,
): ConsensusResult {
  if (calls.length === 0) {
    return {
      consensusReplicon: UNKNOWN,
      topReplicon: UNKNOWN,
      consensusFraction: 0,
      nIsolates: 0,
      counts: [],
    }
  }

  const counts: RepliconCount[] = countOrdered(
    calls.map(c => normalizeCall(c) || UNKNOWN),
  ).map(([replicon, count]) => ({ replicon, count }))
  const top = counts[0]!
  const fraction = top.count / calls.length

  return {
    consensusReplicon: fraction >= threshold ? top.replicon : MULTI_REPLICON,
    topReplicon: top.replicon,
    consensusFraction: fraction,
    nIsolates: calls.length,
    counts,
  }
}

// Shannon entropy of the family distribution over log2(n_families): 0 for a
// single family, 1 for an even split
export function crossFamilyScore(familyCounts: FamilyCount[]) {
  const n = familyCounts.length
  if (n <= 1) {
    return 0
  }
  let total = 0
  for (const { count } of familyCounts) {
    total += count
  }
  let entropy = 0
  for (const { count } of familyCounts) {
    if (count > 0) {
      const p = count / total
      entropy -= p * Math.log2(p)
    }
  }
  // uniform splits can land a rounding step above 1
  return Math.min(1, entropy / Math.log2(n))
}

export function analyzeFamilyDiversity(calls: string[]): DiversityResult {
  if (calls.length === 0) {
    return {
      familyCounts: [],
      nFamilies: 0,
      topFamily: UNKNOWN,
      topFamilyCount: 0,
      familyConsensusFraction: 0,
      isSingleFamily: true,
      crossFamilyScore: 0,
    }
  }

  const familyCounts: FamilyCount[] = countOrdered(
    calls.map(c => familyOf(c) ?? UNKNOWN),
  ).map(([family, count]) => ({ family, count }))
  const top = familyCounts[0]!

  return {
    familyCounts,
    nFamilies: familyCounts.length,
    topFamily: top.family,
    topFamilyCount: top.count,
    familyConsensusFraction: top.count / calls.length,
    isSingleFamily: familyCounts.length <= 1,
    crossFamilyScore: crossFamilyScore(familyCounts),
  }
}

// cp32-3(49),cp32-10(5),lp56(2)
export function formatCounts(counts: Array<RepliconCount | FamilyCount>) {
  return counts
    .map(c => `${'replicon' in c ? c.replicon : c.family}(${c.count})`)
    .join(',')
}

// A cluster none of whose genes resolved to a scaffold
export function unmatchedCluster(clusterId: string, name = ''): ClusterAnnotation {
  return {
    clusterId,
    name,
    consensus: {
      consensusReplicon: UNMATCHED,
      topReplicon: UNMATCHED,
      consensusFraction: 0,
      nIsolates: 0,
      counts: [],
    },
    diversity: {
      familyCounts: [],
      nFamilies: 0,
      topFamily: UNMATCHED,
      topFamilyCount: 0,
      familyConsensusFraction: 0,
      isSingleFamily: true,
      crossFamilyScore: 0,
    },
    repliconType: classifyRepliconType(UNMATCHED),
    topRepliconType: classifyRepliconType(UNMATCHED),
  }
}

export function annotateCluster(
  clusterId: string,
  calls: string[],
  threshold = DEFAULT_CONSENSUS_THRESHOLD,
  name = '',
): ClusterAnnotation {
  const consensus = assignConsensus(calls, threshold)
  return {
    clusterId,
    name,
    consensus,
    diversity: analyzeFamilyDiversity(calls),
    repliconType: classifyRepliconType(consensus.consensusReplicon),
    topRepliconType: classifyRepliconType(consensus.topReplicon),
  }
}

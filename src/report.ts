import type { ClusterAnnotation, ComparisonResult } from './types.ts'
import type { PlacementRun } from './placement.ts'
import { MULTI_REPLICON, formatCounts } from './consensus.ts'
import { CATEGORY_ORDER, tallyTotal, type CategoryTally } from './tally.ts'

export const REVIEW_PREVIEW = 20

export function formatCategorySummary(tally: CategoryTally) {
  const lines = [
    `${'Category'.padEnd(25)} ${'Count'.padStart(6)}`,
    `${'-'.repeat(25)} ${'-'.repeat(6)}`,
  ]
  for (const category of CATEGORY_ORDER) {
    const count = tally.get(category) ?? 0
    if (count > 0) {
      lines.push(`  ${category.padEnd(23)} ${String(count).padStart(6)}`)
    }
  }
  lines.push(`${'-'.repeat(25)} ${'-'.repeat(6)}`)
  lines.push(`  ${'TOTAL'.padEnd(23)} ${String(tallyTotal(tally)).padStart(6)}`)
  return lines
}

export function formatReviewLine(r: ComparisonResult) {
  return `${r.assemblyId}/${r.contigId} (${r.contigLength}bp): '${r.oldCall}' -> '${r.newCall}' [${r.category}]`
}

export function formatReviewList(
  needsReview: ComparisonResult[],
  limit = REVIEW_PREVIEW,
) {
  if (needsReview.length === 0) {
    return []
  }
  const lines = [`${needsReview.length} contigs need manual review:`]
  for (const r of needsReview.slice(0, limit)) {
    lines.push(`  ${formatReviewLine(r)}`)
  }
  if (needsReview.length > limit) {
    lines.push(`  ... and ${needsReview.length - limit} more`)
  }
  return lines
}

export function summarizePlacements(run: PlacementRun) {
  let placed = 0
  let unlocalised = 0
  let unplaced = 0
  for (const p of run.placements) {
    placed += p.placed.length
    unlocalised += p.unlocalised.length
    unplaced += p.unplaced
  }
  return { placed, unlocalised, unplaced }
}

export function formatPlacementSummary(run: PlacementRun) {
  const { placed, unlocalised, unplaced } = summarizePlacements(run)
  const lines = [
    `Placed replicons (chromosome list): ${placed}`,
    `Unlocalised fragments: ${unlocalised}`,
    `Unplaced/unclassified: ${unplaced}`,
  ]
  if (run.withoutEntries.length > 0) {
    lines.push(
      `${run.withoutEntries.length} assemblies with no entries (left at contig level):`,
    )
    for (const assemblyId of run.withoutEntries) {
      lines.push(`  ${assemblyId}`)
    }
  }
  return lines
}

// Histogram of consensus calls, most common first
export function consensusDistribution(annotations: ClusterAnnotation[]) {
  const counts = new Map<string, number>()
  for (const a of annotations) {
    const key = a.consensus.consensusReplicon
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }
  return [...counts].sort((a, b) => b[1] - a[1])
}

export const MULTI_REPLICON_PREVIEW = 20
export const CROSS_FAMILY_PREVIEW = 15
export const HIGH_CROSS_FAMILY = 0.5

function clusterLabel(a: ClusterAnnotation) {
  return (a.name || a.clusterId).padEnd(30)
}

export function formatClusterSummary(annotations: ClusterAnnotation[]) {
  const lines = ['Replicon distribution:']
  for (const [replicon, count] of consensusDistribution(annotations)) {
    lines.push(`  ${replicon.padEnd(25)} ${String(count).padStart(6)} clusters`)
  }

  const multi = annotations.filter(
    a => a.consensus.consensusReplicon === MULTI_REPLICON,
  )
  if (multi.length > 0) {
    lines.push(`Multi-replicon clusters (${multi.length}):`)
    for (const a of multi.slice(0, MULTI_REPLICON_PREVIEW)) {
      lines.push(`  ${clusterLabel(a)} ${formatCounts(a.consensus.counts)}`)
    }
    if (multi.length > MULTI_REPLICON_PREVIEW) {
      lines.push(`  ... and ${multi.length - MULTI_REPLICON_PREVIEW} more`)
    }
  }

  const single = annotations.filter(a => a.diversity.isSingleFamily).length
  const cross = annotations.filter(a => a.diversity.nFamilies > 1).length
  lines.push(`Single-family clusters: ${single}`)
  lines.push(`Cross-family clusters: ${cross}`)

  const high = annotations
    .filter(a => a.diversity.crossFamilyScore > HIGH_CROSS_FAMILY)
    .sort((a, b) => b.diversity.crossFamilyScore - a.diversity.crossFamilyScore)
  if (high.length > 0) {
    lines.push(`High cross-family score clusters (>${HIGH_CROSS_FAMILY}): ${high.length}`)
    for (const a of high.slice(0, CROSS_FAMILY_PREVIEW)) {
      const score = a.diversity.crossFamilyScore.toFixed(2)
      lines.push(
        `  ${clusterLabel(a)} score=${score}  ${formatCounts(a.diversity.familyCounts)}`,
      )
    }
    if (high.length > CROSS_FAMILY_PREVIEW) {
      lines.push(`  ... and ${high.length - CROSS_FAMILY_PREVIEW} more`)
    }
  }
  return lines
}

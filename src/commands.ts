import { mkdirSync, writeFileSync } from 'fs'
import { join } from 'path'
import type { ComparisonResult } from './types.ts'
import type {
  CompareConfig,
  ConsensusConfig,
  PlacementConfig,
} from './config.ts'
import { loadFragments, loadOverrides } from './evidence.ts'
import { placeAssemblies } from './placement.ts'
import { resolveCalls } from './resolve.ts'
import {
  cachedHitReader,
  discoverHitSources,
  formatReview,
  selectForReview,
} from './review.ts'
import {
  formatCategorySummary,
  formatClusterSummary,
  formatPlacementSummary,
  formatReviewList,
} from './report.ts'
import {
  annotateClusters,
  buildAccessionLookup,
  buildScaffoldLookup,
} from './scaffold.ts'
import { readTableFile } from './table.ts'
import type { KeyedFailure } from './partition.ts'
import {
  chromosomeListFileName,
  formatChromosomeList,
  formatClusterTable,
  formatComparisonTable,
  formatResolvedTable,
  formatUnlocalisedList,
  unlocalisedListFileName,
} from './writers.ts'

export interface Logger {
  info: (message: string) => void
  warn: (message: string) => void
}

export const consoleLogger: Logger = {
  info: message => console.log(message),
  warn: message => console.warn(message),
}

function reportFailures(failures: KeyedFailure[], log: Logger) {
  for (const { key, error } of failures) {
    log.warn(`${key}: ${error.message}`)
  }
}

export interface CompareArgs {
  oldPath: string
  newPath: string
  output: string
  resolved?: string
  overrides?: string
  review?: ReviewArgs
}

export interface ReviewArgs {
  path: string
  allHitsDir: string
}

function writeReview(
  rows: ComparisonResult[],
  args: ReviewArgs,
  minBp: number,
  log: Logger,
) {
  const selected = selectForReview(rows, minBp)
  if (minBp > 0) {
    log.info(
      `  Review filter: ${rows.length - selected.length} contigs below ${minBp}bp skipped`,
    )
  }
  if (selected.length === 0) {
    log.info('  No contigs passed the --min-review-bp filter')
    return
  }
  const sources = discoverHitSources(args.allHitsDir)
  if (sources.length === 0) {
    log.warn(`No database tables found in ${args.allHitsDir}`)
    return
  }
  writeFileSync(args.path, formatReview(selected, sources, cachedHitReader()))
  log.info(`Wrote detailed review (${selected.length} contigs) -> ${args.path}`)
}

export function runCompare(
  args: CompareArgs,
  config: CompareConfig,
  log: Logger = consoleLogger,
) {
  const overrides = args.overrides
    ? loadOverrides(readTableFile(args.overrides))
    : new Map<string, string>()
  if (args.overrides) {
    log.info(`Loaded ${overrides.size} manual overrides from ${args.overrides}`)
  }

  const oldEvidence = loadFragments(readTableFile(args.oldPath), config.oldColumns)
  const newEvidence = loadFragments(readTableFile(args.newPath), config.newColumns)
  for (const warning of [...oldEvidence.warnings, ...newEvidence.warnings]) {
    log.warn(warning)
  }
  log.info(`Old calls: ${oldEvidence.records.length} contigs from ${args.oldPath}`)
  log.info(`New calls: ${newEvidence.records.length} contigs from ${args.newPath}`)

  const run = resolveCalls(
    oldEvidence.records,
    newEvidence.records,
    overrides,
    config,
  )
  reportFailures(run.failures, log)

  writeFileSync(args.output, formatComparisonTable(run.rows))
  if (args.resolved) {
    writeFileSync(args.resolved, formatResolvedTable(run.rows))
  }

  for (const line of formatCategorySummary(run.tally)) {
    log.info(line)
  }
  const auto = run.tally.get('auto_chromosome') ?? 0
  if (auto > 0) {
    log.info(
      `${auto} contigs auto-resolved via chromosome heuristic (>=${config.autoChromosomeBp}bp)`,
    )
  }
  const manual = run.tally.get('manual_override') ?? 0
  if (manual > 0) {
    log.info(`${manual} contigs resolved via manual overrides`)
  }
  for (const line of formatReviewList(run.needsReview)) {
    log.warn(line)
  }
  if (args.review && run.needsReview.length > 0) {
    writeReview(run.needsReview, args.review, config.minReviewBp, log)
  }
  log.info(`Wrote comparison -> ${args.output}`)
  if (args.resolved) {
    log.info(`Wrote resolved calls -> ${args.resolved}`)
  }

  return run
}

function listLines(text: string) {
  return text.split('\n').filter(line => line !== '')
}

export interface PlaceArgs {
  input: string
  outputDir: string
  dryRun?: boolean
}

export function runPlace(
  args: PlaceArgs,
  config: PlacementConfig,
  log: Logger = consoleLogger,
) {
  const evidence = loadFragments(readTableFile(args.input), config.columns)
  for (const warning of evidence.warnings) {
    log.warn(warning)
  }
  log.info(`Loaded ${evidence.records.length} rows from ${args.input}`)
  log.info(`Mode: ${config.mode}`)

  const run = placeAssemblies(evidence.records, config)
  reportFailures(run.failures, log)

  if (!args.dryRun) {
    mkdirSync(args.outputDir, { recursive: true })
  }
  for (const placement of run.placements) {
    if (placement.placed.length === 0) {
      continue
    }
    const { assemblyId, placed, unlocalised } = placement
    if (args.dryRun) {
      log.info(
        `[DRY RUN] ${assemblyId}: ${placed.length} placed, ${unlocalised.length} unlocalised`,
      )
      for (const line of listLines(formatChromosomeList(placement))) {
        log.info(`  [CHROM] ${line}`)
      }
      for (const line of listLines(formatUnlocalisedList(placement))) {
        log.info(`  [UNLOC] ${line}`)
      }
      continue
    }
    writeFileSync(
      join(args.outputDir, chromosomeListFileName(assemblyId)),
      formatChromosomeList(placement),
    )
    if (unlocalised.length > 0) {
      writeFileSync(
        join(args.outputDir, unlocalisedListFileName(assemblyId)),
        formatUnlocalisedList(placement),
      )
    }
    log.info(
      `[OK] ${assemblyId}: ${placed.length} placed, ${unlocalised.length} unlocalised`,
    )
  }

  for (const line of formatPlacementSummary(run)) {
    log.info(line)
  }
  return run
}

export interface ConsensusArgs {
  geneData: string
  clusters: string
  output: string
  bestHits?: string
}

export function runConsensus(
  args: ConsensusArgs,
  config: ConsensusConfig,
  log: Logger = consoleLogger,
) {
  const accessions = args.bestHits
    ? buildAccessionLookup(readTableFile(args.bestHits))
    : new Map<string, string>()
  if (args.bestHits) {
    log.info(`Built ${accessions.size} accession -> replicon mappings`)
  }

  const scaffolds = buildScaffoldLookup(
    readTableFile(args.geneData, 'sniff'),
    accessions,
  )
  log.info(
    `Built ${scaffolds.replicons.size} scaffold -> replicon mappings (${scaffolds.skipped} rows skipped)`,
  )

  const run = annotateClusters(
    readTableFile(args.clusters),
    scaffolds.replicons,
    config,
  )
  reportFailures(run.failures, log)
  writeFileSync(args.output, formatClusterTable(run.annotations))

  log.info(`Annotated ${run.annotations.length} clusters (threshold=${config.threshold})`)
  log.info(`Unmatched clusters: ${run.unmatchedClusters}`)
  log.info(`Partially matched clusters: ${run.partiallyMatched}`)
  log.info(`Refound genes skipped: ${run.refound}`)
  for (const line of formatClusterSummary(run.annotations)) {
    log.info(line)
  }
  log.info(`Wrote cluster annotations -> ${args.output}`)
  return run
}

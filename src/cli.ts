import { parseArgs } from 'node:util'
import {
  createCompareConfig,
  createConsensusConfig,
  createPlacementConfig,
  DEFAULT_CONSENSUS_THRESHOLD,
  DEFAULT_IDENTITY,
  DEFAULT_QUERY_COV,
  DEFAULT_REF_COV,
  parsePlacementMode,
} from './config.ts'
import { runCompare, runConsensus, runPlace } from './commands.ts'
import { TableError } from './errors.ts'

const ESC = '\x1b['
const RESET = `${ESC}0m`
const BOLD = `${ESC}1m`
const RED = `${ESC}31m`

function color(code: string, text: string) {
  return `${code}${text}${RESET}`
}

const argConfig = {
  options: {
    old: { type: 'string' as const },
    new: { type: 'string' as const },
    'old-contig-col': { type: 'string' as const },
    'new-contig-col': { type: 'string' as const },
    'old-call-col': { type: 'string' as const },
    'new-call-col': { type: 'string' as const },
    'old-assembly-col': { type: 'string' as const },
    'new-assembly-col': { type: 'string' as const },
    output: { type: 'string' as const, short: 'o' },
    resolved: { type: 'string' as const },
    overrides: { type: 'string' as const },
    review: { type: 'string' as const },
    'all-hits-dir': { type: 'string' as const },
    'min-review-bp': { type: 'string' as const },
    'auto-chromosome-bp': { type: 'string' as const },
    classifier: { type: 'string' as const },
    'output-dir': { type: 'string' as const },
    mode: { type: 'string' as const },
    'call-col': { type: 'string' as const },
    'ref-cov': { type: 'string' as const },
    'query-cov': { type: 'string' as const },
    identity: { type: 'string' as const },
    'dry-run': { type: 'boolean' as const, default: false },
    'gene-data': { type: 'string' as const },
    clusters: { type: 'string' as const },
    'best-hits': { type: 'string' as const },
    threshold: { type: 'string' as const },
    help: { type: 'boolean' as const, short: 'h', default: false },
  },
  allowPositionals: true,
  strict: true,
} as const

function printUsage() {
  console.log(`${BOLD}replicon-consensus${RESET} - resolve replicon calls

${BOLD}Usage:${RESET}
  replicon-consensus compare --old <file> --new <file> [options]
  replicon-consensus place --classifier <file> --output-dir <dir> [options]
  replicon-consensus consensus --gene-data <file> --clusters <file> [options]

${BOLD}compare:${RESET}
  --old-contig-col, --new-contig-col <col>     (default: contig_id)
  --old-call-col, --new-call-col <col>         (default: final_call)
  --old-assembly-col, --new-assembly-col <col> (default: assembly_id)
  -o, --output <file>        Comparison table (default: comparison.tsv)
  --resolved <file>          Resolved calls only
  --overrides <file>         Manual overrides (assembly_id, contig_id, resolved_call)
  --auto-chromosome-bp <n>   Auto-resolve chromosome calls at this length (default: 0, off)
  --review <file>            All classifier hits for each contig needing review
  --all-hits-dir <dir>       Classifier output with {db}/tables/*_all.tsv (needed by --review)
  --min-review-bp <n>        Only review contigs at least this long (default: 0)

${BOLD}place:${RESET}
  --mode <complete|classified>  (default: complete)
  --call-col <col>           (default: plasmid_name)
  --ref-cov <x>              (default: ${DEFAULT_REF_COV})
  --query-cov <x>            (default: ${DEFAULT_QUERY_COV})
  --identity <x>             (default: ${DEFAULT_IDENTITY})
  --dry-run                  Report without writing files

${BOLD}consensus:${RESET}
  --best-hits <file>         Accession -> replicon reference table
  --threshold <x>            Consensus threshold (default: ${DEFAULT_CONSENSUS_THRESHOLD})
  -o, --output <file>        Annotation table (default: replicon_summary.tsv)`)
}

function numberArg(value: string | undefined) {
  return value === undefined ? undefined : Number(value)
}

function fail(message: string): never {
  console.error(color(RED, `Error: ${message}`))
  printUsage()
  process.exit(1)
}

function main() {
  let parsed: ReturnType<typeof parseArgs<typeof argConfig>>
  try {
    parsed = parseArgs(argConfig)
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error))
  }

  const { values, positionals } = parsed
  const command = positionals[0]
  if (values.help || command === undefined) {
    printUsage()
    return
  }

  switch (command) {
    case 'compare': {
      if (!values.old || !values.new) {
        fail('--old and --new are required')
      }
      const allHitsDir = values['all-hits-dir']
      if (values.review && !allHitsDir) {
        fail('--review requires --all-hits-dir')
      }
      const config = createCompareConfig({
        oldColumns: {
          assembly: values['old-assembly-col'],
          contig: values['old-contig-col'],
          call: values['old-call-col'],
        },
        newColumns: {
          assembly: values['new-assembly-col'],
          contig: values['new-contig-col'],
          call: values['new-call-col'],
        },
        autoChromosomeBp: numberArg(values['auto-chromosome-bp']),
        minReviewBp: numberArg(values['min-review-bp']),
      })
      runCompare(
        {
          oldPath: values.old,
          newPath: values.new,
          output: values.output ?? 'comparison.tsv',
          resolved: values.resolved,
          overrides: values.overrides,
          review:
            values.review && allHitsDir
              ? { path: values.review, allHitsDir }
              : undefined,
        },
        config,
      )
      return
    }
    case 'place': {
      if (!values.classifier || !values['output-dir']) {
        fail('--classifier and --output-dir are required')
      }
      const config = createPlacementConfig({
        mode: parsePlacementMode(values.mode),
        columns: { call: values['call-col'] },
        refCov: numberArg(values['ref-cov']),
        queryCov: numberArg(values['query-cov']),
        identity: numberArg(values.identity),
      })
      runPlace(
        {
          input: values.classifier,
          outputDir: values['output-dir'],
          dryRun: values['dry-run'],
        },
        config,
      )
      return
    }
    case 'consensus': {
      if (!values['gene-data'] || !values.clusters) {
        fail('--gene-data and --clusters are required')
      }
      const config = createConsensusConfig({
        threshold: numberArg(values.threshold),
      })
      runConsensus(
        {
          geneData: values['gene-data'],
          clusters: values.clusters,
          output: values.output ?? 'replicon_summary.tsv',
          bestHits: values['best-hits'],
        },
        config,
      )
      return
    }
    default:
      fail(`unknown command '${command}'`)
  }
}

try {
  main()
} catch (error) {
  if (error instanceof TableError) {
    console.error(color(RED, `Error: ${error.message}`))
    process.exit(1)
  }
  throw error
}

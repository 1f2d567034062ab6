import { z } from 'zod'
import { SchemaValidationError } from './errors.ts'

export const DEFAULT_CONSENSUS_THRESHOLD = 0.9
export const DEFAULT_REF_COV = 0.95
export const DEFAULT_QUERY_COV = 0.9
export const DEFAULT_IDENTITY = 0.9

const fraction = z.number().min(0).max(1)

function columnsSchema(callColumn: string) {
  return z
    .object({
      assembly: z.string().min(1).default('assembly_id'),
      contig: z.string().min(1).default('contig_id'),
      call: z.string().min(1).default(callColumn),
      length: z.string().min(1).default('contig_len'),
    })
    .readonly()
    .default({})
}

export type Columns = z.infer<ReturnType<typeof columnsSchema>>

const CompareConfigSchema = z.object({
  oldColumns: columnsSchema('final_call'),
  newColumns: columnsSchema('final_call'),
  // 0 disables the auto-chromosome heuristics
  autoChromosomeBp: z.number().int().nonnegative().default(0),
  // only review rows at least this long go into the detailed review file
  minReviewBp: z.number().int().nonnegative().default(0),
}).readonly()

export type CompareConfig = z.infer<typeof CompareConfigSchema>

const PlacementModeSchema = z.enum(['complete', 'classified'])

const PlacementConfigSchema = z.object({
  mode: PlacementModeSchema.default('complete'),
  columns: columnsSchema('plasmid_name'),
  refCov: fraction.default(DEFAULT_REF_COV),
  queryCov: fraction.default(DEFAULT_QUERY_COV),
  identity: fraction.default(DEFAULT_IDENTITY),
}).readonly()

export type PlacementConfig = z.infer<typeof PlacementConfigSchema>

export type PlacementMode = z.infer<typeof PlacementModeSchema>

export function parsePlacementMode(value: string | undefined) {
  if (value === undefined) {
    return undefined
  }
  const result = PlacementModeSchema.safeParse(value)
  if (!result.success) {
    throw SchemaValidationError.fromZod('placement mode', result.error)
  }
  return result.data
}

const ConsensusConfigSchema = z.object({
  threshold: fraction.default(DEFAULT_CONSENSUS_THRESHOLD),
}).readonly()

export type ConsensusConfig = z.infer<typeof ConsensusConfigSchema>

// .readonly() schemas hand back frozen records, nested columns included
function build<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw SchemaValidationError.fromZod(what, result.error)
  }
  return result.data
}

export function createCompareConfig(
  input: z.input<typeof CompareConfigSchema> = {},
): CompareConfig {
  return build(CompareConfigSchema, input, 'compare config')
}

export function createPlacementConfig(
  input: z.input<typeof PlacementConfigSchema> = {},
): PlacementConfig {
  return build(PlacementConfigSchema, input, 'placement config')
}

export function createConsensusConfig(
  input: z.input<typeof ConsensusConfigSchema> = {},
): ConsensusConfig {
  return build(ConsensusConfigSchema, input, 'consensus config')
}

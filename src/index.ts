export type {
  AssemblyPlacement,
  Category,
  ChromosomeType,
  ClusterAnnotation,
  ComparisonResult,
  ConsensusResult,
  DiversityResult,
  FamilyCount,
  FragmentKey,
  FragmentRecord,
  PlacementEntry,
  RepliconCount,
  RepliconType,
  Topology,
  UnlocalisedEntry,
} from './types.ts'

export {
  COMPOUND_SEPARATOR,
  isEmptyCall,
  normalizeCall,
  splitCompound,
  stripSuffix,
} from './normalize.ts'
export { FAMILY_RULES, classifyRepliconType, familyOf } from './family.ts'
export type { FamilyRule } from './family.ts'
export {
  COMPARE_RULES,
  applyAutoChromosome,
  applyOverride,
  categorize,
  compareFragment,
} from './compare.ts'
export type { CallPair, Categorized, CompareOptions, CompareRule } from './compare.ts'
export {
  MULTI_REPLICON,
  UNKNOWN,
  UNMATCHED,
  analyzeFamilyDiversity,
  annotateCluster,
  assignConsensus,
  crossFamilyScore,
  formatCounts,
  unmatchedCluster,
} from './consensus.ts'
export {
  inferChromosomeType,
  inferTopology,
  objectName,
  passesCompleteness,
  placeAssemblies,
  placeAssembly,
  placeClassified,
  placeComplete,
  sanitizeRepliconName,
  topologyType,
} from './placement.ts'
export type { CompletenessThresholds, PlacementRun } from './placement.ts'
export { resolveCalls, resolveFragment } from './resolve.ts'
export type { ResolutionRun } from './resolve.ts'
export {
  CATEGORY_ORDER,
  REVIEW_CATEGORIES,
  emptyTally,
  mergeTallies,
  tallyOf,
  tallyTotal,
} from './tally.ts'
export type { CategoryTally } from './tally.ts'
export { groupBy, mapPartitions } from './partition.ts'
export type { KeyedFailure, PartitionOutcome } from './partition.ts'
export {
  delimiterFor,
  parseTable,
  readTableFile,
  requireColumns,
  splitLine,
} from './table.ts'
export type { Row, Table } from './table.ts'
export {
  fragmentKey,
  indexFragments,
  loadFragments,
  loadOverrides,
} from './evidence.ts'
export {
  annotateClusters,
  buildAccessionLookup,
  buildScaffoldLookup,
  collectClusterCalls,
  parseRepliconFromScaffold,
} from './scaffold.ts'
export {
  createCompareConfig,
  createConsensusConfig,
  createPlacementConfig,
  parsePlacementMode,
} from './config.ts'
export type {
  Columns,
  CompareConfig,
  ConsensusConfig,
  PlacementConfig,
  PlacementMode,
} from './config.ts'
export { MissingColumnError, SchemaValidationError, TableError } from './errors.ts'
export * from './writers.ts'
export { runCompare, runConsensus, runPlace } from './commands.ts'
export type { Logger, ReviewArgs } from './commands.ts'
export {
  cachedHitReader,
  discoverHitSources,
  formatReview,
  grepContig,
  readAllHits,
  selectForReview,
} from './review.ts'
export type { HitSource } from './review.ts'

export type Category =
  | 'exact_match'
  | 'new_unclassified'
  | 'old_unclassified'
  | 'annotation_suffix'
  | 'extra_annotation'
  | 'base_match'
  | 'partial_overlap'
  | 'same_family_tiebreak'
  | 'different'
  | 'auto_chromosome'
  | 'manual_override'
  | 'old_only'
  | 'new_only'

export interface FragmentKey {
  assemblyId: string
  contigId: string
}

export interface FragmentRecord extends FragmentKey {
  call: string
  // bp; 0 when absent or unparsable
  length: number
  refLength?: number
  refCoveredLength?: number
  queryCoveragePercent?: number
  identityPercent?: number
}

export interface ComparisonResult extends FragmentKey {
  contigLength: number
  oldCall: string
  newCall: string
  category: Category
  resolvedCall: string
}

export interface RepliconCount {
  replicon: string
  count: number
}

export interface ConsensusResult {
  consensusReplicon: string
  topReplicon: string
  consensusFraction: number
  nIsolates: number
  counts: RepliconCount[]
}

export interface FamilyCount {
  family: string
  count: number
}

export interface DiversityResult {
  familyCounts: FamilyCount[]
  nFamilies: number
  topFamily: string
  topFamilyCount: number
  familyConsensusFraction: number
  isSingleFamily: boolean
  crossFamilyScore: number
}

export type RepliconType =
  | 'multi-replicon'
  | 'chromosome'
  | 'circular_plasmid'
  | 'linear_plasmid'
  | 'unknown'
  | 'unmatched'
  | 'other'

export interface ClusterAnnotation {
  clusterId: string
  name: string
  consensus: ConsensusResult
  diversity: DiversityResult
  repliconType: RepliconType
  topRepliconType: RepliconType
}

export type Topology = 'Linear' | 'Circular'

export type ChromosomeType = 'Chromosome' | 'Plasmid'

export interface PlacementEntry {
  objectName: string
  chromosomeName: string
  chromosomeType: `${Topology}-${ChromosomeType}`
}

export interface UnlocalisedEntry {
  objectName: string
  chromosomeName: string
}

export interface AssemblyPlacement {
  assemblyId: string
  placed: PlacementEntry[]
  unlocalised: UnlocalisedEntry[]
  unplaced: number
}

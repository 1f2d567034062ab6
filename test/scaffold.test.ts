import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'url'
import { createConsensusConfig } from '../src/config.ts'
import {
  annotateClusters,
  buildAccessionLookup,
  buildScaffoldLookup,
  collectClusterCalls,
  parseRepliconFromScaffold,
} from '../src/scaffold.ts'
import { parseTable, readTableFile } from '../src/table.ts'
import { clusterRow } from '../src/writers.ts'

function fixture(name: string) {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url))
}

function fixtureLookups() {
  const accessions = buildAccessionLookup(readTableFile(fixture('best_hits.csv')))
  return buildScaffoldLookup(
    readTableFile(fixture('gene_data.csv'), 'sniff'),
    accessions,
  )
}

describe('parseRepliconFromScaffold', () => {
  it('takes the parts between the isolate and the contig marker', () => {
    expect(parseRepliconFromScaffold('B331P_lp54_contig_1')).toBe('lp54')
    expect(parseRepliconFromScaffold('S9_cp32-1+5_contig_4')).toBe('cp32-1+5')
    expect(parseRepliconFromScaffold('S9_plasmid_x_contig_4')).toBe('plasmid_x')
    expect(parseRepliconFromScaffold('S9_lp17')).toBe('lp17')
  })

  it('returns unknown when there is no replicon part', () => {
    expect(parseRepliconFromScaffold('B331P_contig_1')).toBe('unknown')
    expect(parseRepliconFromScaffold('B331P')).toBe('unknown')
  })

  it('resolves accession names through the lookup', () => {
    const accessions = new Map([['cp019844.1', 'chromosome']])
    expect(parseRepliconFromScaffold('B500_CP019844.1_contig_1', accessions)).toBe(
      'chromosome',
    )
    expect(parseRepliconFromScaffold('B500_CP000001.1_contig_1', accessions)).toBe(
      'cp000001.1',
    )
  })
})

describe('buildAccessionLookup', () => {
  it('maps accessions found in contig ids to lower-case replicons', () => {
    const lookup = buildAccessionLookup(readTableFile(fixture('best_hits.csv')))
    expect([...lookup]).toEqual([['cp019844.1', 'chromosome']])
  })

  it('keeps the first mapping for an accession', () => {
    const table = parseTable(
      'contig_id,plasmid_name\nCP000002.1 a,lp28-1\nCP000002.1 b,lp28-2\n',
      ',',
    )
    expect(buildAccessionLookup(table).get('cp000002.1')).toBe('lp28-1')
  })
})

describe('buildScaffoldLookup', () => {
  it('keys scaffolds by isolate and scaffold index', () => {
    const { replicons, skipped } = fixtureLookups()
    expect(skipped).toBe(2)
    expect([...replicons]).toEqual([
      ['0_0', 'chromosome'],
      ['0_1', 'lp54'],
      ['1_0', 'chromosome'],
      ['1_1', 'lp28-4'],
      ['2_0', 'cp32-1+5'],
    ])
  })
})

describe('collectClusterCalls', () => {
  it('skips refound genes and counts unmatched ones', () => {
    const scaffolds = new Map([['0_0', 'lp54']])
    expect(
      collectClusterCalls(['0_0_1', '3_refound_2', '5_5_5', 'bad'], scaffolds),
    ).toEqual({ calls: ['lp54'], refound: 1, unmatched: 2 })
  })
})

describe('annotateClusters', () => {
  it('annotates every cluster and counts match quality', () => {
    const run = annotateClusters(
      readTableFile(fixture('clusters.tsv')),
      fixtureLookups().replicons,
      createConsensusConfig(),
    )
    expect(run.annotations.map(a => a.clusterId)).toEqual(['g1', 'g2', 'g3'])
    expect(run.refound).toBe(1)
    expect(run.partiallyMatched).toBe(1)
    expect(run.unmatchedClusters).toBe(1)
    expect(run.failures).toEqual([])

    expect(clusterRow(run.annotations[0]!)).toEqual([
      'g1', 'dnaA', 'chromosome', 'chromosome', 'chromosome', 'chromosome',
      1, 2, 'chromosome(2)', 'chromosome', 1, 1, 1, 0, 'chromosome(2)',
    ])
    expect(clusterRow(run.annotations[1]!)).toEqual([
      'g2', 'bbk32', 'multi-replicon', 'lp54', 'multi-replicon', 'linear_plasmid',
      0.333, 3, 'lp54(1),lp28-4(1),cp32-1+5(1)', 'lp54', 3, 0.333, 0, 1,
      'lp54(1),lp28(1),cp32(1)',
    ])
    expect(clusterRow(run.annotations[2]!)).toEqual([
      'g3', 'orphan', 'unmatched', 'unmatched', 'unmatched', 'unmatched',
      0, 0, '', 'unmatched', 0, 0, 1, 0, '',
    ])
  })

  it('requires the cluster columns', () => {
    const table = parseTable('cluster_id\tname\ng1\tx\n', '\t', 'clusters.tsv')
    expect(() =>
      annotateClusters(table, new Map(), createConsensusConfig()),
    ).toThrow("Column 'geneIDs' not found in clusters.tsv. Available: cluster_id, name")
  })
})

import { existsSync, readdirSync, readFileSync, statSync } from 'fs'
import { join } from 'path'
import type { ComparisonResult } from './types.ts'

// Classifier output laid out as {allHitsDir}/{db}/tables/{assembly}_all.tsv
export interface HitSource {
  db: string
  tablesDir: string
}

const ALL_HITS_SUFFIX = '_all.tsv'
const RULE = '='.repeat(100)

function isDirectory(path: string) {
  return existsSync(path) && statSync(path).isDirectory()
}

function hitTables(tablesDir: string) {
  return readdirSync(tablesDir)
    .filter(f => f.endsWith(ALL_HITS_SUFFIX))
    .sort()
}

export function discoverHitSources(allHitsDir: string): HitSource[] {
  const sources: HitSource[] = []
  for (const db of readdirSync(allHitsDir).sort()) {
    const tablesDir = join(allHitsDir, db, 'tables')
    if (isDirectory(tablesDir) && hitTables(tablesDir).length > 0) {
      sources.push({ db, tablesDir })
    }
  }
  return sources
}

// {assembly}_all.tsv, else the first {assembly}*_all.tsv
export function readAllHits(tablesDir: string, assemblyId: string) {
  const exact = `${assemblyId}${ALL_HITS_SUFFIX}`
  const file = existsSync(join(tablesDir, exact))
    ? exact
    : hitTables(tablesDir).find(f => f.startsWith(assemblyId))
  if (file === undefined) {
    return []
  }
  return readFileSync(join(tablesDir, file), 'utf-8').split(/\r?\n/)
}

// Rows naming the contig in some field, minus no-hit placeholders whose
// hit id (fourth field) is empty
export function grepContig(lines: string[], contigId: string) {
  return lines
    .map(line => line.trimEnd())
    .filter(line => {
      const fields = line.split('\t')
      return fields.includes(contigId) && (fields[3]?.trim() ?? '') !== ''
    })
}

export function selectForReview(rows: ComparisonResult[], minBp: number) {
  return minBp > 0 ? rows.filter(r => r.contigLength >= minBp) : rows
}

export function formatReview(
  rows: ComparisonResult[],
  sources: HitSource[],
  linesFor: (source: HitSource, assemblyId: string) => string[],
) {
  const out = [
    `# Detailed review of ${rows.length} contigs needing manual review`,
    `# Databases found: ${sources.map(s => s.db).join(', ')}`,
    '# Format: all hits per database for each flagged contig',
    '#',
    '',
  ]

  for (const r of rows) {
    out.push(
      RULE,
      `### ${r.assemblyId} / ${r.contigId}`,
      `### old=${r.oldCall}  new=${r.newCall}  category=${r.category}`,
      RULE,
      '',
    )
    for (const source of sources) {
      const lines = linesFor(source, r.assemblyId)
      const hits = grepContig(lines, r.contigId)
      out.push(`--- ${source.db} (${hits.length} hits) ---`)
      if (hits.length === 0) {
        out.push('  (no hits)')
      } else {
        const header = lines[0]
        if (header?.startsWith('assembly_id')) {
          out.push(`  ${header.trimEnd()}`)
        }
        out.push(...hits.map(hit => `  ${hit}`))
      }
      out.push('')
    }
    out.push('')
  }

  return out.map(line => line + '\n').join('')
}

// Each assembly's table is read once per source
export function cachedHitReader() {
  const cache = new Map<string, string[]>()
  return (source: HitSource, assemblyId: string) => {
    const key = `${source.db}\t${assemblyId}`
    let lines = cache.get(key)
    if (lines === undefined) {
      lines = readAllHits(source.tablesDir, assemblyId)
      cache.set(key, lines)
    }
    return lines
  }
}

import type { Columns } from './config.ts'
import type { FragmentKey, FragmentRecord } from './types.ts'
import { hasColumn, requireColumns, type Row, type Table } from './table.ts'

export const STAT_COLUMNS = {
  refLength: 'ref_length',
  refCoveredLength: 'ref_covered_length',
  queryCoveragePercent: 'query_coverage_percent',
  identityPercent: 'overall_percent_identity',
} as const

export interface LoadedEvidence {
  records: FragmentRecord[]
  warnings: string[]
}

export function fragmentKey({ assemblyId, contigId }: FragmentKey) {
  return `${assemblyId}\t${contigId}`
}

// Empty cells are simply unknown; anything else that fails to parse is
// reported and also treated as unknown
function parseStat(
  row: Row,
  column: string,
  where: string,
  warnings: string[],
): number | undefined {
  const raw = row[column]?.trim() ?? ''
  if (raw === '') {
    return undefined
  }
  const n = Number(raw)
  if (!Number.isFinite(n)) {
    warnings.push(`${where}: unparsable ${column} '${raw}'`)
    return undefined
  }
  return n
}

export function loadFragments(table: Table, columns: Columns): LoadedEvidence {
  requireColumns(table, [columns.assembly, columns.contig, columns.call])
  const withLength = hasColumn(table, columns.length)
  const records: FragmentRecord[] = []
  const warnings: string[] = []

  table.rows.forEach((row, i) => {
    const where = `${table.source} line ${i + 2}`
    const contigId = row[columns.contig]?.trim() ?? ''
    if (!contigId) {
      warnings.push(`${where}: empty ${columns.contig}, row skipped`)
      return
    }
    const length = withLength
      ? parseStat(row, columns.length, where, warnings)
      : undefined

    records.push({
      assemblyId: row[columns.assembly]?.trim() ?? '',
      contigId,
      call: row[columns.call]?.trim() ?? '',
      length: length === undefined ? 0 : Math.trunc(length),
      refLength: parseStat(row, STAT_COLUMNS.refLength, where, warnings),
      refCoveredLength: parseStat(
        row,
        STAT_COLUMNS.refCoveredLength,
        where,
        warnings,
      ),
      queryCoveragePercent: parseStat(
        row,
        STAT_COLUMNS.queryCoveragePercent,
        where,
        warnings,
      ),
      identityPercent: parseStat(
        row,
        STAT_COLUMNS.identityPercent,
        where,
        warnings,
      ),
    })
  })

  return { records, warnings }
}

// Later rows win when a key repeats
export function indexFragments(records: FragmentRecord[]) {
  const byKey = new Map<string, FragmentRecord>()
  for (const record of records) {
    byKey.set(fragmentKey(record), record)
  }
  return byKey
}

export const OVERRIDE_COLUMNS = ['assembly_id', 'contig_id', 'resolved_call']

export function loadOverrides(table: Table) {
  requireColumns(table, OVERRIDE_COLUMNS)
  const overrides = new Map<string, string>()

  for (const row of table.rows) {
    const assemblyId = row['assembly_id']?.trim() ?? ''
    const contigId = row['contig_id']?.trim() ?? ''
    if (assemblyId && contigId) {
      overrides.set(
        fragmentKey({ assemblyId, contigId }),
        row['resolved_call']?.trim() ?? '',
      )
    }
  }

  return overrides
}

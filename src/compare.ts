import type { Category } from './types.ts'
import { familyOf } from './family.ts'
import {
  intersects,
  isSubset,
  normalizeCall,
  splitCompound,
  stripSuffix,
} from './normalize.ts'

export interface CallPair {
  oldCall: string
  newCall: string
  oldNorm: string
  newNorm: string
  oldTokens: Set<string>
  newTokens: Set<string>
  oldFamily: string | null
  newFamily: string | null
}

export interface CompareRule {
  category: Category
  test: (pair: CallPair) => boolean
  resolve: (pair: CallPair) => string
}

export interface Categorized {
  category: Category
  resolvedCall: string
}

export interface CompareOptions {
  contigLength?: number
  // bp; 0 or absent disables the auto-chromosome heuristics
  autoChromosomeBp?: number
  override?: string
}

export function toCallPair(oldCall: string, newCall: string): CallPair {
  return {
    oldCall,
    newCall,
    oldNorm: normalizeCall(oldCall),
    newNorm: normalizeCall(newCall),
    oldTokens: splitCompound(oldCall),
    newTokens: splitCompound(newCall),
    oldFamily: familyOf(oldCall),
    newFamily: familyOf(newCall),
  }
}

const keepOld = (p: CallPair) => p.oldCall.trim()
const takeNew = (p: CallPair) => p.newCall.trim()

// Evaluated in order, first match wins. The last rule always matches.
export const COMPARE_RULES: readonly CompareRule[] = [
  {
    category: 'exact_match',
    test: p => p.oldNorm === p.newNorm,
    resolve: p => (p.oldNorm === '' ? '' : keepOld(p)),
  },
  {
    category: 'new_unclassified',
    test: p => p.oldNorm !== '' && p.newNorm === '',
    resolve: keepOld,
  },
  {
    category: 'old_unclassified',
    test: p => p.oldNorm === '' && p.newNorm !== '',
    resolve: takeNew,
  },
  {
    // lp28-1 vs lp28-1*
    category: 'annotation_suffix',
    test: p => stripSuffix(p.oldNorm) === stripSuffix(p.newNorm),
    resolve: keepOld,
  },
  {
    // lp28-4 vs lp28-4:::lp17
    category: 'extra_annotation',
    test: p => p.oldTokens.size > 0 && isSubset(p.oldTokens, p.newTokens),
    resolve: keepOld,
  },
  {
    category: 'base_match',
    test: p => p.newTokens.size > 0 && isSubset(p.newTokens, p.oldTokens),
    resolve: keepOld,
  },
  {
    category: 'partial_overlap',
    test: p => intersects(p.oldTokens, p.newTokens),
    resolve: keepOld,
  },
  {
    // cp32-12 vs cp32-1: identical scores broken by a tie
    category: 'same_family_tiebreak',
    test: p => p.oldFamily !== null && p.oldFamily === p.newFamily,
    resolve: keepOld,
  },
  {
    category: 'different',
    test: () => true,
    resolve: keepOld,
  },
]

export function categorize(
  oldCall: string,
  newCall: string,
  rules: readonly CompareRule[] = COMPARE_RULES,
): Categorized {
  const pair = toCallPair(oldCall, newCall)
  for (const rule of rules) {
    if (rule.test(pair)) {
      return { category: rule.category, resolvedCall: rule.resolve(pair) }
    }
  }
  return { category: 'different', resolvedCall: keepOld(pair) }
}

// Only a 'different' verdict is reconsidered, and only with a threshold > 0
export function applyAutoChromosome(
  result: Categorized,
  oldCall: string,
  newCall: string,
  contigLength: number,
  thresholdBp: number,
): Categorized {
  if (thresholdBp <= 0 || result.category !== 'different') {
    return result
  }
  const oldNorm = normalizeCall(oldCall)
  const newNorm = normalizeCall(newCall)

  if (newNorm === 'chromosome' && contigLength >= thresholdBp) {
    return { category: 'auto_chromosome', resolvedCall: newCall.trim() }
  }
  if (
    oldNorm === 'chromosome' &&
    newNorm !== '' &&
    newNorm !== 'chromosome' &&
    contigLength < thresholdBp
  ) {
    return { category: 'auto_chromosome', resolvedCall: newCall.trim() }
  }
  return result
}

export function applyOverride(
  result: Categorized,
  override: string | undefined,
): Categorized {
  if (override === undefined) {
    return result
  }
  return {
    category:
      result.category === 'exact_match' ? 'exact_match' : 'manual_override',
    resolvedCall: override,
  }
}

// Compares one fragment across both sources. A side that is undefined means
// the fragment is missing from that source entirely.
export function compareFragment(
  oldCall: string | undefined,
  newCall: string | undefined,
  options: CompareOptions = {},
): Categorized {
  const { contigLength = 0, autoChromosomeBp = 0, override } = options
  let result: Categorized

  if (newCall === undefined) {
    result = { category: 'old_only', resolvedCall: oldCall ?? '' }
  } else if (oldCall === undefined) {
    result = { category: 'new_only', resolvedCall: newCall }
  } else {
    result = applyAutoChromosome(
      categorize(oldCall, newCall),
      oldCall,
      newCall,
      contigLength,
      autoChromosomeBp,
    )
  }

  return applyOverride(result, override)
}

import { describe, it, expect } from 'vitest'
import {
  COMPARE_RULES,
  applyOverride,
  categorize,
  compareFragment,
} from '../src/compare.ts'

describe('categorize', () => {
  it('treats identical calls as exact matches', () => {
    for (const call of ['lp28-4', 'cp32-1+5', 'chromosome', 'lp28-4:::lp17']) {
      expect(categorize(call, call)).toEqual({
        category: 'exact_match',
        resolvedCall: call,
      })
    }
  })

  it('matches two empty calls with an empty resolution', () => {
    expect(categorize('NA', '')).toEqual({
      category: 'exact_match',
      resolvedCall: '',
    })
  })

  it('ignores case and whitespace for exact matches', () => {
    expect(categorize(' LP54', 'lp54 ')).toEqual({
      category: 'exact_match',
      resolvedCall: 'LP54',
    })
  })

  it('flags a new call that lost its classification', () => {
    expect(categorize('lp54', 'unclassified')).toEqual({
      category: 'new_unclassified',
      resolvedCall: 'lp54',
    })
  })

  it('takes the new call when the old one was unclassified', () => {
    expect(categorize('', ' lp36 ')).toEqual({
      category: 'old_unclassified',
      resolvedCall: 'lp36',
    })
  })

  it('detects annotation suffixes', () => {
    expect(categorize('lp28-1', 'lp28-1*')).toEqual({
      category: 'annotation_suffix',
      resolvedCall: 'lp28-1',
    })
  })

  it('detects extra annotation in the new call', () => {
    expect(categorize('lp28-4', 'lp28-4:::lp17')).toEqual({
      category: 'extra_annotation',
      resolvedCall: 'lp28-4',
    })
  })

  it('detects a base match when the old call had more', () => {
    expect(categorize('lp28-4:::lp17', 'lp17')).toEqual({
      category: 'base_match',
      resolvedCall: 'lp28-4:::lp17',
    })
  })

  it('detects partial overlap', () => {
    expect(categorize('lp28-4:::lp17', 'lp17:::lp25')).toEqual({
      category: 'partial_overlap',
      resolvedCall: 'lp28-4:::lp17',
    })
  })

  it('does not split fusions when checking overlap', () => {
    expect(categorize('cp32-1', 'cp32-1+5').category).toBe(
      'same_family_tiebreak',
    )
  })

  it('detects same-family tie-breaks', () => {
    expect(categorize('cp32-12', 'cp32-1')).toEqual({
      category: 'same_family_tiebreak',
      resolvedCall: 'cp32-12',
    })
  })

  it('falls through to different', () => {
    expect(categorize('lp17', 'lp25')).toEqual({
      category: 'different',
      resolvedCall: 'lp17',
    })
  })

  it('exposes the rule order', () => {
    expect(COMPARE_RULES.map(r => r.category)).toEqual([
      'exact_match',
      'new_unclassified',
      'old_unclassified',
      'annotation_suffix',
      'extra_annotation',
      'base_match',
      'partial_overlap',
      'same_family_tiebreak',
      'different',
    ])
  })
})

describe('compareFragment', () => {
  it('auto-resolves large contigs the new run calls chromosome', () => {
    expect(
      compareFragment('plasmid_x', 'chromosome', {
        contigLength: 200000,
        autoChromosomeBp: 100000,
      }),
    ).toEqual({ category: 'auto_chromosome', resolvedCall: 'chromosome' })
  })

  it('leaves small contigs called chromosome by the new run alone', () => {
    expect(
      compareFragment('plasmid_x', 'chromosome', {
        contigLength: 50000,
        autoChromosomeBp: 100000,
      }),
    ).toEqual({ category: 'different', resolvedCall: 'plasmid_x' })
  })

  it('auto-resolves small contigs the old run called chromosome', () => {
    expect(
      compareFragment('chromosome', 'lp17', {
        contigLength: 20000,
        autoChromosomeBp: 100000,
      }),
    ).toEqual({ category: 'auto_chromosome', resolvedCall: 'lp17' })
  })

  it('keeps large contigs the old run called chromosome', () => {
    expect(
      compareFragment('chromosome', 'lp17', {
        contigLength: 200000,
        autoChromosomeBp: 100000,
      }).category,
    ).toBe('different')
  })

  it('never auto-resolves with the heuristic disabled', () => {
    expect(
      compareFragment('plasmid_x', 'chromosome', { contigLength: 200000 })
        .category,
    ).toBe('different')
  })

  it('only reconsiders different verdicts', () => {
    expect(
      compareFragment('NA', 'chromosome', {
        contigLength: 200000,
        autoChromosomeBp: 100000,
      }),
    ).toEqual({ category: 'old_unclassified', resolvedCall: 'chromosome' })
  })

  it('handles fragments present in one source only', () => {
    expect(compareFragment('lp54', undefined)).toEqual({
      category: 'old_only',
      resolvedCall: 'lp54',
    })
    expect(compareFragment(undefined, 'lp5')).toEqual({
      category: 'new_only',
      resolvedCall: 'lp5',
    })
  })

  it('lets a manual override win over every category but exact_match', () => {
    expect(compareFragment('lp17', 'lp25', { override: 'lp25' })).toEqual({
      category: 'manual_override',
      resolvedCall: 'lp25',
    })
    expect(
      compareFragment('plasmid_x', 'chromosome', {
        contigLength: 200000,
        autoChromosomeBp: 100000,
        override: 'lp99',
      }),
    ).toEqual({ category: 'manual_override', resolvedCall: 'lp99' })
    expect(compareFragment(undefined, 'lp5', { override: 'lp6' })).toEqual({
      category: 'manual_override',
      resolvedCall: 'lp6',
    })
  })

  it('keeps exact_match but still applies the override value', () => {
    expect(applyOverride({ category: 'exact_match', resolvedCall: 'lp54' }, 'lp56'))
      .toEqual({ category: 'exact_match', resolvedCall: 'lp56' })
  })
})

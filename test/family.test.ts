import { describe, it, expect } from 'vitest'
import {
  FAMILY_RULES,
  classifyRepliconType,
  familyOf,
} from '../src/family.ts'

describe('familyOf', () => {
  it('returns null for empty calls', () => {
    expect(familyOf('')).toBeNull()
    expect(familyOf('unclassified')).toBeNull()
    expect(familyOf('*')).toBeNull()
  })

  it('extracts the leading letters+digits run', () => {
    expect(familyOf('lp28-4')).toBe('lp28')
    expect(familyOf('cp32-12')).toBe('cp32')
    expect(familyOf('lp54')).toBe('lp54')
    expect(familyOf('LP28-1*')).toBe('lp28')
  })

  it('keeps chromosome as its own family', () => {
    expect(familyOf('Chromosome')).toBe('chromosome')
  })

  it('uses the first component of fusion names', () => {
    expect(familyOf('cp32-1+5')).toBe('cp32')
    expect(familyOf('lp21-cp9')).toBe('lp21')
    expect(familyOf('lp28-3-lp28-4')).toBe('lp28')
  })

  it('falls back to the call itself', () => {
    expect(familyOf('plasmid_x')).toBe('plasmid_x')
    expect(familyOf('unknown')).toBe('unknown')
  })

  it('takes a custom rule table', () => {
    const rules = [
      { name: 'everything', apply: () => 'one' },
      ...FAMILY_RULES,
    ]
    expect(familyOf('lp28-4', rules)).toBe('one')
    expect(familyOf('', rules)).toBeNull()
  })

  it('orders the rule table chromosome, fusion, leading-run', () => {
    expect(FAMILY_RULES.map(r => r.name)).toEqual([
      'chromosome',
      'fusion',
      'leading-run',
    ])
  })
})

describe('classifyRepliconType', () => {
  it('groups replicons coarsely', () => {
    expect(classifyRepliconType('multi-replicon')).toBe('multi-replicon')
    expect(classifyRepliconType('chromosome')).toBe('chromosome')
    expect(classifyRepliconType('cp26')).toBe('circular_plasmid')
    expect(classifyRepliconType('lp54')).toBe('linear_plasmid')
    expect(classifyRepliconType('unknown')).toBe('unknown')
    expect(classifyRepliconType('unmatched')).toBe('unmatched')
    expect(classifyRepliconType('plasmid_x')).toBe('other')
  })
})

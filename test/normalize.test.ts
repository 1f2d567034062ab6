import { describe, it, expect } from 'vitest'
import {
  isEmptyCall,
  normalizeCall,
  splitCompound,
  stripSuffix,
} from '../src/normalize.ts'

describe('normalizeCall', () => {
  it('collapses empty sentinels', () => {
    for (const call of ['', 'NA', 'nan', 'None', 'unclassified', '  NA  ']) {
      expect(normalizeCall(call)).toBe('')
    }
    expect(normalizeCall(undefined)).toBe('')
  })

  it('trims and lower-cases', () => {
    expect(normalizeCall('  LP28-4 ')).toBe('lp28-4')
    expect(normalizeCall('Chromosome')).toBe('chromosome')
  })

  it('is idempotent', () => {
    for (const call of ['  LP28-4 ', ' NA ', 'cp32-1+5', 'Unclassified', 'x']) {
      const once = normalizeCall(call)
      expect(normalizeCall(once)).toBe(once)
    }
  })

  it('treats empty and unclassified the same', () => {
    expect(normalizeCall('')).toBe(normalizeCall('NA'))
    expect(normalizeCall('NA')).toBe(normalizeCall('unclassified'))
    expect(isEmptyCall('UNCLASSIFIED')).toBe(true)
    expect(isEmptyCall('lp54')).toBe(false)
  })
})

describe('stripSuffix', () => {
  it('removes repeated trailing stars', () => {
    expect(stripSuffix('lp28-1*')).toBe('lp28-1')
    expect(stripSuffix('lp28-1***')).toBe('lp28-1')
    expect(stripSuffix('lp28-1')).toBe('lp28-1')
    expect(stripSuffix('lp*28')).toBe('lp*28')
  })
})

describe('splitCompound', () => {
  it('splits on the triple-colon separator', () => {
    expect(splitCompound('lp28-4:::lp17')).toEqual(new Set(['lp28-4', 'lp17']))
  })

  it('keeps fusion replicons as one token', () => {
    expect(splitCompound('cp32-1+5')).toEqual(new Set(['cp32-1+5']))
    expect(splitCompound('lp28-4+lp28-3')).toEqual(new Set(['lp28-4+lp28-3']))
  })

  it('normalizes tokens and drops blanks', () => {
    expect(splitCompound('LP28-4 ::: :::lp17')).toEqual(
      new Set(['lp28-4', 'lp17']),
    )
    expect(splitCompound('NA').size).toBe(0)
  })
})

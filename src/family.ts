import type { RepliconType } from './types.ts'
import { normalizeCall, stripSuffix } from './normalize.ts'

export interface FamilyRule {
  name: string
  // returns the family, or undefined to fall through to the next rule
  apply: (call: string) => string | undefined
}

const LEADING_RUN = /^([a-z]+\d+)/

function leadingRun(call: string) {
  return LEADING_RUN.exec(call)?.[1]
}

// Evaluated top to bottom on a normalized, suffix-free call
export const FAMILY_RULES: readonly FamilyRule[] = [
  {
    name: 'chromosome',
    apply: call => (call === 'chromosome' ? 'chromosome' : undefined),
  },
  {
    // cp32-1+5 -> cp32, lp21-cp9 -> lp21
    name: 'fusion',
    apply: call => {
      if (!call.includes('+') && !call.includes('-cp') && !call.includes('-lp')) {
        return undefined
      }
      const base = call.split('+')[0]!.split('-cp')[0]!.split('-lp')[0]!
      return leadingRun(base)
    },
  },
  {
    // lp28-4 -> lp28, cp26 -> cp26
    name: 'leading-run',
    apply: leadingRun,
  },
]

export function familyOf(
  call: string,
  rules: readonly FamilyRule[] = FAMILY_RULES,
): string | null {
  const norm = normalizeCall(stripSuffix(call))
  if (!norm) {
    return null
  }
  for (const rule of rules) {
    const family = rule.apply(norm)
    if (family !== undefined) {
      return family
    }
  }
  return norm
}

// Coarse grouping used to colour and shape gene-cluster nodes
export function classifyRepliconType(replicon: string): RepliconType {
  if (replicon === 'multi-replicon') {
    return 'multi-replicon'
  }
  if (replicon === 'chromosome') {
    return 'chromosome'
  }
  if (replicon.startsWith('cp')) {
    return 'circular_plasmid'
  }
  if (replicon.startsWith('lp')) {
    return 'linear_plasmid'
  }
  if (replicon === 'unknown' || replicon === 'unmatched') {
    return replicon
  }
  return 'other'
}

const EMPTY_SENTINELS = new Set(['', 'na', 'nan', 'none', 'unclassified'])

// Separator the classifier uses between multi-locus hits. A '+' is part of
// a fusion replicon name and never splits.
export const COMPOUND_SEPARATOR = ':::'

export function normalizeCall(call: string | undefined) {
  const trimmed = (call ?? '').trim().toLowerCase()
  return EMPTY_SENTINELS.has(trimmed) ? '' : trimmed
}

export function isEmptyCall(call: string | undefined) {
  return normalizeCall(call) === ''
}

// lp28-1** -> lp28-1
export function stripSuffix(call: string) {
  return call.trim().replace(/\*+$/, '')
}

export function splitCompound(call: string) {
  const tokens = new Set<string>()
  for (const part of normalizeCall(call).split(COMPOUND_SEPARATOR)) {
    const token = part.trim()
    if (token) {
      tokens.add(token)
    }
  }
  return tokens
}

export function isSubset(a: Set<string>, b: Set<string>) {
  for (const item of a) {
    if (!b.has(item)) {
      return false
    }
  }
  return true
}

export function intersects(a: Set<string>, b: Set<string>) {
  for (const item of a) {
    if (b.has(item)) {
      return true
    }
  }
  return false
}

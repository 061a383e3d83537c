export type RawUserId =
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'text'; value: string }
  | { kind: 'other'; value: unknown }

export function classifyUserId(raw: unknown): RawUserId {
  if (typeof raw === 'bigint') return { kind: 'integer', value: raw }
  if (typeof raw === 'number' && Number.isSafeInteger(raw)) return { kind: 'integer', value: raw }
  if (typeof raw === 'string') return { kind: 'text', value: raw }
  return { kind: 'other', value: raw }
}

/**
 * Canonical form of a user or bot identifier. Adapters may hand us numbers
 * or prefixed strings such as `onebot_123456`; only the part after the last
 * underscore is kept.
 */
export function normalizeUserId(raw: unknown): string {
  const id = classifyUserId(raw)
  switch (id.kind) {
    case 'integer':
      return id.value.toString()
    case 'text': {
      const segments = id.value.split('_')
      return segments[segments.length - 1].trim()
    }
    case 'other':
      return stringify(id.value)
  }
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return ''
  try {
    return String(value)
  } catch {
    // objects without a prototype have no toString
    return Object.prototype.toString.call(value)
  }
}

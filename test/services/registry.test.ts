import { beforeEach, describe, expect, it } from 'vitest'
import { BanRegistry } from '../../src/services/registry'

const MINUTE = 60 * 1000

describe('BanRegistry', () => {
  let now: number
  let registry: BanRegistry

  beforeEach(() => {
    now = 1_700_000_000_000
    registry = new BanRegistry(() => now)
  })

  it('blocks immediately and sets expiry from the call time', () => {
    const expiresAt = registry.ban('100', 10)
    expect(expiresAt).toBe(now + 10 * MINUTE)
    expect(registry.expiresAt('100')).toBe(now + 600 * 1000)
    expect(registry.isBlocked('100')).toBe(true)
  })

  it('unblocks once the duration has passed and drops the entry on that read', () => {
    registry.ban('100', 3)

    now += 3 * MINUTE - 1
    expect(registry.isBlocked('100')).toBe(true)
    expect(registry.has('100')).toBe(true)

    now += 1
    expect(registry.has('100')).toBe(true)
    expect(registry.isBlocked('100')).toBe(false)
    expect(registry.has('100')).toBe(false)
    expect(registry.size).toBe(0)
  })

  it('overwrites instead of accumulating durations', () => {
    registry.ban('100', 30)
    registry.ban('100', 2)
    expect(registry.expiresAt('100')).toBe(now + 2 * MINUTE)

    now += 2 * MINUTE
    expect(registry.isBlocked('100')).toBe(false)
  })

  it('reports unknown users as not blocked', () => {
    expect(registry.isBlocked('nobody')).toBe(false)
    expect(registry.expiresAt('nobody')).toBeUndefined()
  })

  it('lists active bans by expiry and prunes expired ones', () => {
    registry.ban('a', 10)
    registry.ban('b', 1)
    registry.ban('c', 5)

    now += 2 * MINUTE
    expect(registry.active()).toEqual([
      { userId: 'c', expiresAt: now - 2 * MINUTE + 5 * MINUTE },
      { userId: 'a', expiresAt: now - 2 * MINUTE + 10 * MINUTE },
    ])
    expect(registry.has('b')).toBe(false)
    expect(registry.size).toBe(2)
  })
})

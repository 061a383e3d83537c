import { Logger, Time } from 'koishi'

export interface BanEntry {
  userId: string
  expiresAt: number
}

export type Clock = () => number

/**
 * In-memory map of user id to unblock time (ms since epoch).
 *
 * Expired entries are not swept in the background; whichever read finds
 * one past its unblock time removes it.
 */
export class BanRegistry {
  private entries: Map<string, number> = new Map()
  private logger: Logger

  constructor(private now: Clock = Date.now) {
    this.logger = new Logger('llm-tempban:registry')
  }

  public ban(userId: string, durationMinutes: number): number {
    const expiresAt = this.now() + durationMinutes * Time.minute
    this.entries.set(userId, expiresAt)
    return expiresAt
  }

  public isBlocked(userId: string): boolean {
    const expiresAt = this.entries.get(userId)
    if (expiresAt === undefined) return false
    if (this.now() < expiresAt) return true

    this.entries.delete(userId)
    this.logger.debug(`Ban on ${userId} expired, entry removed.`)
    return false
  }

  public expiresAt(userId: string): number | undefined {
    return this.entries.get(userId)
  }

  public has(userId: string): boolean {
    return this.entries.has(userId)
  }

  public get size(): number {
    return this.entries.size
  }

  public active(): BanEntry[] {
    const now = this.now()
    const result: BanEntry[] = []
    for (const [userId, expiresAt] of this.entries) {
      if (now < expiresAt) {
        result.push({ userId, expiresAt })
      } else {
        this.entries.delete(userId)
      }
    }
    return result.sort((a, b) => a.expiresAt - b.expiresAt)
  }
}

import { Element, Logger } from 'koishi'
import { Config } from '../config'
import { normalizeUserId } from '../utils/user-id'
import { AdministratorSet } from './administrators'
import { BanRegistry } from './registry'

/** The parts of a session the ban logic reads. `Session` satisfies it. */
export interface BanEvent {
  selfId: unknown
  userId?: unknown
  elements?: Element[]
}

export type Admission = 'allow' | 'reject'

export type BanOutcome =
  | { status: 'banned'; userId: string; duration: number; expiresAt: number }
  | { status: 'self-banned'; userId: string; duration: number; expiresAt: number }
  | { status: 'retaliated'; userId: string; targetId: string; duration: number; expiresAt: number }
  | { status: 'no-target' }
  | { status: 'target-is-admin'; targetId: string }
  | { status: 'invalid-duration'; duration: number }
  | { status: 'not-permitted'; targetId: string }

export const RETALIATION_FLOOR = 5

export class TempBanService {
  private logger: Logger
  private botId = ''

  constructor(
    private config: Config,
    public readonly registry: BanRegistry,
    public readonly administrators: AdministratorSet,
  ) {
    this.logger = new Logger('llm-tempban')
  }

  public resolveBotId(event: BanEvent): string {
    if (this.botId) return this.botId
    this.botId = normalizeUserId(event.selfId)
    this.administrators.enroll(this.botId)
    return this.botId
  }

  public isAdministrator(userId: string): boolean {
    return this.administrators.has(userId)
  }

  public admit(event: BanEvent): Admission {
    this.resolveBotId(event)
    const userId = normalizeUserId(event.userId)

    if (this.isAdministrator(userId)) return 'allow'
    if (!this.registry.isBlocked(userId)) return 'allow'

    const expiresAt = this.registry.expiresAt(userId)
    const until = expiresAt === undefined ? 'unknown' : new Date(expiresAt).toLocaleString()
    this.logger.info(`Blocked request from ${userId} (banned until ${until}).`)
    return 'reject'
  }

  /**
   * Normalized id of the first `at` that is neither a broadcast nor the bot
   * itself. A mention whose id normalizes to `''` still wins and reads as
   * "no target".
   */
  public extractTarget(elements: Element[] | undefined, botId: string): string {
    for (const el of elements ?? []) {
      if (el.type !== 'at' || isBroadcast(el)) continue
      const id = normalizeUserId(el.attrs.id)
      if (id !== botId) return id
    }
    return ''
  }

  public handleBanRequest(event: BanEvent, durationMinutes?: number | null): BanOutcome {
    const botId = this.resolveBotId(event)
    const senderId = normalizeUserId(event.userId)
    const targetId = this.extractTarget(event.elements, botId)
    const duration = durationMinutes ?? this.config.defaultBlacklistDuration

    if (this.isAdministrator(senderId)) {
      return this.banAsAdmin(targetId, duration)
    }
    return this.banAsUser(senderId, targetId, duration)
  }

  public autoBan(event: BanEvent, durationMinutes?: number | null): BanOutcome {
    this.resolveBotId(event)
    const targetId = normalizeUserId(event.userId)

    if (this.isAdministrator(targetId)) {
      this.logger.warn(`Refused to auto-ban administrator ${targetId}.`)
      return { status: 'target-is-admin', targetId }
    }

    const duration = durationMinutes ?? this.config.defaultBlacklistDuration
    const expiresAt = this.registry.ban(targetId, duration)
    this.logger.info(`Auto-banned ${targetId} for ${duration} min.`)
    return { status: 'banned', userId: targetId, duration, expiresAt }
  }

  private banAsAdmin(targetId: string, duration: number): BanOutcome {
    if (!targetId) {
      this.logger.warn('Ban failed: no target user mentioned.')
      return { status: 'no-target' }
    }
    if (this.isAdministrator(targetId)) {
      this.logger.warn(`Ban failed: target ${targetId} is an administrator.`)
      return { status: 'target-is-admin', targetId }
    }
    if (duration <= 0) {
      this.logger.warn(`Ban failed: duration must be positive, got ${duration}.`)
      return { status: 'invalid-duration', duration }
    }

    const expiresAt = this.registry.ban(targetId, duration)
    this.logger.success(`Administrator banned ${targetId} for ${duration} min.`)
    return { status: 'banned', userId: targetId, duration, expiresAt }
  }

  private banAsUser(senderId: string, requestedTarget: string, duration: number): BanOutcome {
    const targetId = requestedTarget || senderId

    // Retaliation ignores the requested duration below the floor, zero and negatives included.
    if (this.isAdministrator(targetId)) {
      const actual = Math.max(RETALIATION_FLOOR, duration)
      const expiresAt = this.registry.ban(senderId, actual)
      this.logger.info(`User ${senderId} tried to ban administrator ${targetId}, banned back for ${actual} min.`)
      return { status: 'retaliated', userId: senderId, targetId, duration: actual, expiresAt }
    }

    if (targetId === senderId) {
      if (duration <= 0) {
        this.logger.warn(`Ban from ${senderId} failed: duration must be positive, got ${duration}.`)
        return { status: 'invalid-duration', duration }
      }
      const expiresAt = this.registry.ban(senderId, duration)
      this.logger.info(`User ${senderId} banned themselves for ${duration} min.`)
      return { status: 'self-banned', userId: senderId, duration, expiresAt }
    }

    this.logger.warn(`Ban from ${senderId} on ${targetId} refused: users may only ban themselves.`)
    return { status: 'not-permitted', targetId }
  }
}

function isBroadcast(el: Element): boolean {
  return el.attrs.type === 'all' || el.attrs.id === 'all'
}

import { Logger } from 'koishi'
import { Config } from './config'
import { ModerationService } from './services/moderation'
import { type BanEvent, TempBanService } from './services/tempban'

const logger = new Logger('llm-tempban')

export interface GateSession extends BanEvent {
  platform?: string
  channelId?: string
  content?: string
}

/**
 * Runs ahead of the chat plugins. A request from a banned user, or one that
 * gets its sender auto-banned, ends here and `next` is never called.
 */
export function createRequestGate(service: TempBanService, moderation: ModerationService, config: Config) {
  return <T>(session: GateSession, next: () => T): T | undefined => {
    const admission = service.admit(session)
    if (config.debug) {
      logger.info(`[DEBUG] ${admission.toUpperCase()} Platform=${session.platform}, UserId=${session.userId}, ChannelId=${session.channelId}`)
    }
    if (admission === 'reject') return

    const words = moderation.check(session.content)
    if (words.length > 0) {
      logger.warn(`[VIOLATION] [User: ${session.userId}] Words: ${words.join(', ')}`)
      const outcome = service.autoBan(session, moderation.duration)
      if (outcome.status === 'banned') return
    }

    return next()
  }
}

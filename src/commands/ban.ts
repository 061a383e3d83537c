import { Context } from 'koishi'
import { Config } from '../config'
import { type BanEvent, type BanOutcome, TempBanService } from '../services/tempban'

/** What the command bodies need from a session. `Session` satisfies it. */
export interface CommandSession extends BanEvent {
  text(path: string, params?: object): string
}

export function describeOutcome(session: CommandSession, outcome: BanOutcome): string {
  const prefix = 'commands.tempban.messages.'
  switch (outcome.status) {
    case 'banned':
      return session.text(prefix + 'banned', [outcome.userId, outcome.duration])
    case 'self-banned':
      return session.text(prefix + 'self_banned', [outcome.duration])
    case 'retaliated':
      return session.text(prefix + 'retaliated', [outcome.targetId, outcome.duration])
    case 'no-target':
      return session.text(prefix + 'no_target')
    case 'target-is-admin':
      return session.text(prefix + 'target_is_admin', [outcome.targetId])
    case 'invalid-duration':
      return session.text(prefix + 'invalid_duration')
    case 'not-permitted':
      return session.text(prefix + 'not_permitted')
  }
}

export function banCommand(session: CommandSession, service: TempBanService, config: Config, duration?: number): string | undefined {
  const outcome = service.handleBanRequest(session, duration)
  if (!config.reply) return
  return describeOutcome(session, outcome)
}

export function registerBanCommands(ctx: Context, config: Config, service: TempBanService) {
  // Target comes from the first <at> in the message, not from an argument.
  ctx.command('tempban [duration:number]')
    .action(({ session }, duration) => {
      if (!session) return
      return banCommand(session, service, config, duration)
    })
}

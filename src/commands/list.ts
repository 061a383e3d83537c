import { Context } from 'koishi'
import { TempBanService } from '../services/tempban'
import { checkPermission } from '../utils/permission'
import type { CommandSession } from './ban'

export function listActiveBans(session: CommandSession, service: TempBanService): string {
  if (!checkPermission(session, service)) return session.text('commands.tempban.messages.permission_denied')

  const entries = service.registry.active()
  if (entries.length === 0) return session.text('commands.tempban.messages.no_active_bans')

  const lines = entries.map(e => `${e.userId} → ${new Date(e.expiresAt).toLocaleString()}`).join('\n')
  return session.text('commands.tempban.messages.active_bans_list', [entries.length, lines])
}

export function listAdministrators(session: CommandSession, service: TempBanService): string {
  if (!checkPermission(session, service)) return session.text('commands.tempban.messages.permission_denied')

  const admins = service.administrators.list()
  return session.text('commands.tempban.messages.admins_list', [admins.length, admins.join(', ')])
}

export function registerListCommands(ctx: Context, service: TempBanService) {
  ctx.command('tempban.list')
    .action(({ session }) => {
      if (!session) return
      return listActiveBans(session, service)
    })

  ctx.command('tempban.admins')
    .action(({ session }) => {
      if (!session) return
      return listAdministrators(session, service)
    })
}

import { type BanEvent, TempBanService } from '../services/tempban'
import { normalizeUserId } from './user-id'

export function checkPermission(session: BanEvent, service: TempBanService): boolean {
  const userId = normalizeUserId(session.userId)
  if (!userId) return false
  service.resolveBotId(session)
  return service.isAdministrator(userId)
}

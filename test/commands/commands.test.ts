import { h } from 'koishi'
import { beforeEach, describe, expect, it } from 'vitest'
import { Config } from '../../src/config'
import { banCommand, type CommandSession, describeOutcome } from '../../src/commands/ban'
import { listActiveBans, listAdministrators } from '../../src/commands/list'
import { AdministratorSet } from '../../src/services/administrators'
import { BanRegistry } from '../../src/services/registry'
import { TempBanService } from '../../src/services/tempban'

const MINUTE = 60 * 1000
const BOT = '10000'
const ADMIN = '1'
const ADMIN_2 = '2'
const ALICE = '200'
const PREFIX = 'commands.tempban.messages.'

const config: Config = {
  debug: false,
  administrators: [ADMIN, ADMIN_2],
  defaultBlacklistDuration: 7,
  reply: true,
  moderation: { enable: false, words: [], duration: 0 },
}

function session(userId: string, ...mentions: string[]): CommandSession {
  return {
    selfId: BOT,
    userId,
    elements: mentions.map(id => h.at(id)),
    text: (path, params) => params === undefined ? path : `${path} ${JSON.stringify(params)}`,
  }
}

describe('commands', () => {
  let now: number
  let registry: BanRegistry
  let service: TempBanService

  beforeEach(() => {
    now = 1_700_000_000_000
    registry = new BanRegistry(() => now)
    service = new TempBanService(config, registry, new AdministratorSet(config.administrators, { save: async () => {} }))
  })

  describe('tempban', () => {
    it('replies with the outcome', () => {
      expect(banCommand(session(ADMIN, ALICE), service, config, 15)).toBe(`${PREFIX}banned ["200",15]`)
      expect(banCommand(session(ALICE, ADMIN), service, config, 2)).toBe(`${PREFIX}retaliated ["1",5]`)
      expect(banCommand(session(ADMIN), service, config)).toBe(`${PREFIX}no_target`)
    })

    it('stays quiet when replies are off but still applies the ban', () => {
      expect(banCommand(session(ALICE), service, { ...config, reply: false }, 3)).toBeUndefined()
      expect(registry.expiresAt(ALICE)).toBe(now + 3 * MINUTE)
    })
  })

  describe('describeOutcome', () => {
    it('maps every failure to its message', () => {
      const s = session(ALICE)
      expect(describeOutcome(s, { status: 'self-banned', userId: ALICE, duration: 4, expiresAt: 0 })).toBe(`${PREFIX}self_banned [4]`)
      expect(describeOutcome(s, { status: 'target-is-admin', targetId: ADMIN })).toBe(`${PREFIX}target_is_admin ["1"]`)
      expect(describeOutcome(s, { status: 'invalid-duration', duration: 0 })).toBe(`${PREFIX}invalid_duration`)
      expect(describeOutcome(s, { status: 'not-permitted', targetId: '300' })).toBe(`${PREFIX}not_permitted`)
    })
  })

  describe('tempban.list', () => {
    it('is limited to administrators', () => {
      registry.ban(ALICE, 10)
      expect(listActiveBans(session(ALICE), service)).toBe(`${PREFIX}permission_denied`)
      expect(listActiveBans(session(''), service)).toBe(`${PREFIX}permission_denied`)
    })

    it('reports when nobody is banned', () => {
      expect(listActiveBans(session(ADMIN), service)).toBe(`${PREFIX}no_active_bans`)
    })

    it('lists active bans with their unblock time', () => {
      registry.ban(ALICE, 10)
      const line = `${ALICE} → ${new Date(now + 10 * MINUTE).toLocaleString()}`
      expect(listActiveBans(session(ADMIN), service)).toBe(`${PREFIX}active_bans_list ${JSON.stringify([1, line])}`)
    })
  })

  describe('tempban.admins', () => {
    it('lists configured administrators and the bot', () => {
      expect(listAdministrators(session(ADMIN_2), service)).toBe(`${PREFIX}admins_list [3,"1, 2, 10000"]`)
      expect(listAdministrators(session(ALICE), service)).toBe(`${PREFIX}permission_denied`)
    })
  })
})

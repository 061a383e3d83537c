import { Context, Logger } from 'koishi'
import { Config } from './config'
import { registerCommands } from './commands'
import { createRequestGate } from './middleware'
import { AdministratorSet, createScopeStore } from './services/administrators'
import { ModerationService } from './services/moderation'
import { BanRegistry } from './services/registry'
import { TempBanService } from './services/tempban'
import enUS from './locales/en-US'
import zhCN from './locales/zh-CN'

export * from './config'
export { BanRegistry } from './services/registry'
export { AdministratorSet } from './services/administrators'
export type { AdministratorStore } from './services/administrators'
export { TempBanService } from './services/tempban'
export type { Admission, BanEvent, BanOutcome } from './services/tempban'
export { normalizeUserId } from './utils/user-id'
export { createRequestGate } from './middleware'

export const name = 'llm-tempban'

export const usage = `
在 LLM 对话插件之前拦截被临时拉黑用户的消息。

- 管理员可以 @ 普通用户并使用 \`tempban [分钟]\` 拉黑对方。
- 普通用户只能拉黑自己；尝试拉黑管理员会被反拉黑，至少 5 分钟。
- 拉黑记录只保存在内存中，重启后清空。
`

const logger = new Logger('llm-tempban')

export function apply(ctx: Context, config: Config) {
  ctx.i18n.define('en-US', enUS)
  ctx.i18n.define('zh-CN', zhCN)

  // --- Services ---
  const registry = new BanRegistry()
  const administrators = new AdministratorSet(config.administrators, createScopeStore(ctx, config))
  const service = new TempBanService(config, registry, administrators)
  const moderation = new ModerationService(config.moderation)

  // --- Lifecycle ---
  ctx.on('ready', () => {
    logger.info('Plugin initialized. Waiting for the first message to resolve the bot id.')
    logger.info(`Administrators: ${administrators.list().length}, default duration: ${config.defaultBlacklistDuration} min`)
    if (config.debug) {
      logger.info('Debug mode enabled. Every admission decision will be logged.')
    }
  })

  // --- Request Gate ---
  // Prepended so that it runs before any chat plugin sees the message.
  const gate = createRequestGate(service, moderation, config)
  ctx.middleware((session, next) => gate(session, next), true)

  registerCommands(ctx, config, service)
}

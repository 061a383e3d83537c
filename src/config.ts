import { Schema } from 'koishi'

export interface ModerationConfig {
  enable: boolean
  words: string[]
  duration: number
}

export interface Config {
  debug: boolean
  administrators: string[]
  defaultBlacklistDuration: number
  reply: boolean
  moderation: ModerationConfig
}

export const Config: Schema<Config> = Schema.object({
  debug: Schema.boolean().description('开启调试日志。开启后，控制台将输出每一次请求的放行/拦截判断。').default(false),
  administrators: Schema.array(String).description('管理员列表 (用户ID)。管理员不会被拉黑，并可以拉黑其他普通用户。机器人自身的ID会在收到第一条消息时自动加入。').role('table').default([]),
  defaultBlacklistDuration: Schema.number().description('默认拉黑时长 (分钟)。未指定时长时使用此值。').default(5),
  reply: Schema.boolean().description('执行 `tempban` 指令后回复处理结果。关闭后仅输出日志。').default(true),

  moderation: Schema.object({
    enable: Schema.boolean().description('启用关键词自动拉黑。消息包含下列任一关键词时，发送者将被自动拉黑。').default(false),
    words: Schema.array(String).description('自动拉黑关键词 (不区分大小写)').role('table').default([]),
    duration: Schema.number().description('自动拉黑时长 (分钟)。设置为 0 时使用默认拉黑时长。').default(0).min(0),
  }).description('自动拉黑设置'),
}).description('LLM 临时拉黑插件配置')

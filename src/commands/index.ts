import { Context } from 'koishi'
import { Config } from '../config'
import { TempBanService } from '../services/tempban'

import { registerBanCommands } from './ban'
import { registerListCommands } from './list'

export function registerCommands(ctx: Context, config: Config, service: TempBanService) {
  registerBanCommands(ctx, config, service)
  registerListCommands(ctx, service)
}

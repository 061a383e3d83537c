import { Logger } from 'koishi'
import type { ModerationConfig } from '../config'

export class ModerationService {
  private logger: Logger
  private words: string[]

  constructor(private config: ModerationConfig) {
    this.logger = new Logger('llm-tempban:moderation')
    this.words = [...new Set(config.words.map(w => w.trim().toLowerCase()).filter(w => w))]
    if (config.enable) {
      this.logger.info(`Keyword moderation enabled with ${this.words.length} words.`)
    }
  }

  public get enabled(): boolean {
    return this.config.enable && this.words.length > 0
  }

  /** 0 means "use the default blacklist duration". */
  public get duration(): number | undefined {
    return this.config.duration > 0 ? this.config.duration : undefined
  }

  public check(content: string | undefined): string[] {
    if (!this.enabled || !content) return []
    const text = content.toLowerCase()
    return this.words.filter(word => text.includes(word))
  }
}

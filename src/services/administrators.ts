import { Context, Logger } from 'koishi'
import { Config } from '../config'
import { normalizeUserId } from '../utils/user-id'

export interface AdministratorStore {
  save(administrators: string[]): Promise<void>
}

/**
 * Writes the administrator list back into the plugin config so it shows up
 * in the console and survives a restart.
 */
export function createScopeStore(ctx: Context, config: Config): AdministratorStore {
  return {
    async save(administrators) {
      ctx.scope.update({ ...config, administrators }, false)
    },
  }
}

export class AdministratorSet {
  private logger: Logger
  private members: string[] = []

  constructor(initial: Iterable<unknown>, private store: AdministratorStore) {
    this.logger = new Logger('llm-tempban:admins')
    for (const raw of initial) {
      const id = normalizeUserId(raw)
      if (id && !this.members.includes(id)) this.members.push(id)
    }
  }

  public has(userId: string): boolean {
    return this.members.includes(userId)
  }

  public list(): string[] {
    return [...this.members]
  }

  /**
   * Adds `userId` and persists the new list. Returns false when it was
   * already a member, in which case nothing is saved.
   *
   * The save runs in the background; the in-memory membership holds even
   * if it fails.
   */
  public enroll(userId: string): boolean {
    if (!userId || this.has(userId)) return false
    this.members.push(userId)
    this.logger.info(`Added ${userId} to administrators.`)

    const snapshot = this.list()
    Promise.resolve()
      .then(() => this.store.save(snapshot))
      .catch((err) => this.logger.warn(`Failed to save administrators to config: ${err}`))
    return true
  }
}

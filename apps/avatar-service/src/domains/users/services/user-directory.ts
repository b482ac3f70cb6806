import type { AvatarIdentity, IdentityResolver } from "@monogram/avatar"
import type { Logger } from "@monogram/logger"
import { UserError } from "../model/user.errors"
import type { DisplayNameListener, User } from "../model/user.model"

export type UserDirectoryDeps = {
  logger: Logger
}

/**
 * In-memory user directory. Display-name changes are pushed to subscribers
 * before `setDisplayName` resolves.
 */
export class UserDirectory implements IdentityResolver {
  private readonly users = new Map<string, string>()
  private readonly listeners = new Set<DisplayNameListener>()
  private readonly logger: Logger

  constructor(deps: UserDirectoryDeps, seed: readonly User[] = []) {
    this.logger = deps.logger.child({ module: "user-directory" })

    for (const user of seed) this.users.set(user.id, user.displayName)
  }

  get size(): number {
    return this.users.size
  }

  getUser(userId: string): User | null {
    const displayName = this.users.get(userId)
    return displayName === undefined ? null : { id: userId, displayName }
  }

  async findIdentity(userId: string): Promise<AvatarIdentity | null> {
    if (!this.users.has(userId)) return null

    return {
      getUniqueId: () => userId,
      // Read on every call so a rename is seen by avatars already handed out.
      getDisplayName: async () => this.users.get(userId) ?? "",
    }
  }

  /**
   * Unchanged names notify nobody. A failing listener restores the previous
   * name, so retrying the rename notifies again.
   */
  async setDisplayName(userId: string, displayName: string): Promise<User> {
    const oldValue = this.users.get(userId)
    if (oldValue === undefined) throw UserError.notFound(userId)

    this.users.set(userId, displayName)

    if (oldValue !== displayName) {
      this.logger.debug("Display name changed", { userId })

      try {
        for (const listener of this.listeners) {
          await listener({ userId, oldValue, newValue: displayName })
        }
      } catch (err) {
        // A later rename wins over this rollback.
        if (this.users.get(userId) === displayName) this.users.set(userId, oldValue)

        this.logger.warn("Display name change rolled back", { userId, err })
        throw err
      }
    }

    return { id: userId, displayName }
  }

  /** Returns the unsubscribe function. */
  onDisplayNameChanged(listener: DisplayNameListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }
}

/**
 * The user an avatar is drawn for. Read-only to the avatar.
 */
export interface AvatarIdentity {
  /** Stable id, used in logs and error context only. */
  getUniqueId(): string

  /** Current display name. May be empty. */
  getDisplayName(): Promise<string>
}

export interface IdentityResolver {
  /** `null` when no such user exists. */
  findIdentity(userId: string): Promise<AvatarIdentity | null>
}

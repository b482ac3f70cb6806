import type { StoreData, StoreFile } from "@monogram/storage"

export type AvatarKind = "placeholder" | "custom" | "guest"

export type AvatarTheme = "light" | "dark"

/**
 * The avatar surface callers see, whatever produced the image.
 */
export interface Avatar {
  readonly kind: AvatarKind

  exists(): Promise<boolean>

  /**
   * Sized image for the user. `size` is a pixel edge length, or -1 for the
   * native size.
   */
  getFile(size: number, darkTheme?: boolean): Promise<StoreFile>

  /** Drop every stored image for the user. */
  remove(): Promise<void>

  set(data: StoreData): Promise<void>

  isCustomAvatar(): boolean

  /** Called whenever an input to the image changed, such as the display name. */
  userChanged(feature: string, oldValue: unknown, newValue: unknown): Promise<void>
}

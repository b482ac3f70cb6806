import { StoreError } from "./store-error"

/**
 * Folder and file names are single segments: no separators, no dot
 * segments, no NUL.
 */
export function assertValidName(name: string): void {
  if (name.length === 0) {
    throw StoreError.invalidName(name, "must not be empty")
  }
  if (name.includes("/") || name.includes("\\")) {
    throw StoreError.invalidName(name, "must not contain path separators")
  }
  if (name === "." || name === "..") {
    throw StoreError.invalidName(name, "must not be a dot segment")
  }
  if (name.includes("\0")) {
    throw StoreError.invalidName(name, "must not contain NUL")
  }
}

export function joinStorePath(folder: string, file: string): string {
  return `${folder}/${file}`
}

export function byName<T extends { readonly name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
}

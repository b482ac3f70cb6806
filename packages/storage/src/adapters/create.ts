import type { FolderStore } from "../ports/folder-store"
import {
  FileSystemFolderStore,
  type FsFolderStoreOptions,
} from "./fs-store"
import {
  MemoryFolderStore,
  type MemoryFolderStoreDeps,
  type MemoryFolderStoreOptions,
} from "./memory-store"

export type CreateMemoryFolderStoreOptions = MemoryFolderStoreDeps & MemoryFolderStoreOptions

export type CreateFsFolderStoreOptions = FsFolderStoreOptions

export function createMemoryFolderStore(
  options: CreateMemoryFolderStoreOptions = {},
): FolderStore {
  const { now, ...rest } = options

  return new MemoryFolderStore(now ? { now } : {}, rest)
}

export function createFsFolderStore(options: CreateFsFolderStoreOptions): FolderStore {
  return new FileSystemFolderStore(options)
}

export {
  type CreateFsFolderStoreOptions,
  type CreateMemoryFolderStoreOptions,
  createFsFolderStore,
  createMemoryFolderStore,
} from "./adapters/create"
export { FileSystemFolderStore, type FsFolderStoreOptions } from "./adapters/fs-store"
export {
  MemoryFolderStore,
  type MemoryFolderStoreDeps,
  type MemoryFolderStoreOptions,
} from "./adapters/memory-store"
export { StoreError, type StoreErrorCode, type StoreOperation } from "./core/store-error"
export type {
  Bytes,
  FileStat,
  FolderStore,
  StoreData,
  StoreFile,
  StoreFolder,
} from "./ports/folder-store"
export type {
  GetFileResult,
  GetFolderResult,
  NewFileResult,
  NewFolderResult,
} from "./ports/store-result"

import type {
  GetFileResult,
  GetFolderResult,
  NewFileResult,
  NewFolderResult,
} from "./store-result"

export type Bytes = number

export type StoreData = Buffer | Uint8Array

export interface FileStat {
  sizeInBytes: Bytes
  lastModified: Date
}

/**
 * Handle to one file inside a folder. Handles are cheap and do not pin the
 * entry: operations on a deleted file fail with `store_file_missing`,
 * except `delete()` which is a no-op.
 */
export interface StoreFile {
  readonly name: string
  /** `<folder>/<file>`, for logs and error context. */
  readonly path: string

  stat(): Promise<FileStat>
  read(): Promise<Buffer>
  /** Replace the file content. Readers see the old bytes or the new ones, never a mix. */
  write(data: StoreData): Promise<void>
  delete(): Promise<void>
}

export interface StoreFolder {
  readonly name: string

  /** Every file in the folder, sorted by name. */
  list(): Promise<StoreFile[]>
  getFile(name: string): Promise<GetFileResult>
  /**
   * Create a file holding `data`, empty when omitted. The entry becomes
   * visible with its full content. Answers `exists` and leaves the entry
   * untouched when another writer created it first.
   */
  newFile(name: string, data?: StoreData): Promise<NewFileResult>
  /** Delete the folder and everything in it. No-op if already gone. */
  delete(): Promise<void>
}

/**
 * Hierarchical store holding one folder per owner.
 *
 * Names are single path segments. Write and delete failures caused by
 * permissions, quota or a read-only backend surface as `store_not_permitted`.
 */
export interface FolderStore {
  getFolder(name: string): Promise<GetFolderResult>
  newFolder(name: string): Promise<NewFolderResult>
  listFolders(): Promise<StoreFolder[]>
}

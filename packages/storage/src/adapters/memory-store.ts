import { StoreError } from "../core/store-error"
import { assertValidName, byName, joinStorePath } from "../core/store-name"
import type {
  Bytes,
  FileStat,
  FolderStore,
  StoreData,
  StoreFile,
  StoreFolder,
} from "../ports/folder-store"
import type {
  GetFileResult,
  GetFolderResult,
  NewFileResult,
  NewFolderResult,
} from "../ports/store-result"

interface StoredFile {
  data: Buffer
  lastModified: Date
}

export interface MemoryFolderStoreDeps {
  now?: () => Date
}

export interface MemoryFolderStoreOptions {
  /** Total bytes the store may hold. Writes past it are not permitted. */
  quotaBytes?: Bytes
  /** Reject every create, write and delete. */
  readOnly?: boolean
}

class MemoryState {
  readonly folders = new Map<string, Map<string, StoredFile>>()

  constructor(
    private readonly deps: MemoryFolderStoreDeps,
    private readonly options: MemoryFolderStoreOptions,
  ) {}

  now(): Date {
    return this.deps.now?.() ?? new Date()
  }

  assertWritable(path: string, operation: "create" | "write" | "delete"): void {
    if (this.options.readOnly) {
      throw StoreError.notPermitted(path, operation)
    }
  }

  assertWithinQuota(
    path: string,
    operation: "create" | "write",
    previousBytes: Bytes,
    nextBytes: Bytes,
  ): void {
    const quota = this.options.quotaBytes
    if (quota === undefined) return

    if (this.usedBytes() - previousBytes + nextBytes > quota) {
      throw StoreError.notPermitted(path, operation)
    }
  }

  private usedBytes(): Bytes {
    let total = 0

    for (const files of this.folders.values()) {
      for (const file of files.values()) {
        total += file.data.length
      }
    }

    return total
  }
}

class MemoryFile implements StoreFile {
  readonly path: string

  constructor(
    private readonly state: MemoryState,
    private readonly folder: string,
    readonly name: string,
  ) {
    this.path = joinStorePath(folder, name)
  }

  async stat(): Promise<FileStat> {
    const stored = this.stored()

    return { sizeInBytes: stored.data.length, lastModified: stored.lastModified }
  }

  async read(): Promise<Buffer> {
    return Buffer.from(this.stored().data)
  }

  async write(data: StoreData): Promise<void> {
    this.state.assertWritable(this.path, "write")
    const stored = this.stored()
    const buffer = Buffer.from(data)

    this.state.assertWithinQuota(this.path, "write", stored.data.length, buffer.length)

    stored.data = buffer
    stored.lastModified = this.state.now()
  }

  async delete(): Promise<void> {
    this.state.assertWritable(this.path, "delete")
    this.state.folders.get(this.folder)?.delete(this.name)
  }

  private stored(): StoredFile {
    const stored = this.state.folders.get(this.folder)?.get(this.name)
    if (!stored) throw StoreError.fileMissing(this.path)

    return stored
  }
}

class MemoryFolder implements StoreFolder {
  constructor(
    private readonly state: MemoryState,
    readonly name: string,
  ) {}

  async list(): Promise<StoreFile[]> {
    const files = this.state.folders.get(this.name)
    if (!files) return []

    return [...files.keys()].map((name) => new MemoryFile(this.state, this.name, name)).sort(byName)
  }

  async getFile(name: string): Promise<GetFileResult> {
    assertValidName(name)

    if (!this.state.folders.get(this.name)?.has(name)) return { kind: "not_found" }

    return { kind: "found", file: new MemoryFile(this.state, this.name, name) }
  }

  async newFile(name: string, data: StoreData = new Uint8Array()): Promise<NewFileResult> {
    assertValidName(name)
    const file = new MemoryFile(this.state, this.name, name)
    const files = this.state.folders.get(this.name) ?? new Map<string, StoredFile>()

    if (files.has(name)) return { kind: "exists", file }

    const buffer = Buffer.from(data)
    this.state.assertWritable(file.path, "create")
    this.state.assertWithinQuota(file.path, "create", 0, buffer.length)
    files.set(name, { data: buffer, lastModified: this.state.now() })
    this.state.folders.set(this.name, files)

    return { kind: "created", file }
  }

  async delete(): Promise<void> {
    this.state.assertWritable(this.name, "delete")
    this.state.folders.delete(this.name)
  }
}

export class MemoryFolderStore implements FolderStore {
  private readonly state: MemoryState

  constructor(deps: MemoryFolderStoreDeps = {}, options: MemoryFolderStoreOptions = {}) {
    this.state = new MemoryState(deps, options)
  }

  async getFolder(name: string): Promise<GetFolderResult> {
    assertValidName(name)

    if (!this.state.folders.has(name)) return { kind: "not_found" }

    return { kind: "found", folder: new MemoryFolder(this.state, name) }
  }

  async newFolder(name: string): Promise<NewFolderResult> {
    assertValidName(name)
    const folder = new MemoryFolder(this.state, name)

    if (this.state.folders.has(name)) return { kind: "exists", folder }

    this.state.assertWritable(name, "create")
    this.state.folders.set(name, new Map())

    return { kind: "created", folder }
  }

  async listFolders(): Promise<StoreFolder[]> {
    return [...this.state.folders.keys()].sort().map((name) => new MemoryFolder(this.state, name))
  }
}

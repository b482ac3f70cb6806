import { randomUUID } from "node:crypto"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { StoreError, type StoreOperation } from "../core/store-error"
import { assertValidName, byName, joinStorePath } from "../core/store-name"
import type { FileStat, FolderStore, StoreData, StoreFile, StoreFolder } from "../ports/folder-store"
import type {
  GetFileResult,
  GetFolderResult,
  NewFileResult,
  NewFolderResult,
} from "../ports/store-result"

export interface FsFolderStoreOptions {
  rootDir: string
}

const NOT_PERMITTED_CODES: ReadonlySet<string> = new Set([
  "EACCES",
  "EPERM",
  "EROFS",
  "EDQUOT",
  "ENOSPC",
])

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code
  }

  return undefined
}

export function isNotFoundError(err: unknown): boolean {
  return errnoCode(err) === "ENOENT"
}

/**
 * Map a filesystem failure to the store's error vocabulary. Errors the store
 * has no name for are returned unchanged.
 */
export function toStoreError(err: unknown, storePath: string, operation: StoreOperation): unknown {
  const code = errnoCode(err)

  if (code !== undefined && NOT_PERMITTED_CODES.has(code)) {
    return StoreError.notPermitted(storePath, operation, err)
  }
  if (code === "ENOENT") {
    return StoreError.fileMissing(storePath, err)
  }

  return err
}

// encodeURIComponent never emits "%" followed by a non-hex character.
const TEMP_PREFIX = "%tmp-"

function isTempEntry(entryName: string): boolean {
  return entryName.startsWith(TEMP_PREFIX)
}

/** Writes `data` to a fresh, unlisted file in `dir` and returns its path. */
async function writeTemp(dir: string, data: StoreData): Promise<string> {
  const tempPath = path.join(dir, `${TEMP_PREFIX}${randomUUID()}`)
  await fs.writeFile(tempPath, data, { flag: "wx" })
  return tempPath
}

function encodeName(name: string): string {
  assertValidName(name)

  return encodeURIComponent(name)
}

class FsFile implements StoreFile {
  readonly path: string

  constructor(
    private readonly filePath: string,
    folder: string,
    readonly name: string,
  ) {
    this.path = joinStorePath(folder, name)
  }

  async stat(): Promise<FileStat> {
    try {
      const stat = await fs.stat(this.filePath)

      return { sizeInBytes: stat.size, lastModified: stat.mtime }
    } catch (err) {
      if (isNotFoundError(err)) throw StoreError.fileMissing(this.path, err)
      throw err
    }
  }

  async read(): Promise<Buffer> {
    try {
      return await fs.readFile(this.filePath)
    } catch (err) {
      if (isNotFoundError(err)) throw StoreError.fileMissing(this.path, err)
      throw err
    }
  }

  async write(data: StoreData): Promise<void> {
    try {
      await fs.stat(this.filePath)

      const tempPath = await writeTemp(path.dirname(this.filePath), data)
      try {
        await fs.rename(tempPath, this.filePath)
      } finally {
        await fs.rm(tempPath, { force: true })
      }
    } catch (err) {
      throw toStoreError(err, this.path, "write")
    }
  }

  async delete(): Promise<void> {
    try {
      await fs.unlink(this.filePath)
    } catch (err) {
      if (isNotFoundError(err)) return
      throw toStoreError(err, this.path, "delete")
    }
  }
}

class FsFolder implements StoreFolder {
  constructor(
    private readonly dir: string,
    readonly name: string,
  ) {}

  async list(): Promise<StoreFile[]> {
    try {
      const entries = await fs.readdir(this.dir, { withFileTypes: true })

      return entries
        .filter((entry) => entry.isFile() && !isTempEntry(entry.name))
        .map((entry) => this.file(decodeURIComponent(entry.name)))
        .sort(byName)
    } catch (err) {
      if (isNotFoundError(err)) return []
      throw err
    }
  }

  async getFile(name: string): Promise<GetFileResult> {
    const file = this.file(name)

    try {
      const stat = await fs.stat(this.filePathOf(name))
      if (!stat.isFile()) return { kind: "not_found" }

      return { kind: "found", file }
    } catch (err) {
      if (isNotFoundError(err)) return { kind: "not_found" }
      throw err
    }
  }

  async newFile(name: string, data: StoreData = new Uint8Array()): Promise<NewFileResult> {
    const file = this.file(name)

    try {
      await fs.mkdir(this.dir, { recursive: true })

      // link() publishes the finished file and fails with EEXIST if another writer won.
      const tempPath = await writeTemp(this.dir, data)
      try {
        await fs.link(tempPath, this.filePathOf(name))
      } finally {
        await fs.rm(tempPath, { force: true })
      }

      return { kind: "created", file }
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return { kind: "exists", file }
      throw toStoreError(err, file.path, "create")
    }
  }

  async delete(): Promise<void> {
    try {
      await fs.rm(this.dir, { recursive: true, force: true })
    } catch (err) {
      throw toStoreError(err, this.name, "delete")
    }
  }

  private file(name: string): FsFile {
    return new FsFile(this.filePathOf(name), this.name, name)
  }

  private filePathOf(name: string): string {
    return path.join(this.dir, encodeName(name))
  }
}

export class FileSystemFolderStore implements FolderStore {
  private readonly rootDir: string

  constructor(options: FsFolderStoreOptions) {
    this.rootDir = path.resolve(options.rootDir)
  }

  async getFolder(name: string): Promise<GetFolderResult> {
    const dir = this.resolveFolderDir(name)

    try {
      const stat = await fs.stat(dir)
      if (!stat.isDirectory()) return { kind: "not_found" }

      return { kind: "found", folder: new FsFolder(dir, name) }
    } catch (err) {
      if (isNotFoundError(err)) return { kind: "not_found" }
      throw err
    }
  }

  async newFolder(name: string): Promise<NewFolderResult> {
    const dir = this.resolveFolderDir(name)
    const folder = new FsFolder(dir, name)

    try {
      await fs.mkdir(this.rootDir, { recursive: true })
      await fs.mkdir(dir)

      return { kind: "created", folder }
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return { kind: "exists", folder }
      throw toStoreError(err, name, "create")
    }
  }

  async listFolders(): Promise<StoreFolder[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true })

      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => {
          const name = decodeURIComponent(entry.name)
          return new FsFolder(this.resolveFolderDir(name), name)
        })
        .sort(byName)
    } catch (err) {
      if (isNotFoundError(err)) return []
      throw err
    }
  }

  private resolveFolderDir(name: string): string {
    const dir = path.join(this.rootDir, encodeName(name))

    if (path.dirname(path.resolve(dir)) !== this.rootDir) {
      throw StoreError.invalidName(name, "resolves outside the store root")
    }

    return dir
  }
}

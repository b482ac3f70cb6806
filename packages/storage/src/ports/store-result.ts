import type { StoreFile, StoreFolder } from "./folder-store"

export type GetFileResult = { kind: "found"; file: StoreFile } | { kind: "not_found" }

export type NewFileResult = { kind: "created"; file: StoreFile } | { kind: "exists"; file: StoreFile }

export type GetFolderResult = { kind: "found"; folder: StoreFolder } | { kind: "not_found" }

export type NewFolderResult =
  | { kind: "created"; folder: StoreFolder }
  | { kind: "exists"; folder: StoreFolder }

import { BaseError } from "@monogram/errors"

export type StoreErrorCode = "store_not_permitted" | "store_file_missing" | "store_invalid_name"

export type StoreOperation = "create" | "write" | "delete"

export class StoreError extends BaseError<StoreErrorCode> {
  static notPermitted(path: string, operation: StoreOperation, cause?: unknown): StoreError {
    return new StoreError(`Not permitted to ${operation} ${path}`, {
      code: "store_not_permitted",
      context: { path, operation },
      cause,
    })
  }

  static fileMissing(path: string, cause?: unknown): StoreError {
    return new StoreError(`File ${path} no longer exists`, {
      code: "store_file_missing",
      context: { path },
      cause,
    })
  }

  static invalidName(name: string, reason: string): StoreError {
    return new StoreError(`Invalid store name "${name}": ${reason}`, {
      code: "store_invalid_name",
      context: { name, reason },
    })
  }
}

import { createFsFolderStore, createMemoryFolderStore, type FolderStore } from "@monogram/storage"
import type { AppConfig } from "../config"

export type InfraServices = {
  store: FolderStore
}

export function createInfraServices(config: AppConfig): InfraServices {
  const store =
    config.store.driver === "memory"
      ? createMemoryFolderStore(
          config.store.quotaBytes !== undefined ? { quotaBytes: config.store.quotaBytes } : {},
        )
      : createFsFolderStore({ rootDir: config.store.rootDir })

  return { store }
}

import type { LifecycleHook } from "@monogram/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:subscriptions",
      fn: async () => {
        for (const unsubscribe of context.subscriptions.splice(0)) unsubscribe()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks

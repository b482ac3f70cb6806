import { z } from "zod/mini"

export const updateDisplayNameRequestSchema = z.object({
  displayName: z
    .string()
    .check(z.maxLength(255, { error: "Display name cannot exceed 255 characters" })),
})

export type UpdateDisplayNameRequest = z.infer<typeof updateDisplayNameRequestSchema>

export const userParamsSchema = z.object({
  userId: z.string().check(z.minLength(1, { error: "User id cannot be empty" })),
})

import { z } from "zod/mini"

const INTEGER = /^-?\d+$/

export const userIdSchema = z.string().check(z.minLength(1, { error: "User id cannot be empty" }))

/** `size` is an integer edge length no larger than `maxSize`; -1 asks for the native size. */
export function avatarParamsSchema(maxSize: number) {
  return z.object({
    userId: userIdSchema,
    size: z.pipe(
      z.pipe(
        z.string().check(z.regex(INTEGER, { error: "Size must be an integer" })),
        z.transform((value: string) => Number(value)),
      ),
      z.number().check(z.lte(maxSize, { error: `Size cannot exceed ${maxSize}` })),
    ),
  })
}

export const userParamsSchema = z.object({ userId: userIdSchema })

import type { ContentfulStatusCode } from "hono/utils/http-status"

/** Status codes that may carry a JSON error body. */
export type StatusCode = ContentfulStatusCode

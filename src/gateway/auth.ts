// src/gateway/auth.ts — Bearer token middleware for the HTTP routes

import { createHash, timingSafeEqual } from "node:crypto"
import type { Context, Next } from "hono"

/** Constant-time comparison, also for different lengths */
export function safeCompare(a: string, b: string): boolean {
  const bufA = createHash("sha256").update(a).digest()
  const bufB = createHash("sha256").update(b).digest()
  return timingSafeEqual(bufA, bufB)
}

/** Require `Authorization: Bearer <token>` when a token is configured; open otherwise. */
export function bearerAuth(token: string | undefined) {
  return async (c: Context, next: Next) => {
    if (!token) return next()

    const authHeader = c.req.header("Authorization")
    if (!authHeader?.startsWith("Bearer ")) {
      return c.json({ error: "Unauthorized", code: "AUTH_REQUIRED" }, 401)
    }
    if (!safeCompare(authHeader.slice(7), token)) {
      return c.json({ error: "Unauthorized", code: "AUTH_INVALID" }, 401)
    }
    return next()
  }
}

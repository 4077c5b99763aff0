import type { Request } from "express";
import crypto from "node:crypto";
import pool from "../db/connection.js";

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

export interface AuthenticatedUser {
  userId: number;
  /** Stored user time zone; null when the user never set one. */
  timezone: string | null;
}

interface CachedToken extends AuthenticatedUser {
  expiresAt: number;
  lastAccess: number;
}

const tokenCache = new Map<string, CachedToken>();
const TOKEN_CACHE_TTL = 60_000; // 1 minute
const TOKEN_CACHE_MAX = 1000;

function cacheKey(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

export function clearTokenCache(): void {
  tokenCache.clear();
}

/**
 * Authenticates a Bearer token from the request and returns the user it
 * belongs to. Uses an in-memory cache (1-min TTL, max 1000 entries) to avoid
 * hitting the database on every MCP request; on a miss, looks the token up in
 * auth_tokens and touches users.last_login when it is more than an hour old.
 *
 * Cache eviction: when full, removes the least recently used 25% of entries
 * instead of clearing everything.
 */
export async function authenticateToken(req: Pick<Request, "headers">): Promise<AuthenticatedUser> {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith("Bearer ")) {
    throw new AuthError("Missing or invalid Authorization header");
  }

  const token = authHeader.slice(7).trim();
  if (!token) {
    throw new AuthError("Missing or invalid Authorization header");
  }
  const key = cacheKey(token);

  const cached = tokenCache.get(key);
  if (cached && cached.expiresAt > Date.now()) {
    cached.lastAccess = Date.now();
    return { userId: cached.userId, timezone: cached.timezone };
  }
  if (cached) {
    tokenCache.delete(key);
  }

  const { rows } = await pool.query<{ user_id: number; timezone: string | null }>(
    `SELECT t.user_id, s.timezone
     FROM auth_tokens t
     LEFT JOIN user_settings s ON s.user_id = t.user_id
     WHERE t.token = $1 AND t.expires_at > NOW()`,
    [token]
  );
  if (rows.length === 0) {
    throw new AuthError("Invalid or expired token");
  }
  const { user_id: userId, timezone } = rows[0];

  await pool.query(
    `UPDATE users SET last_login = NOW()
     WHERE id = $1 AND (last_login IS NULL OR last_login < NOW() - INTERVAL '1 hour')`,
    [userId]
  );

  if (tokenCache.size >= TOKEN_CACHE_MAX) {
    const toDelete = Math.floor(TOKEN_CACHE_MAX * 0.25);
    const entries = Array.from(tokenCache.entries())
      .sort((a, b) => a[1].lastAccess - b[1].lastAccess);
    for (let i = 0; i < toDelete && i < entries.length; i++) {
      tokenCache.delete(entries[i][0]);
    }
  }

  const now = Date.now();
  tokenCache.set(key, { userId, timezone, expiresAt: now + TOKEN_CACHE_TTL, lastAccess: now });

  return { userId, timezone };
}

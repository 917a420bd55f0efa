/**
 * Auth: scoped bearer tokens for the fleet API.
 *
 * Provides:
 * - `buildTokenMap` reading the scoped tokens from the environment
 * - `extractBearerToken` for Authorization headers
 * - `requirePermission` middleware for Hono routes
 */

import type { Context, Next } from "hono";

// ---------------------------------------------------------------------------
// Scopes and permissions
// ---------------------------------------------------------------------------

export type FleetPermission = "fleet:describe" | "fleet:refresh" | "fleet:admin";

/** Token scopes, each granting a fixed set of permissions. */
export type TokenScope = "read" | "dispatcher" | "admin";

const SCOPE_PERMISSIONS: Record<TokenScope, ReadonlySet<FleetPermission>> = {
  read: new Set(["fleet:describe"]),
  dispatcher: new Set(["fleet:describe", "fleet:refresh"]),
  admin: new Set(["fleet:describe", "fleet:refresh", "fleet:admin"]),
};

export function scopeGrants(scope: TokenScope, permission: FleetPermission): boolean {
  return SCOPE_PERMISSIONS[scope].has(permission);
}

/**
 * Build a token-to-scope map from environment variables.
 *
 * - `FLEET_API_TOKEN_READ` describes fleets
 * - `FLEET_API_TOKEN_DISPATCHER` describes and refreshes
 * - `FLEET_API_TOKEN_ADMIN` may do anything
 *
 * A token configured under several variables keeps the widest scope.
 */
export function buildTokenMap(env: Record<string, string | undefined> = process.env): Map<string, TokenScope> {
  const tokens = new Map<string, TokenScope>();

  const scopedVars: [string, TokenScope][] = [
    ["FLEET_API_TOKEN_READ", "read"],
    ["FLEET_API_TOKEN_DISPATCHER", "dispatcher"],
    ["FLEET_API_TOKEN_ADMIN", "admin"],
  ];

  for (const [envVar, scope] of scopedVars) {
    const val = env[envVar]?.trim();
    if (val) tokens.set(val, scope);
  }

  return tokens;
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/**
 * Extract the bearer token from an Authorization header value.
 * Returns `null` if the header is missing, empty, or not a Bearer scheme.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;
  const token = trimmed.slice(7).trim();
  return token || null;
}

/**
 * Reject requests whose bearer token lacks `permission`.
 * 401 without a known token, 403 when the token's scope is too narrow.
 */
export function requirePermission(tokenMap: Map<string, TokenScope>, permission: FleetPermission) {
  return async (c: Context, next: Next) => {
    const token = extractBearerToken(c.req.header("Authorization"));
    if (!token) {
      return c.json({ error: "Authentication required" }, 401);
    }

    const scope = tokenMap.get(token);
    if (scope === undefined) {
      return c.json({ error: "Invalid or expired token" }, 401);
    }

    if (!scopeGrants(scope, permission)) {
      return c.json({ error: "Insufficient scope", required: permission, provided: scope }, 403);
    }

    return next();
  };
}

// src/types/claims.ts
import type { JWTPayload } from "jose";

/**
 * Id-token claims we require from the OIDC provider. `projects` arrives as
 * an object or as a JSON-encoded string depending on the provider version,
 * see normalizeProjects().
 */
export interface IdentityClaims extends JWTPayload {
  iss: string;
  aud: string | string[];
  iat: number;
  exp: number;
  short_name: string;
  projects: unknown;
}

export const REQUIRED_CLAIMS = ["aud", "exp", "iss", "iat", "short_name", "projects"] as const;

/** Project identifier -> project record. Entries are not shape-checked. */
export type ProjectsClaim = Record<string, unknown>;

export interface ProjectGrant {
  name: string;     // human project name
  username: string; // per-project account on the platform
}

/**
 * Projects usable on the current platform. Written once per login,
 * read-only afterwards.
 */
export type AuthorizationState = Readonly<Record<string, Readonly<ProjectGrant>>>;

/** What verifyIdToken() stashes on req.auth. */
export interface AuthContext {
  user: string;
  authState: AuthorizationState;
}

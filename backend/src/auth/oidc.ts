// src/auth/oidc.ts
import { Request, Response, NextFunction } from "express";
import { AuthenticationError, AuthorizationError } from "../errors";
import type { AuthContext } from "../types/claims";
import type { Logger } from "../logger";
import { OidcDiscoveryClient } from "./discovery";
import { SigningKeyResolver } from "./jwks";
import { verifyIdToken as verifyToken } from "./verify";
import { deriveAuthorizationState, normalizeProjects } from "./projects";

export const ID_TOKEN_HEADER = "X-Auth-Id-Token";

export interface OidcAuthenticatorOptions {
  /** Discovery base URL; also the exact "iss" we accept. */
  oidcServer: string;
  audience: string;
  leeway: number;
  /** Resource name a project must grant to be usable here. */
  platform: string;
  log: Logger;
  discovery?: OidcDiscoveryClient;
  keys?: SigningKeyResolver;
  clock?: () => Date;
}

/**
 * Turns a bearer id token into the user's name and authorization state:
 * discovery -> key lookup -> verification -> projects normalization ->
 * platform filter. Nothing is cached between calls.
 */
export class OidcAuthenticator {
  private readonly log: Logger;
  private readonly discovery: OidcDiscoveryClient;
  private readonly keys: SigningKeyResolver;

  constructor(private readonly opts: OidcAuthenticatorOptions) {
    this.log = opts.log.child({ component: "oidc" });
    this.discovery = opts.discovery ?? new OidcDiscoveryClient(this.log);
    this.keys = opts.keys ?? new SigningKeyResolver(this.log);
  }

  async authenticate(token: string): Promise<AuthContext> {
    const { signingAlgorithms, jwksUri } = await this.discovery.fetch(this.opts.oidcServer);
    const key = await this.keys.resolve(jwksUri, token);
    const claims = await verifyToken(token, key, {
      allowedAlgorithms: signingAlgorithms,
      audience: this.opts.audience,
      issuer: this.opts.oidcServer,
      leewaySeconds: this.opts.leeway,
      clock: this.opts.clock
    });

    const projects = normalizeProjects(claims, this.log);
    const authState = deriveAuthorizationState(projects, this.opts.platform);
    if (Object.keys(authState).length === 0) {
      this.log.info({ user: claims.short_name, platform: this.opts.platform }, "no projects with valid platform");
      throw new AuthorizationError("no projects with valid platform");
    }

    this.log.debug({ user: claims.short_name, projects: Object.keys(authState) }, "id token accepted");
    return { user: claims.short_name, authState };
  }
}

export function extractIdToken(req: Request): string {
  const token = req.header(ID_TOKEN_HEADER);
  if (!token) throw new AuthenticationError(`Missing ${ID_TOKEN_HEADER} header`);
  return token;
}

/** Middleware: authenticates the X-Auth-Id-Token header and sets req.auth. */
export function verifyIdToken(authenticator: OidcAuthenticator) {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.auth = await authenticator.authenticate(extractIdToken(req));
      next();
    } catch (e) {
      next(e);
    }
  };
}

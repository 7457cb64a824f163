// src/auth/discovery.ts
import { OidcConfigurationDto } from "../types/dto";
import { ServiceError } from "../errors";
import type { Logger } from "../logger";

export interface OidcConfiguration {
  signingAlgorithms: string[];
  jwksUri: string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Fetches the provider's discovery document on every call. No cache and
 * no retry: a failed fetch is a 500 for the request that needed it.
 */
export class OidcDiscoveryClient {
  constructor(
    private readonly log: Logger,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {}

  async fetch(serverBaseUrl: string): Promise<OidcConfiguration> {
    const url = `${serverBaseUrl.replace(/\/+$/, "")}/.well-known/openid-configuration`;
    this.log.debug({ url }, "requesting OIDC configuration");

    let body: unknown;
    try {
      const res = await this.fetchImpl(url, { headers: { accept: "application/json" } });
      if (!res.ok) throw new Error(`unexpected status ${res.status}`);
      body = await res.json();
    } catch (e) {
      this.log.error({ err: e, url }, "failed to fetch OIDC configuration");
      throw new ServiceError("oidc_discovery_failed", { cause: e });
    }

    const parsed = OidcConfigurationDto.safeParse(body);
    if (!parsed.success) {
      this.log.error({ url, issues: parsed.error.issues }, "malformed OIDC configuration");
      throw new ServiceError("oidc_discovery_failed", { cause: parsed.error });
    }

    return {
      signingAlgorithms: [...new Set(parsed.data.id_token_signing_alg_values_supported)],
      jwksUri: parsed.data.jwks_uri
    };
  }
}

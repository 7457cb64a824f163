// src/auth/jwks.ts
import { createRemoteJWKSet, decodeProtectedHeader, errors } from "jose";
import type { FlattenedJWSInput, JWSHeaderParameters, KeyLike, ProtectedHeaderParameters } from "jose";
import { AuthenticationError, ServiceError } from "../errors";
import type { Logger } from "../logger";

export type SigningKey = KeyLike | Uint8Array;

/** Key lookup as returned by jose's createRemoteJWKSet / createLocalJWKSet. */
export type KeySet = (protectedHeader: JWSHeaderParameters, token: FlattenedJWSInput) => Promise<SigningKey>;

/** Builds the key-set client for one jwks_uri. */
export type KeySetFactory = (jwksUri: string) => KeySet;

export const KEY_SET_USER_AGENT = "notebook-portal-auth (jose)";

export const remoteKeySet: KeySetFactory = (jwksUri) =>
  createRemoteJWKSet(new URL(jwksUri), {
    headers: { "User-Agent": KEY_SET_USER_AGENT }
  });

/**
 * Resolves the key that signed a token from the provider's key set,
 * selected by the protected header's "kid". A fresh key-set client is
 * built per call.
 */
export class SigningKeyResolver {
  constructor(
    private readonly log: Logger,
    private readonly keySetFactory: KeySetFactory = remoteKeySet
  ) {}

  async resolve(jwksUri: string, token: string): Promise<SigningKey> {
    let header: ProtectedHeaderParameters;
    try {
      header = decodeProtectedHeader(token);
    } catch {
      throw new AuthenticationError("Invalid JWT token: Invalid header");
    }

    const { kid } = header;
    if (typeof kid !== "string") {
      throw new AuthenticationError('Unable to find a signing key that matches: ""');
    }

    const [protectedPart, payload, signature] = token.split(".");
    const getKey = this.keySetFactory(jwksUri);
    try {
      return await getKey(header, { protected: protectedPart, payload: payload ?? "", signature: signature ?? "" });
    } catch (e) {
      if (e instanceof errors.JWKSNoMatchingKey) {
        throw new AuthenticationError(`Unable to find a signing key that matches: "${kid}"`);
      }
      if (e instanceof errors.JWKSMultipleMatchingKeys) {
        throw new AuthenticationError(`Ambiguous signing key for: "${kid}"`);
      }
      if (e instanceof errors.JOSENotSupported) {
        throw new AuthenticationError(`Invalid JWT token: ${e.message}`);
      }
      this.log.error({ err: e, jwksUri }, "failed to fetch signing key set");
      throw new ServiceError("jwks_fetch_failed", { cause: e });
    }
  }
}

// src/auth/verify.ts
import { errors, jwtVerify } from "jose";
import type { JWTPayload } from "jose";
import { AuthenticationError } from "../errors";
import { IdentityClaims, REQUIRED_CLAIMS } from "../types/claims";
import type { SigningKey } from "./jwks";

export interface VerifyOptions {
  allowedAlgorithms: string[];
  audience: string;
  issuer: string;
  /** Seconds of clock skew tolerated on iat and exp; may be fractional. */
  leewaySeconds: number;
  clock?: () => Date;
}

/** Maps jose's errors onto stable reason strings. */
function describe(e: unknown): string {
  if (e instanceof errors.JWTExpired) return "Signature has expired";
  if (e instanceof errors.JWTClaimValidationFailed) {
    if (e.reason === "missing") return `Token is missing the "${e.claim}" claim`;
    if (e.claim === "aud") return "Invalid audience";
    if (e.claim === "iss") return "Invalid issuer";
    return e.message;
  }
  if (e instanceof errors.JWSSignatureVerificationFailed) return "Signature verification failed";
  if (e instanceof errors.JOSEAlgNotAllowed) return "The specified alg value is not allowed";
  if (e instanceof Error) return e.message;
  return "Invalid token";
}

/**
 * Verifies signature and claims of an id token.
 *
 * Only algorithms advertised by the provider are accepted, whatever the
 * token header claims. Time checks use the clock's fractional seconds:
 * `iat > now + leeway` is not yet valid, `exp <= now - leeway` is expired.
 */
export async function verifyIdToken(token: string, key: SigningKey, opts: VerifyOptions): Promise<IdentityClaims> {
  const currentDate = (opts.clock ?? (() => new Date()))();
  const now = currentDate.getTime() / 1000;

  let payload: JWTPayload;
  try {
    ({ payload } = await jwtVerify(token, key, {
      algorithms: opts.allowedAlgorithms,
      audience: opts.audience,
      issuer: opts.issuer,
      requiredClaims: [...REQUIRED_CLAIMS],
      // jose floors the clock; the exact exp check follows below
      clockTolerance: opts.leewaySeconds + 1,
      currentDate
    }));
  } catch (e) {
    throw new AuthenticationError(`Invalid JWT token: ${describe(e)}`);
  }

  // jose only type-checks iat
  const { iat, exp, iss, aud } = payload;
  if (typeof iat !== "number" || typeof exp !== "number" || typeof iss !== "string" || aud === undefined) {
    throw new AuthenticationError("Invalid JWT token: Malformed registered claims");
  }
  if (iat > now + opts.leewaySeconds) {
    throw new AuthenticationError("Invalid JWT token: The token is not yet valid (iat)");
  }
  if (exp <= now - opts.leewaySeconds) {
    throw new AuthenticationError("Invalid JWT token: Signature has expired");
  }

  const shortName = payload["short_name"];
  if (typeof shortName !== "string" || shortName === "") {
    throw new AuthenticationError("Invalid token: Missing short_name claim");
  }

  return { ...payload, iat, exp, iss, aud, short_name: shortName, projects: payload["projects"] };
}

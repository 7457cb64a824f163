// Shared fixtures for the unit suites.
import type { Express } from "express";
import pino from "pino";
import { SignJWT, createLocalJWKSet, exportJWK, generateKeyPair } from "jose";
import type { JWK, KeyLike } from "jose";
import { SpawnerState } from "../src/spawner/state";
import type { SpawnerStateStore } from "../src/db/spawner-state";

export const NOW = 1_700_000_000;
export const ISSUER = "https://idp.example.org/realms/portal";
export const AUDIENCE = "jupyter";
export const PLATFORM = "plat.shared";

export const fixedClock = (seconds: number = NOW) => () => new Date(seconds * 1000);

export const silentLogger = () => pino({ level: "silent" });

export const HS_KEY = new TextEncoder().encode("test-secret-test-secret-test-secret");

export const PROJECTS = {
  "p1.portal": {
    name: "P1",
    resources: [{ name: "plat.shared", username: "u.p1" }]
  }
};

export function claims(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    aud: AUDIENCE,
    iss: ISSUER,
    iat: NOW,
    exp: NOW + 300,
    short_name: "u",
    projects: PROJECTS,
    ...overrides
  };
}

export function signHS256(payload: Record<string, unknown>, key: Uint8Array = HS_KEY): Promise<string> {
  return new SignJWT(payload).setProtectedHeader({ alg: "HS256" }).sign(key);
}

export interface TestKeys {
  privateKey: KeyLike;
  publicKey: KeyLike;
  publicJwk: JWK;
  kid: string;
  sign(payload: Record<string, unknown>, kid?: string): Promise<string>;
  keySet(): ReturnType<typeof createLocalJWKSet>;
}

export async function es256Keys(kid = "key-1"): Promise<TestKeys> {
  const { privateKey, publicKey } = await generateKeyPair("ES256");
  const publicJwk = { ...(await exportJWK(publicKey)), kid, alg: "ES256", use: "sig" };
  return {
    privateKey,
    publicKey,
    publicJwk,
    kid,
    sign: (payload, signKid = kid) =>
      new SignJWT(payload).setProtectedHeader({ alg: "ES256", kid: signKid }).sign(privateKey),
    keySet: () => createLocalJWKSet({ keys: [publicJwk] })
  };
}

/** fetch stand-in answering the discovery request. */
export function discoveryFetch(doc: unknown = { id_token_signing_alg_values_supported: ["ES256"], jwks_uri: `${ISSUER}/certs` }) {
  return async (_input: string, _init?: RequestInit) =>
    new Response(JSON.stringify(doc), { status: 200, headers: { "content-type": "application/json" } });
}

/** Keeps saved records as JSON text so every load goes through a round trip. */
export class InMemorySpawnerStateStore implements SpawnerStateStore {
  readonly records = new Map<string, string>();

  async load(user: string): Promise<SpawnerState> {
    const raw = this.records.get(user);
    return raw === undefined ? SpawnerState.empty() : SpawnerState.load(JSON.parse(raw));
  }

  async save(user: string, state: SpawnerState): Promise<void> {
    this.records.set(user, JSON.stringify(state.save()));
  }
}

export async function listen(app: Express): Promise<{ url: string; close(): Promise<void> }> {
  return new Promise((resolve) => {
    const server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      resolve({
        url: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done())))
      });
    });
  });
}

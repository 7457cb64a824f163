// src/routes/login.ts
import { Router } from "express";
import { OidcAuthenticator, verifyIdToken } from "../auth/oidc";
import { AuthenticationError } from "../errors";
import { SpawnerState } from "../spawner/state";
import type { SpawnerStateStore } from "../db/spawner-state";

export default function loginRoutes(authenticator: OidcAuthenticator, store: SpawnerStateStore) {
  const r = Router();

  /** Verify the id token and replace the user's authorization state */
  r.get("/login", verifyIdToken(authenticator), async (req, res, next) => {
    try {
      if (!req.auth) throw new AuthenticationError("unauthorized");
      const { user, authState } = req.auth;

      const state = SpawnerState.empty().withAuthState(authState);
      await store.save(user, state);

      res.json({ user, brics_projects: state.save().brics_projects });
    } catch (e) { next(e); }
  });

  return r;
}

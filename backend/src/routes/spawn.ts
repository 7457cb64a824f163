// src/routes/spawn.ts
import { Router } from "express";
import { OidcAuthenticator, verifyIdToken } from "../auth/oidc";
import { AuthenticationError, AuthorizationError, ValidationError } from "../errors";
import { makeOptionsForm, validateAndSanitize } from "../spawner/options-form";
import { FormFieldsDto } from "../types/dto";
import type { SpawnerStateStore } from "../db/spawner-state";
import type { Logger } from "../logger";

export default function spawnRoutes(authenticator: OidcAuthenticator, store: SpawnerStateStore, log: Logger) {
  const r = Router();
  r.use("/api/v1/spawn", verifyIdToken(authenticator));

  /** Options page for the projects persisted at login */
  r.get("/api/v1/spawn/options-form", async (req, res, next) => {
    try {
      if (!req.auth) throw new AuthenticationError("unauthorized");
      const state = await store.load(req.auth.user);
      res.type("html").send(makeOptionsForm(state.projects));
    } catch (e) { next(e); }
  });

  /** Validate a submission and hand back the job request for the scheduler */
  r.post("/api/v1/spawn/options", async (req, res, next) => {
    try {
      if (!req.auth) throw new AuthenticationError("unauthorized");
      const state = await store.load(req.auth.user);
      if (state.validProjects().size === 0) throw new AuthorizationError("no projects with valid platform");

      const fields = FormFieldsDto.safeParse(req.body ?? {});
      if (!fields.success) {
        throw new ValidationError("form data not valid", "Invalid spawner options input: form data not valid");
      }
      const options = validateAndSanitize(fields.data, state.validProjects());
      const job = state.jobRequest(options);

      log.info({ user: req.auth.user, project: options.brics_project, username: job.username }, "spawn options accepted");
      res.json(job);
    } catch (e) { next(e); }
  });

  return r;
}

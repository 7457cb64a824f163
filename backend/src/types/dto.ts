// src/types/dto.ts
import { z } from "zod";

/** ---------------- OIDC discovery document (subset we use) ---------------- */
export const OidcConfigurationDto = z.object({
  id_token_signing_alg_values_supported: z.array(z.string().min(1)).min(1),
  jwks_uri: z.string().url()
});
export type OidcConfigurationDto = z.infer<typeof OidcConfigurationDto>;

/** ---------------- "projects" claim entries ---------------- */
export const ResourceDto = z.object({
  name: z.string(),
  username: z.string()
});
export type ResourceDto = z.infer<typeof ResourceDto>;

// resources are shape-checked one at a time by deriveAuthorizationState()
export const ProjectRecordDto = z.object({
  name: z.string(),
  resources: z.array(z.unknown())
});
export type ProjectRecordDto = z.infer<typeof ProjectRecordDto>;

/** ---------------- Authorization state (persisted as brics_projects) ---------------- */
export const ProjectGrantDto = z.object({
  name: z.string(),
  username: z.string()
});

export const AuthorizationStateDto = z.record(ProjectGrantDto);

/** ---------------- Spawner state record ---------------- */
export const SpawnerStateV1Dto = z.object({
  version: z.literal(1),
  brics_projects: AuthorizationStateDto
});
export type SpawnerStateV1Dto = z.infer<typeof SpawnerStateV1Dto>;

// records written before the state carried a version field
export const LegacySpawnerStateDto = z.object({
  brics_projects: z.unknown().optional()
}).passthrough();

/** ---------------- Spawn options form ---------------- */
export const FormFieldsDto = z.record(
  z.union([z.string(), z.array(z.string())]).transform((v) => (Array.isArray(v) ? v : [v]))
);
export type FormFieldsDto = z.infer<typeof FormFieldsDto>;

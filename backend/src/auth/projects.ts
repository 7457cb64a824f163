// src/auth/projects.ts
import { ProjectRecordDto, ResourceDto } from "../types/dto";
import type { AuthorizationState, ProjectGrant, ProjectsClaim } from "../types/claims";
import type { Logger } from "../logger";

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Canonicalizes the "projects" claim. Older providers send it as a
 * JSON-encoded string, newer ones as an object. Anything that does not
 * end up as an object counts as "no projects".
 */
export function normalizeProjects(claims: { projects?: unknown }, log: Logger): ProjectsClaim {
  let projects = claims.projects;
  if (projects === undefined || projects === null) return {};

  if (typeof projects === "string") {
    try {
      projects = JSON.parse(projects);
    } catch {
      log.warn("invalid projects claim: could not decode JSON");
      return {};
    }
  }

  if (!isPlainObject(projects)) {
    log.warn({ type: Array.isArray(projects) ? "array" : typeof projects }, "invalid projects claim: not an object");
    return {};
  }
  return projects;
}

/**
 * Keeps the projects that grant a resource on `platform`. Per project the
 * first resource named `platform` wins; later ones are ignored. Malformed
 * projects or resources never match.
 */
export function deriveAuthorizationState(projects: ProjectsClaim, platform: string): AuthorizationState {
  const grants: [string, ProjectGrant][] = [];
  for (const [projectId, entry] of Object.entries(projects)) {
    const project = ProjectRecordDto.safeParse(entry);
    if (!project.success) continue;

    for (const raw of project.data.resources) {
      const resource = ResourceDto.safeParse(raw);
      if (!resource.success || resource.data.name !== platform) continue;
      grants.push([projectId, { name: project.data.name, username: resource.data.username }]);
      break;
    }
  }
  // fromEntries defines own properties, so a "__proto__" key stays data
  return Object.fromEntries(grants);
}

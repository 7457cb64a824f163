// src/spawner/state.ts
import { AuthorizationStateDto, LegacySpawnerStateDto, SpawnerStateV1Dto } from "../types/dto";
import { ValidationError } from "../errors";
import type { AuthorizationState } from "../types/claims";
import type { FormOptions } from "./options-form";

export const SPAWNER_STATE_VERSION = 1;

export type SpawnerStateRecord = SpawnerStateV1Dto;

/** Everything the scheduler adapter needs to launch the session job. */
export interface JobRequest {
  username: string;
  homedir: string;
  env: { USER: string; HOME: string; SHELL: string };
  options: FormOptions;
}

/**
 * Per-user spawner state. The only durable field is the authorization
 * state (persisted as `brics_projects`), written at login and read when
 * a job is spawned. Instances are immutable; the login flow replaces the
 * state wholesale via withAuthState().
 */
export class SpawnerState {
  private constructor(readonly projects: AuthorizationState) {}

  static empty(): SpawnerState {
    return new SpawnerState({});
  }

  /**
   * Restores a persisted record. Unversioned records from before the
   * version field are migrated; unreadable project maps load as empty.
   */
  static load(record: unknown): SpawnerState {
    const current = SpawnerStateV1Dto.safeParse(record);
    if (current.success) return new SpawnerState(current.data.brics_projects);

    const legacy = LegacySpawnerStateDto.safeParse(record);
    if (legacy.success && !("version" in legacy.data)) {
      const projects = AuthorizationStateDto.safeParse(legacy.data.brics_projects);
      if (projects.success) return new SpawnerState(projects.data);
    }
    return SpawnerState.empty();
  }

  save(): SpawnerStateRecord {
    return { version: SPAWNER_STATE_VERSION, brics_projects: { ...this.projects } };
  }

  /** Auth-state hook: a missing auth state clears the projects. */
  withAuthState(authState: AuthorizationState | null | undefined): SpawnerState {
    return new SpawnerState(authState ? { ...authState } : {});
  }

  validProjects(): Set<string> {
    return new Set(Object.keys(this.projects));
  }

  projectUserName(project: string): string {
    if (!Object.prototype.hasOwnProperty.call(this.projects, project)) {
      throw new ValidationError("unknown brics_project", `Invalid spawner options input: unknown brics_project`);
    }
    return this.projects[project].username;
  }

  /** /home/<project name before the first ".">/<project username> */
  homeDir(project: string): string {
    const prefix = project.split(".")[0];
    return `/home/${prefix}/${this.projectUserName(project)}`;
  }

  userEnv(project: string): JobRequest["env"] {
    return {
      USER: this.projectUserName(project),
      HOME: this.homeDir(project),
      SHELL: "/bin/bash"
    };
  }

  jobRequest(options: FormOptions): JobRequest {
    const project = options.brics_project;
    return {
      username: this.projectUserName(project),
      homedir: this.homeDir(project),
      env: this.userEnv(project),
      options
    };
  }
}

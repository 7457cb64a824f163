// src/db/spawner-state.ts
import { SpawnerState } from "../spawner/state";
import { SQL } from "./sql";
import type { Query } from "./index";

export interface SpawnerStateStore {
  load(user: string): Promise<SpawnerState>;
  save(user: string, state: SpawnerState): Promise<void>;
}

export class PgSpawnerStateStore implements SpawnerStateStore {
  constructor(private readonly q: Query) {}

  async migrate(): Promise<void> {
    await this.q(SQL.ensureSpawnerStateTable);
  }

  async load(user: string): Promise<SpawnerState> {
    const { rows } = await this.q<{ state: unknown }>(SQL.selectSpawnerState, [user]);
    return rows[0] ? SpawnerState.load(rows[0].state) : SpawnerState.empty();
  }

  async save(user: string, state: SpawnerState): Promise<void> {
    await this.q(SQL.upsertSpawnerState, [user, JSON.stringify(state.save())]);
  }
}

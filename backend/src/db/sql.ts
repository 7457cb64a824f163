// src/db/sql.ts (parameterized query snippets)
export const SQL = {
  ensureSpawnerStateTable: `
    CREATE TABLE IF NOT EXISTS spawner_state (
      username   text PRIMARY KEY,
      state      jsonb NOT NULL,
      updated_at timestamptz NOT NULL DEFAULT now()
    );
  `,

  selectSpawnerState: `SELECT state FROM spawner_state WHERE username=$1;`,

  // login is the only writer; last login wins
  upsertSpawnerState: `
    INSERT INTO spawner_state (username, state) VALUES ($1, $2)
    ON CONFLICT (username) DO UPDATE SET state = EXCLUDED.state, updated_at = now();
  `
};

import type pg from 'pg';

export const DDL_CREATE_TEAM = `
CREATE TABLE IF NOT EXISTS team (
  id    SERIAL       PRIMARY KEY,
  name  VARCHAR(255) NOT NULL
)
`.trim();

export const DDL_CREATE_MEMBER = `
CREATE TABLE IF NOT EXISTS member (
  id        SERIAL       PRIMARY KEY,
  username  VARCHAR(255),
  age       INTEGER      NOT NULL,
  team_id   INTEGER      REFERENCES team (id)
)
`.trim();

export const DDL_CREATE_MEMBER_TEAM_INDEX = `
CREATE INDEX IF NOT EXISTS idx_member_team_id
  ON member (team_id)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_TEAM);
  await client.query(DDL_CREATE_MEMBER);
  await client.query(DDL_CREATE_MEMBER_TEAM_INDEX);
}

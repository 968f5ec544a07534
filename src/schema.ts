// SQLite schema for the knowledge store.
//
// Entities own their observations and outbound relations (ON DELETE CASCADE).
// Inbound relations only point at an entity (ON DELETE SET NULL), so deleting
// the target turns them back into dangling relations.

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

const SCHEMA_V1 = `
CREATE TABLE IF NOT EXISTS project (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  name        TEXT NOT NULL,
  permalink   TEXT NOT NULL UNIQUE COLLATE NOCASE,
  root_path   TEXT NOT NULL,
  is_default  INTEGER NOT NULL DEFAULT 0,
  created_at  TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS entity (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id    INTEGER NOT NULL REFERENCES project(id) ON DELETE CASCADE,
  title         TEXT NOT NULL,
  permalink     TEXT NOT NULL,
  file_path     TEXT NOT NULL,
  entity_type   TEXT NOT NULL,
  content_type  TEXT NOT NULL,
  checksum      TEXT,
  tags          TEXT NOT NULL DEFAULT '[]',
  frontmatter   TEXT NOT NULL DEFAULT '[]',
  body          TEXT NOT NULL DEFAULT '',
  created_at    TEXT NOT NULL,
  updated_at    TEXT NOT NULL,
  UNIQUE (project_id, permalink),
  UNIQUE (project_id, file_path)
);
CREATE INDEX IF NOT EXISTS idx_entity_title ON entity(project_id, title COLLATE NOCASE);
CREATE INDEX IF NOT EXISTS idx_entity_updated ON entity(project_id, updated_at);
CREATE INDEX IF NOT EXISTS idx_entity_checksum ON entity(project_id, checksum);

CREATE TABLE IF NOT EXISTS observation (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_id  INTEGER NOT NULL REFERENCES entity(id) ON DELETE CASCADE,
  position   INTEGER NOT NULL,
  category   TEXT NOT NULL,
  content    TEXT NOT NULL,
  tags       TEXT NOT NULL DEFAULT '[]',
  context    TEXT
);
CREATE INDEX IF NOT EXISTS idx_observation_entity ON observation(entity_id);

CREATE TABLE IF NOT EXISTS relation (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id      INTEGER NOT NULL REFERENCES project(id) ON DELETE CASCADE,
  from_entity_id  INTEGER NOT NULL REFERENCES entity(id) ON DELETE CASCADE,
  to_entity_id    INTEGER REFERENCES entity(id) ON DELETE SET NULL,
  target_title    TEXT NOT NULL,
  relation_type   TEXT NOT NULL,
  context         TEXT,
  position        INTEGER NOT NULL DEFAULT 0,
  UNIQUE (from_entity_id, target_title, relation_type)
);
CREATE INDEX IF NOT EXISTS idx_relation_to ON relation(to_entity_id);
CREATE INDEX IF NOT EXISTS idx_relation_dangling ON relation(project_id) WHERE to_entity_id IS NULL;

CREATE VIRTUAL TABLE IF NOT EXISTS search_index USING fts5(
  entity_id UNINDEXED,
  project_id UNINDEXED,
  title,
  body,
  tags,
  permalink,
  tokenize = 'unicode61 remove_diacritics 2'
);
`;

/** Column weights for bm25(): entity_id, project_id, title, body, tags, permalink */
export const SEARCH_WEIGHTS = [0, 0, 10, 1, 5, 2] as const;

/** Index of the body column, used for snippets */
export const SEARCH_BODY_COLUMN = 3;

interface VersionRow {
  user_version: number;
}

/** Create or upgrade the schema. Versions are tracked in PRAGMA user_version. */
export function migrate(db: Database.Database): void {
  const row = db.prepare<[], VersionRow>('PRAGMA user_version').get();
  const version = row?.user_version ?? 0;
  if (version > SCHEMA_VERSION) {
    throw new Error(`Database schema version ${version} is newer than supported version ${SCHEMA_VERSION}`);
  }
  if (version === SCHEMA_VERSION) return;

  db.transaction(() => {
    db.exec(SCHEMA_V1);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  })();
}

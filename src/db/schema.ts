/**
 * SQLite schema for the identity inventory. Applied idempotently on open.
 *
 * Constraints the pipeline depends on:
 * - identities: UNIQUE (enclave_id, fingerprint) backs the per-fingerprint upsert.
 * - jobs: partial unique index on connector_id for non-terminal statuses backs
 *   per-connector job serialization.
 * - provenance_links: UNIQUE (identity_id, finding_id) makes link creation idempotent.
 */
export const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

CREATE TABLE IF NOT EXISTS enclaves (
  id            TEXT PRIMARY KEY,
  name          TEXT NOT NULL UNIQUE,
  description   TEXT,
  created_at    TEXT NOT NULL,
  updated_at    TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS connectors (
  id               TEXT PRIMARY KEY,
  enclave_id       TEXT NOT NULL,
  type             TEXT NOT NULL,              -- ad_ldap | adcs_file | adcs_remote
  name             TEXT NOT NULL,
  config_json      TEXT NOT NULL DEFAULT '{}',
  cron_expression  TEXT,
  enabled          INTEGER NOT NULL DEFAULT 1,
  last_run_at      TEXT,
  last_run_status  TEXT,
  created_at       TEXT NOT NULL,
  updated_at       TEXT NOT NULL,
  deleted_at       TEXT,                       -- soft delete keeps jobs/findings intact
  FOREIGN KEY (enclave_id) REFERENCES enclaves(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_connectors_enclave ON connectors(enclave_id);

CREATE TABLE IF NOT EXISTS jobs (
  id                  TEXT PRIMARY KEY,
  connector_id        TEXT NOT NULL,
  status              TEXT NOT NULL,           -- pending | running | completed | failed
  triggered_by        TEXT NOT NULL,           -- schedule | manual | push
  created_at          TEXT NOT NULL,
  started_at          TEXT,
  completed_at        TEXT,
  findings_count      INTEGER NOT NULL DEFAULT 0,
  unresolved_count    INTEGER NOT NULL DEFAULT 0,
  identities_created  INTEGER NOT NULL DEFAULT 0,
  identities_updated  INTEGER NOT NULL DEFAULT 0,
  error_message       TEXT,
  FOREIGN KEY (connector_id) REFERENCES connectors(id) ON DELETE CASCADE
);

CREATE UNIQUE INDEX IF NOT EXISTS uq_jobs_active_connector
  ON jobs(connector_id) WHERE status IN ('pending', 'running');
CREATE INDEX IF NOT EXISTS idx_jobs_connector_created ON jobs(connector_id, created_at);

CREATE TABLE IF NOT EXISTS findings (
  id              TEXT PRIMARY KEY,
  seq             INTEGER NOT NULL UNIQUE,     -- insertion order, breaks discovered_at ties
  job_id          TEXT NOT NULL,
  connector_id    TEXT NOT NULL,
  enclave_id      TEXT NOT NULL,
  source_type     TEXT NOT NULL,
  raw_json        TEXT NOT NULL,
  content_hash    TEXT NOT NULL,
  discovered_at   TEXT NOT NULL,
  FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE,
  FOREIGN KEY (connector_id) REFERENCES connectors(id) ON DELETE CASCADE,
  FOREIGN KEY (enclave_id) REFERENCES enclaves(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_findings_job ON findings(job_id, seq);

CREATE TABLE IF NOT EXISTS unresolved_findings (
  finding_id    TEXT PRIMARY KEY,
  job_id        TEXT NOT NULL,
  reason        TEXT NOT NULL,
  recorded_at   TEXT NOT NULL,
  FOREIGN KEY (finding_id) REFERENCES findings(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS identities (
  id                      TEXT PRIMARY KEY,
  enclave_id              TEXT NOT NULL,
  fingerprint             TEXT NOT NULL,
  identity_type           TEXT NOT NULL,       -- svc_acct | cert
  source_type             TEXT NOT NULL,
  display_name            TEXT NOT NULL,
  owner                   TEXT,
  linked_system           TEXT,
  risk_score              INTEGER NOT NULL DEFAULT 0,
  risk_factors_json       TEXT NOT NULL DEFAULT '[]',
  attributes_json         TEXT NOT NULL DEFAULT '{}',
  first_seen              TEXT NOT NULL,
  last_seen               TEXT NOT NULL,
  attributes_observed_at  TEXT NOT NULL,
  version                 INTEGER NOT NULL DEFAULT 1,
  created_at              TEXT NOT NULL,
  updated_at              TEXT NOT NULL,
  UNIQUE (enclave_id, fingerprint),
  FOREIGN KEY (enclave_id) REFERENCES enclaves(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_identities_enclave_name ON identities(enclave_id, display_name);

CREATE TABLE IF NOT EXISTS provenance_links (
  identity_id         TEXT NOT NULL,
  finding_id          TEXT NOT NULL,
  job_id              TEXT NOT NULL,
  discovered_at       TEXT NOT NULL,
  attributes_changed  INTEGER NOT NULL DEFAULT 0,
  linked_at           TEXT NOT NULL,
  PRIMARY KEY (identity_id, finding_id),
  FOREIGN KEY (identity_id) REFERENCES identities(id) ON DELETE CASCADE,
  FOREIGN KEY (finding_id) REFERENCES findings(id) ON DELETE CASCADE,
  FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
);
`;

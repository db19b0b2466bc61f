import { PoolClient } from 'pg';

export async function up(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE subscription (
      id         BIGSERIAL PRIMARY KEY,
      name       TEXT NOT NULL UNIQUE,
      tenant_id  TEXT
    );

    CREATE TABLE resource_group (
      id              BIGSERIAL PRIMARY KEY,
      name            TEXT NOT NULL,
      subscription_id BIGINT NOT NULL REFERENCES subscription(id),
      UNIQUE (subscription_id, name)
    );

    CREATE TABLE application (
      id          BIGSERIAL PRIMARY KEY,
      code        TEXT UNIQUE,
      name        TEXT,
      owner_team  TEXT,
      owner_email TEXT
    );

    CREATE TABLE resource (
      id                BIGSERIAL PRIMARY KEY,
      external_id       TEXT UNIQUE,
      name              TEXT NOT NULL,
      type              TEXT NOT NULL,
      kind              TEXT,
      location          TEXT NOT NULL,
      subscription_id   BIGINT NOT NULL REFERENCES subscription(id),
      resource_group_id BIGINT NOT NULL REFERENCES resource_group(id),
      tags_json         JSONB NOT NULL DEFAULT '{}'::jsonb,
      extended_location TEXT,
      vendor            TEXT,
      environment       TEXT,
      provisioner       TEXT,
      created_at        TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at        TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE resource_tag (
      resource_id BIGINT REFERENCES resource(id) ON DELETE CASCADE,
      key         TEXT NOT NULL,
      value       TEXT,
      PRIMARY KEY (resource_id, key)
    );

    CREATE TABLE resource_application_map (
      resource_id    BIGINT REFERENCES resource(id) ON DELETE CASCADE,
      application_id BIGINT REFERENCES application(id) ON DELETE CASCADE,
      relation_type  TEXT NOT NULL DEFAULT 'uses',
      PRIMARY KEY (resource_id, application_id, relation_type)
    );

    CREATE INDEX idx_resource_type        ON resource (type);
    CREATE INDEX idx_resource_location    ON resource (location);
    CREATE INDEX idx_resource_vendor      ON resource (vendor);
    CREATE INDEX idx_resource_environment ON resource (environment);
    CREATE INDEX idx_resource_tags_gin    ON resource USING GIN (tags_json jsonb_path_ops);
    CREATE INDEX idx_resource_tag_key     ON resource_tag (key);
    CREATE INDEX idx_resource_tag_key_val ON resource_tag (key, value);
  `);
}

export async function down(client: PoolClient): Promise<void> {
  await client.query(`
    DROP TABLE IF EXISTS resource_application_map;
    DROP TABLE IF EXISTS resource_tag;
    DROP TABLE IF EXISTS resource;
    DROP TABLE IF EXISTS application;
    DROP TABLE IF EXISTS resource_group;
    DROP TABLE IF EXISTS subscription;
  `);
}

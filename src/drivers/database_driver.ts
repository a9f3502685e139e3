import postgres from 'postgres'
import type { FeatureStore } from '../feature_store.ts'
import type { Feature, FeatureOverride, TargetType } from '../types.ts'
import {
  ConflictError,
  FeatureNotFoundError,
  FlagError,
  OverrideNotFoundError,
  StoreUnavailableError,
} from '../errors.ts'
import { unwrap } from '../result.ts'
import {
  validateFeatureInput,
  validateFeatureChanges,
  validateOverrideInput,
  type FeatureInput,
  type FeatureChanges,
  type OverrideDraft,
} from '../validation.ts'

const UNIQUE_VIOLATION = '23505'
const FOREIGN_KEY_VIOLATION = '23503'

interface FeatureRow {
  id: number
  key: string
  default_enabled: boolean
  description: string | null
  created_at: Date
  updated_at: Date
}

interface OverrideRow {
  id: number
  feature_id: number
  target_type: TargetType
  target_identifier: string
  enabled: boolean
  created_at: Date
  updated_at: Date
}

/** PostgreSQL-backed flag store using `features` and `feature_overrides`. */
export class DatabaseDriver implements FeatureStore {
  readonly name = 'database'

  constructor(private sql: postgres.Sql) {}

  async ensureTable(): Promise<void> {
    await this.run(async () => {
      await this.sql`
        CREATE TABLE IF NOT EXISTS "features" (
          "id"              SERIAL PRIMARY KEY,
          "key"             VARCHAR(255) NOT NULL,
          "default_enabled" BOOLEAN NOT NULL DEFAULT FALSE,
          "description"     TEXT,
          "created_at"      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
          "updated_at"      TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `

      await this.sql`
        CREATE UNIQUE INDEX IF NOT EXISTS "index_features_on_key"
          ON "features" ("key")
      `

      await this.sql`
        CREATE TABLE IF NOT EXISTS "feature_overrides" (
          "id"                SERIAL PRIMARY KEY,
          "feature_id"        INTEGER NOT NULL REFERENCES "features" ("id") ON DELETE CASCADE,
          "target_type"       VARCHAR(16) NOT NULL CHECK ("target_type" IN ('User', 'Group')),
          "target_identifier" VARCHAR(255) NOT NULL,
          "enabled"           BOOLEAN NOT NULL,
          "created_at"        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
          "updated_at"        TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `

      await this.sql`
        CREATE UNIQUE INDEX IF NOT EXISTS "index_feature_overrides_uniqueness"
          ON "feature_overrides" ("feature_id", "target_type", "target_identifier")
      `
    })
  }

  async findFeature(key: string): Promise<Feature | undefined> {
    const rows = await this.run(
      () => this.sql<FeatureRow[]>`
        SELECT * FROM "features"
        WHERE "key" = ${key}
        LIMIT 1
      `
    )
    const row = rows[0]
    return row && toFeature(row)
  }

  async findOverride(
    featureId: number,
    targetType: TargetType,
    targetIdentifier: string
  ): Promise<FeatureOverride | undefined> {
    const rows = await this.run(
      () => this.sql<OverrideRow[]>`
        SELECT * FROM "feature_overrides"
        WHERE "feature_id" = ${featureId}
          AND "target_type" = ${targetType}
          AND "target_identifier" = ${targetIdentifier}
        LIMIT 1
      `
    )
    const row = rows[0]
    return row && toOverride(row)
  }

  async findLatestOverride(
    featureId: number,
    targetType: TargetType,
    identifiers: readonly string[]
  ): Promise<FeatureOverride | undefined> {
    if (identifiers.length === 0) return undefined

    const rows = await this.run(
      () => this.sql<OverrideRow[]>`
        SELECT * FROM "feature_overrides"
        WHERE "feature_id" = ${featureId}
          AND "target_type" = ${targetType}
          AND "target_identifier" IN ${this.sql([...identifiers])}
        ORDER BY "created_at" DESC, "id" DESC
        LIMIT 1
      `
    )
    const row = rows[0]
    return row && toOverride(row)
  }

  async features(): Promise<Feature[]> {
    const rows = await this.run(
      () => this.sql<FeatureRow[]>`SELECT * FROM "features" ORDER BY "key"`
    )
    return rows.map(toFeature)
  }

  async createFeature(input: FeatureInput): Promise<Feature> {
    const data = unwrap(validateFeatureInput(input))
    const rows = await this.run(
      () => this.sql<FeatureRow[]>`
        INSERT INTO "features" ("key", "default_enabled", "description", "created_at", "updated_at")
        VALUES (${data.key}, ${data.defaultEnabled}, ${data.description}, NOW(), NOW())
        RETURNING *
      `,
      error => (isPgError(error, UNIQUE_VIOLATION) ? ConflictError.forFeatureKey(data.key, error) : undefined)
    )
    return toFeature(single(rows))
  }

  async updateFeature(key: string, changes: FeatureChanges): Promise<Feature> {
    const data = unwrap(validateFeatureChanges(changes))
    const rows = await this.run(
      () => this.sql<FeatureRow[]>`
        UPDATE "features" SET
          "default_enabled" = COALESCE(${data.defaultEnabled ?? null}, "default_enabled"),
          "description" = ${
            data.description !== undefined ? data.description : this.sql`"description"`
          },
          "updated_at" = NOW()
        WHERE "key" = ${key}
        RETURNING *
      `
    )
    const row = rows[0]
    if (!row) throw new FeatureNotFoundError(key)
    return toFeature(row)
  }

  async deleteFeature(key: string): Promise<void> {
    // feature_overrides rows follow through ON DELETE CASCADE
    await this.run(() => this.sql`DELETE FROM "features" WHERE "key" = ${key}`)
  }

  async overridesFor(featureId: number): Promise<FeatureOverride[]> {
    const rows = await this.run(
      () => this.sql<OverrideRow[]>`
        SELECT * FROM "feature_overrides"
        WHERE "feature_id" = ${featureId}
        ORDER BY "created_at", "id"
      `
    )
    return rows.map(toOverride)
  }

  async createOverride(input: OverrideDraft): Promise<FeatureOverride> {
    const data = unwrap(validateOverrideInput(input))
    const rows = await this.run(
      () => this.sql<OverrideRow[]>`
        INSERT INTO "feature_overrides"
          ("feature_id", "target_type", "target_identifier", "enabled", "created_at", "updated_at")
        VALUES
          (${data.featureId}, ${data.targetType}, ${data.targetIdentifier}, ${data.enabled}, NOW(), NOW())
        RETURNING *
      `,
      error => {
        if (isPgError(error, UNIQUE_VIOLATION)) {
          return ConflictError.forOverride(data.featureId, data.targetType, data.targetIdentifier, error)
        }
        if (isPgError(error, FOREIGN_KEY_VIOLATION)) {
          return new FeatureNotFoundError(data.featureId, { cause: error })
        }
        return undefined
      }
    )
    return toOverride(single(rows))
  }

  async updateOverride(id: number, enabled: boolean): Promise<FeatureOverride> {
    const rows = await this.run(
      () => this.sql<OverrideRow[]>`
        UPDATE "feature_overrides"
        SET "enabled" = ${enabled}, "updated_at" = NOW()
        WHERE "id" = ${id}
        RETURNING *
      `
    )
    const row = rows[0]
    if (!row) throw new OverrideNotFoundError(id)
    return toOverride(row)
  }

  async deleteOverride(id: number): Promise<void> {
    await this.run(() => this.sql`DELETE FROM "feature_overrides" WHERE "id" = ${id}`)
  }

  /**
   * Run a query, translating driver failures into flag errors. `translate`
   * may claim a specific failure; everything else is reported as unavailable.
   */
  private async run<T>(
    query: () => Promise<T>,
    translate?: (error: unknown) => FlagError | undefined
  ): Promise<T> {
    try {
      return await query()
    } catch (error) {
      if (error instanceof FlagError) throw error
      throw translate?.(error) ?? new StoreUnavailableError(this.name, error)
    }
  }
}

function isPgError(error: unknown, code: string): boolean {
  return error instanceof postgres.PostgresError && error.code === code
}

function single<T>(rows: readonly T[]): T {
  const row = rows[0]
  if (row === undefined) throw new Error('Expected the statement to return a row.')
  return row
}

function toFeature(row: FeatureRow): Feature {
  return {
    id: row.id,
    key: row.key,
    defaultEnabled: row.default_enabled,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function toOverride(row: OverrideRow): FeatureOverride {
  return {
    id: row.id,
    featureId: row.feature_id,
    targetType: row.target_type,
    targetIdentifier: row.target_identifier,
    enabled: row.enabled,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

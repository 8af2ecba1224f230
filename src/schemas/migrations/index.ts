/**
 * Schema Migration Framework
 *
 * Lazy migration on read - when loading a document with an older schema
 * version, run the migration chain to bring it to the current version.
 * Callers validate the migrated value with the matching zod schema.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { getCurrentVersion, type SchemaType } from '../versions.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Migration function type
 * Takes data at version N and returns data at version N+1
 */
export type Migration = (data: Record<string, unknown>) => Record<string, unknown>;

/**
 * Migration registry key format: "schemaType:fromVersion:toVersion"
 */
type MigrationKey = `${SchemaType}:${number}:${number}`;

// ============================================================================
// Migration Registry
// ============================================================================

/**
 * Migration registry - maps schema type to version migrations
 *
 * Register migrations when making breaking schema changes.
 *
 * @example
 * // If cacheEntry v2 adds a required "encoding" field:
 * registerMigration('cacheEntry', 1, 2, (data) => ({
 *   ...data,
 *   encoding: 'utf-8',
 * }));
 */
const migrations: Map<MigrationKey, Migration> = new Map();

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Migrate data from its version to current
 *
 * Non-object input is returned unchanged so the caller's schema
 * validation reports it.
 *
 * @example
 * const raw = JSON.parse(fileContent);
 * const recordSet = RecordSetSchema.parse(migrateSchema(raw, 'recordSet'));
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  if (!isPlainObject(data)) {
    return data;
  }

  const current = getCurrentVersion(schemaType);
  let version = extractSchemaVersion(data);
  let migrated: Record<string, unknown> = data;

  // Run migration chain from stored version to target
  while (version < current) {
    const key: MigrationKey = `${schemaType}:${version}:${version + 1}`;
    const migration = migrations.get(key);

    if (migration) {
      migrated = migration(migrated);
    }
    // If no migration registered, assume forward-compatible (new optional fields)

    version++;
  }

  return { ...migrated, schemaVersion: current };
}

/**
 * Register a new migration
 *
 * @param schemaType - The schema type this migration applies to
 * @param fromVersion - Source version
 * @param toVersion - Target version (must be fromVersion + 1)
 * @param migration - Migration function
 */
export function registerMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number,
  migration: Migration
): void {
  if (toVersion !== fromVersion + 1) {
    throw new Error(
      `Migration must increment version by 1. Got ${fromVersion} -> ${toVersion}`
    );
  }

  const key: MigrationKey = `${schemaType}:${fromVersion}:${toVersion}`;

  if (migrations.has(key)) {
    throw new Error(`Migration already registered for ${key}`);
  }

  migrations.set(key, migration);
}

// ============================================================================
// Helper Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract schema version from data, defaulting to 1 if not present
 */
function extractSchemaVersion(data: unknown): number {
  if (!isPlainObject(data)) {
    return 1;
  }

  const version = data.schemaVersion;

  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }

  return 1; // Default to version 1 for legacy data
}

// ============================================================================
// Atomic Write-Back
// ============================================================================

let tempCounter = 0;

/**
 * Build a temp path beside the target. The pid and counter keep concurrent
 * writers inside one process from sharing a temp file.
 */
export function tempPathFor(filePath: string): string {
  tempCounter = (tempCounter + 1) % Number.MAX_SAFE_INTEGER;
  return `${filePath}.tmp.${process.pid}.${Date.now()}.${tempCounter}`;
}

/**
 * Atomically write JSON data to a file
 *
 * Uses temp file + rename pattern for atomic writes.
 *
 * Note: If the process crashes between temp file creation and rename,
 * orphaned .tmp.* files may remain in the target directory.
 *
 * @param filePath - Target file path
 * @param data - Data to write (will be JSON.stringify'd)
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = tempPathFor(filePath);
  const json = JSON.stringify(data, null, 2);

  try {
    // Ensure parent directory exists
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    // Write to temp file
    await fs.writeFile(tempPath, json, 'utf-8');

    // Atomic rename
    await fs.rename(tempPath, filePath);
  } catch (error) {
    // Clean up temp file if it exists
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

// ============================================================================
// Built-in Migrations
// ============================================================================

/**
 * recordSet v1 -> v2
 *
 * v1 records carried a single `seenAt` timestamp. v2 splits it into
 * firstSeenAt/lastSeenAt and tracks the build that last affirmed a record.
 */
registerMigration('recordSet', 1, 2, (data) => {
  const records = Array.isArray(data.records) ? data.records : [];

  return {
    ...data,
    records: records.map((record: unknown) => {
      if (!isPlainObject(record)) {
        return record;
      }
      const { seenAt, ...rest } = record;
      return {
        ...rest,
        firstSeenAt: rest.firstSeenAt ?? rest.updatedAt ?? seenAt,
        lastSeenAt: rest.lastSeenAt ?? seenAt,
        lastSeenBuild: rest.lastSeenBuild ?? null,
      };
    }),
  };
});

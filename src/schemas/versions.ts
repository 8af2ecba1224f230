/**
 * Schema Version Registry
 *
 * All persisted documents include a schemaVersion field for migration support.
 * Each document type has an independent version number (simple integers).
 */

/**
 * Current schema versions for all persisted document types.
 * Increment when making breaking changes to a schema, and register a
 * migration for the step in ./migrations/index.ts.
 */
export const SCHEMA_VERSIONS = {
  /** Per-stage run history */
  stageHistory: 1,
  /** Cached fetch payloads */
  cacheEntry: 1,
  /** One content-store variant, persisted as a single document */
  recordSet: 2,
  /** Build report written after every build */
  buildReport: 1,
  /** Global config.json in the data directory */
  globalConfig: 1,
} as const;

/**
 * All document types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

/**
 * Get the current version for a schema type
 */
export function getCurrentVersion(schemaType: SchemaType): number {
  return SCHEMA_VERSIONS[schemaType];
}

/**
 * Check if a schema version is current
 */
export function isCurrentVersion(schemaType: SchemaType, version: number): boolean {
  return version === SCHEMA_VERSIONS[schemaType];
}

/**
 * Build Report Storage
 *
 * Management of build directories, reports, and the "latest" symlink.
 *
 * @module storage/builds
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { BuildReportSchema, type BuildReport } from '../schemas/build-report.js';
import { atomicWriteJson, migrateSchema } from '../schemas/migrations/index.js';
import { isErrnoException } from './atomic.js';
import {
  getBuildsDir,
  getBuildDir,
  getBuildReportPath,
  getLatestBuildSymlink,
} from './paths.js';

/**
 * Save a build report and point "latest" at it
 */
export async function saveBuildReport(dataDir: string, report: BuildReport): Promise<void> {
  const validated = BuildReportSchema.parse(report);
  await atomicWriteJson(getBuildReportPath(dataDir, validated.buildId), validated);
  await updateLatestSymlink(dataDir, validated.buildId);
}

/**
 * Load a build report
 *
 * @throws Error if the build doesn't exist or the report is invalid
 */
export async function loadBuildReport(dataDir: string, buildId: string): Promise<BuildReport> {
  const filePath = getBuildReportPath(dataDir, buildId);

  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const data: unknown = JSON.parse(content);
    return BuildReportSchema.parse(migrateSchema(data, 'buildReport'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`Build not found: ${buildId} (path: ${filePath})`, { cause: error });
    }
    throw error;
  }
}

/**
 * List all build IDs
 *
 * @returns Build IDs sorted descending (newest first)
 */
export async function listBuilds(dataDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(getBuildsDir(dataDir), { withFileTypes: true });

    return entries
      .filter((entry) => entry.name !== 'latest' && entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => b.localeCompare(a));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Get the latest build ID by reading the "latest" symlink
 *
 * @returns The latest build ID, or null if no builds exist
 */
export async function getLatestBuildId(dataDir: string): Promise<string | null> {
  try {
    const target = await fs.readlink(getLatestBuildSymlink(dataDir));
    return path.basename(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EINVAL')) {
      return null;
    }
    throw error;
  }
}

/**
 * Update the "latest" symlink to point to a build
 *
 * @throws Error if the target build directory does not exist
 */
export async function updateLatestSymlink(dataDir: string, buildId: string): Promise<void> {
  const linkPath = getLatestBuildSymlink(dataDir);
  const targetDir = getBuildDir(dataDir, buildId);

  // Verify target directory exists before creating symlink
  try {
    const stat = await fs.stat(targetDir);
    if (!stat.isDirectory()) {
      throw new Error(`Target is not a directory: ${buildId}`);
    }
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`Build directory does not exist: ${buildId}`, { cause: error });
    }
    throw error;
  }

  // Remove existing symlink first
  try {
    await fs.unlink(linkPath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }

  // Relative symlink (just the buildId, not full path)
  await fs.symlink(buildId, linkPath);
}

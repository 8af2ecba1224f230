/**
 * Staleness rules
 *
 * A stage reruns when any of these hold, checked in this order:
 * 1. it is forced (per stage or globally)
 * 2. it never succeeded
 * 3. its version differs from its last successful run
 * 4. its input fingerprint differs from the one its last success consumed
 * 5. it declares maxAgeMs and its last success is at least that old
 *
 * @module pipeline/staleness
 */

import type { StalenessReason } from '../schemas/build-report.js';
import type { StageRun } from '../schemas/stage.js';
import { fingerprint } from '../cache/fingerprint.js';
import type { StageDescriptor } from './types.js';

export interface StalenessInput {
  stage: StageDescriptor;
  lastSuccess: StageRun | null;
  inputFingerprint: string;
  forced: boolean;
  now: Date;
}

export interface StalenessVerdict {
  stale: boolean;
  reason: StalenessReason;
}

export function assessStaleness(input: StalenessInput): StalenessVerdict {
  const { stage, lastSuccess, inputFingerprint, forced, now } = input;

  if (forced) {
    return { stale: true, reason: 'forced' };
  }
  if (!lastSuccess) {
    return { stale: true, reason: 'never-succeeded' };
  }
  if (lastSuccess.version !== stage.version) {
    return { stale: true, reason: 'version-changed' };
  }
  if (lastSuccess.inputFingerprint !== inputFingerprint) {
    return { stale: true, reason: 'input-changed' };
  }
  if (stage.maxAgeMs !== undefined) {
    const ageMs = now.getTime() - Date.parse(lastSuccess.completedAt);
    if (ageMs >= stage.maxAgeMs) {
      return { stale: true, reason: 'max-age-expired' };
    }
  }
  return { stale: false, reason: 'up-to-date' };
}

/**
 * Hash of the stage's own version and the output fingerprints of its
 * direct dependencies. Transitive changes arrive through those outputs.
 */
export function computeInputFingerprint(
  stage: StageDescriptor,
  upstreamOutputs: ReadonlyMap<string, string | null>
): string {
  const upstream = [...stage.dependencies]
    .sort()
    .map((name) => [name, upstreamOutputs.get(name) ?? null]);

  return fingerprint({ stage: stage.name, version: stage.version, upstream });
}

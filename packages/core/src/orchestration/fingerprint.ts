/**
 * Analysis Fingerprints
 *
 * Deterministic cache keys for analysis workloads. Two requests share a key
 * exactly when they would produce the same analysis.
 */

import { createHash } from 'node:crypto';
import type { AnalysisRequest } from '@carelens/types';

export const FINGERPRINT_NAMESPACE = 'analysis';

/**
 * The request fields that take part in the fingerprint
 */
export type FingerprintInput = Pick<
  AnalysisRequest,
  'patientId' | 'includeRecommendations' | 'specialty' | 'analysisFocus' | 'adapterId'
>;

function normalizeLabel(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim().toLowerCase();
  return trimmed === '' ? null : trimmed;
}

/**
 * Generate a fingerprint from arbitrary components
 *
 * Components are serialized as a JSON array before hashing, so
 * `('a:b', 'c')` and `('a', 'b:c')` never collide.
 *
 * @returns Namespaced SHA-256 prefix, e.g. `analysis:3f2a...`
 */
export function createFingerprint(
  namespace: string,
  components: readonly (string | number | boolean | null)[]
): string {
  if (components.length === 0) {
    throw new Error('At least one component is required for a fingerprint');
  }

  const digest = createHash('sha256').update(JSON.stringify(components)).digest('hex');
  return `${namespace}:${digest.slice(0, 32)}`;
}

/**
 * Fingerprint an analysis request
 *
 * Patient IDs are compared verbatim; specialty, focus and adapter labels are
 * case-insensitive.
 */
export function fingerprintAnalysis(input: FingerprintInput): string {
  return createFingerprint(FINGERPRINT_NAMESPACE, [
    input.patientId,
    input.includeRecommendations,
    normalizeLabel(input.specialty),
    normalizeLabel(input.analysisFocus),
    normalizeLabel(input.adapterId),
  ]);
}

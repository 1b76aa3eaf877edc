import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseJourneyPolicies } from './policy-schema.js';
import type { JourneyPolicy } from './types.js';

const BUNDLED_POLICIES = new URL('../../data/default-journey-policies.json', import.meta.url);

/**
 * Read and validate a JSON array of journey policies. Without a path the
 * bundled defaults are used.
 */
export function loadJourneyPolicies(file?: string): JourneyPolicy[] {
  const path = file ?? fileURLToPath(BUNDLED_POLICIES);
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseJourneyPolicies(raw);
}

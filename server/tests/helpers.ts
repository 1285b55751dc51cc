/**
 * Shared fixtures: the bundled clinic configuration and a fixed clock.
 *
 * NOW is Monday 2026-10-19, 10:00 in America/Chicago (CDT, UTC-5).
 */

import { fileURLToPath } from 'node:url';
import type { ClinicConfig } from '@shared/schema';
import type { ExtractionContext } from '../types/extraction';
import { loadClinicConfig } from '../services/clinicConfig';

export const NOW = new Date('2026-10-19T15:00:00Z');
export const TODAY = '2026-10-19';
export const TZ = 'America/Chicago';

export function loadTestConfig(): ClinicConfig {
  return loadClinicConfig(fileURLToPath(new URL('../data/clinic.json', import.meta.url)));
}

export function fixedClock(at: Date = NOW): () => Date {
  return () => at;
}

export function extractionContext(overrides: Partial<ExtractionContext> = {}): ExtractionContext {
  return {
    dialogueState: 'GREETING',
    intent: null,
    known: {},
    today: TODAY,
    timezone: TZ,
    ...overrides,
  };
}

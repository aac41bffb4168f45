// Memory factory - selects the situation memory backend from STOCKDESK_MEMORY_BACKEND
// Supported values: 'local' (default, in-process), 'postgres'

import type { SituationMemory } from '../memory/situation-memory.js';
import type { MemoryBackend } from './index.js';

/**
 * Create a SituationMemory for the configured backend.
 * - `local`: LocalSituationMemory (word-overlap similarity, in-process)
 * - `postgres`: PgSituationMemory (full-text ranking over the situations table)
 */
export async function createSituationMemory(
  backend: MemoryBackend = 'local',
): Promise<SituationMemory> {
  switch (backend) {
    case 'postgres': {
      const { PgSituationMemory } = await import('../memory/pg-situation-memory.js');
      return new PgSituationMemory();
    }
    case 'local':
    default: {
      const { LocalSituationMemory } = await import('../memory/situation-memory.js');
      return new LocalSituationMemory();
    }
  }
}

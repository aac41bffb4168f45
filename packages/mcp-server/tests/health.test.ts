import { describe, it, expect } from 'vitest';
import { healthReport } from '../src/tools/analysis.js';
import { TaskStore } from '../src/task-store.js';

const idleStore = () => new TaskStore(async () => {
  throw new Error('runner not needed');
});

describe('healthReport', () => {
  it('is healthy when keys are present and the local backend is used', async () => {
    const report = await healthReport(idleStore(), {
      anthropicApiKey: true,
      fmpApiKey: true,
      memoryBackend: 'local',
      version: '0.1.0',
    });

    expect(report).toMatchObject({
      status: 'healthy',
      service: 'stockdesk',
      version: '0.1.0',
      tasks: { pending: 0, processing: 0, completed: 0, failed: 0 },
      checks: { anthropic_api_key: true, fmp_api_key: true, memory_backend: 'local' },
    });
    expect(report.checks).not.toHaveProperty('postgres');
  });

  it('is degraded when a key is missing or Postgres does not answer', async () => {
    const report = await healthReport(idleStore(), {
      anthropicApiKey: false,
      fmpApiKey: true,
      memoryBackend: 'postgres',
      version: '0.1.0',
      postgres: async () => false,
    });

    expect(report.status).toBe('degraded');
    expect(report.checks).toEqual({
      anthropic_api_key: false,
      fmp_api_key: true,
      memory_backend: 'postgres',
      postgres: false,
    });
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createActivityClassifier, createAiLabeler } from '../agents/classification';
import type { ActivityLabeler } from '../agents/classification';
import type { ClassificationRules } from '../config/settings';
import { AuthenticationError, NotFoundError, PersistenceError, RequestAbortedError } from '../errors';
import type { ActivityRecord, AiLabel, RawActivitySample } from '../types';
import type { ActivityStore } from './activityStore';
import { createIngestionService, matchesSecret, resolveSampleDuration } from './ingestion';
import type { UserDirectory } from './userDirectory';

const API_KEY = 'test-secret';

const rules: ClassificationRules = {
  workApps: ['code', 'slack'],
  privateApps: ['spotify'],
  browsers: ['chrome'],
};

function sample(overrides: Partial<RawActivitySample> = {}): RawActivitySample {
  return {
    timestamp: new Date('2024-05-01T09:00:00Z'),
    state: 'active',
    app: 'Code',
    title: 'main.ts',
    ...overrides,
  };
}

function fixedLabeler(label: AiLabel): ActivityLabeler {
  return { label: vi.fn(async () => label) };
}

function fakeUsers(): UserDirectory {
  return {
    findByEmployeeId: vi.fn(async (employeeId: string) => (employeeId === 'emp_known' ? { id: 7 } : null)),
  };
}

function recordingStore() {
  const saved: ActivityRecord[] = [];
  const store: ActivityStore = {
    insertMany: vi.fn(async (records: readonly ActivityRecord[]) => {
      saved.push(...records);
      return records.length;
    }),
  };
  return { store, saved };
}

function setup(labeler: ActivityLabeler = fixedLabeler('Private'), concurrency = 5) {
  const users = fakeUsers();
  const { store, saved } = recordingStore();
  const service = createIngestionService({
    config: { daemonApiKey: API_KEY, defaultSampleDurationSeconds: 5, concurrency },
    classifier: createActivityClassifier({ rules, labeler }),
    users,
    store,
  });
  return { service, users, store, saved };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('matchesSecret', () => {
  it('accepts only the exact secret', () => {
    expect(matchesSecret(API_KEY, API_KEY)).toBe(true);
    expect(matchesSecret(API_KEY, 'test-secreT')).toBe(false);
    expect(matchesSecret(API_KEY, 'test')).toBe(false);
    expect(matchesSecret(API_KEY, '')).toBe(false);
    expect(matchesSecret(API_KEY, undefined)).toBe(false);
  });
});

describe('resolveSampleDuration', () => {
  it('uses the reported duration when present', () => {
    expect(resolveSampleDuration(sample({ duration: 42 }), 5)).toBe(42);
  });

  it('rounds fractional durations to at least one second', () => {
    expect(resolveSampleDuration(sample({ duration: 12.6 }), 5)).toBe(13);
    expect(resolveSampleDuration(sample({ duration: 0.2 }), 5)).toBe(1);
  });

  it('falls back to the default when absent', () => {
    expect(resolveSampleDuration(sample(), 5)).toBe(5);
    expect(resolveSampleDuration(sample({ duration: null }), 9)).toBe(9);
  });
});

describe('createIngestionService', () => {
  it('rejects a wrong key before looking up the employee', async () => {
    const { service, users, store } = setup();

    await expect(
      service.ingest({ employee_id: 'emp_known', logs: [sample()] }, 'wrong-key')
    ).rejects.toBeInstanceOf(AuthenticationError);
    expect(users.findByEmployeeId).not.toHaveBeenCalled();
    expect(store.insertMany).not.toHaveBeenCalled();
  });

  it('rejects a missing key', async () => {
    const { service } = setup();

    await expect(service.ingest({ employee_id: 'emp_known', logs: [] }, undefined)).rejects.toThrow(
      'Invalid or missing API key'
    );
  });

  it('rejects an unknown employee without writing anything', async () => {
    const { service, store } = setup();

    const attempt = service.ingest({ employee_id: 'emp_missing', logs: [sample()] }, API_KEY);

    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toThrow("Employee ID 'emp_missing' not found");
    expect(store.insertMany).not.toHaveBeenCalled();
  });

  it('persists one record per sample in input order', async () => {
    const { service, saved } = setup();
    const logs = [
      sample({ state: 'idle', app: 'Code', timestamp: new Date('2024-05-01T09:00:00Z') }),
      sample({ app: 'Code', title: 'main.ts', timestamp: new Date('2024-05-01T09:00:05Z'), duration: 42 }),
      sample({ app: 'Spotify', title: 'Daily Mix', timestamp: new Date('2024-05-01T09:00:47Z') }),
    ];

    const result = await service.ingest({ employee_id: 'emp_known', logs }, API_KEY);

    expect(result).toEqual({ recordsPersisted: 3 });
    expect(saved).toEqual([
      { userId: 7, startTime: logs[0].timestamp, durationSeconds: 5, category: 'Idle', details: null },
      { userId: 7, startTime: logs[1].timestamp, durationSeconds: 42, category: 'Work', details: 'Code - main.ts' },
      { userId: 7, startTime: logs[2].timestamp, durationSeconds: 5, category: 'Private', details: null },
    ]);
  });

  it('keeps input order when AI labels finish out of order', async () => {
    const labeler: ActivityLabeler = {
      label: vi.fn(async (_app: string, title: string): Promise<AiLabel> => {
        await new Promise((resolve) => setTimeout(resolve, title === 'first' ? 30 : 1));
        return title === 'first' ? 'Work' : 'Private';
      }),
    };
    const { service, saved } = setup(labeler);

    await service.ingest(
      {
        employee_id: 'emp_known',
        logs: [sample({ app: 'Chrome', title: 'first' }), sample({ app: 'Chrome', title: 'second' })],
      },
      API_KEY
    );

    expect(saved.map((record) => [record.category, record.details])).toEqual([
      ['Work', 'Chrome - first'],
      ['Private', null],
    ]);
  });

  it('bounds concurrent AI calls to the configured limit', async () => {
    let active = 0;
    let maxActive = 0;
    const labeler: ActivityLabeler = {
      label: vi.fn(async (): Promise<AiLabel> => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return 'Private';
      }),
    };
    const { service } = setup(labeler, 2);

    await service.ingest(
      {
        employee_id: 'emp_known',
        logs: Array.from({ length: 6 }, (_, i) => sample({ app: 'Chrome', title: `tab ${i}` })),
      },
      API_KEY
    );

    expect(labeler.label).toHaveBeenCalledTimes(6);
    expect(maxActive).toBe(2);
  });

  it('stores an AI failure as Private', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const failingChat = vi.fn(async (): Promise<string> => {
      throw new Error('Request timed out.');
    });
    const { service, saved } = setup(createAiLabeler({ chat: failingChat, timeoutMs: 10 }));

    await service.ingest({ employee_id: 'emp_known', logs: [sample({ app: 'Chrome', title: 'Docs' })] }, API_KEY);

    expect(saved[0]).toMatchObject({ category: 'Private', details: null });
  });

  it('returns zero for an empty batch without touching the store', async () => {
    const { service, store } = setup();

    expect(await service.ingest({ employee_id: 'emp_known', logs: [] }, API_KEY)).toEqual({ recordsPersisted: 0 });
    expect(store.insertMany).not.toHaveBeenCalled();
  });

  it('surfaces store failures as PersistenceError', async () => {
    const store: ActivityStore = {
      insertMany: vi.fn(async () => {
        throw new PersistenceError('Failed to persist activity batch', new Error('connection reset'));
      }),
    };
    const service = createIngestionService({
      config: { daemonApiKey: API_KEY, defaultSampleDurationSeconds: 5, concurrency: 5 },
      classifier: createActivityClassifier({ rules, labeler: fixedLabeler('Private') }),
      users: fakeUsers(),
      store,
    });

    await expect(service.ingest({ employee_id: 'emp_known', logs: [sample()] }, API_KEY)).rejects.toBeInstanceOf(
      PersistenceError
    );
  });

  it('does not persist once the request is aborted', async () => {
    const { service, store } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.ingest({ employee_id: 'emp_known', logs: [sample()] }, API_KEY, { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(store.insertMany).not.toHaveBeenCalled();
  });

  it('forwards the abort signal to the store', async () => {
    const { service, store } = setup();
    const controller = new AbortController();

    await service.ingest({ employee_id: 'emp_known', logs: [sample()] }, API_KEY, { signal: controller.signal });

    expect(store.insertMany).toHaveBeenCalledWith(expect.any(Array), { signal: controller.signal });
  });
});

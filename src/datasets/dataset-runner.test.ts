import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { closeDb } from '../db/index.js';
import { InvalidStateTransitionError, NotFoundError } from '../errors.js';
import { createTestAgent, createTestServices, setupTestDb, TEST_AGENT_NAME } from '../test-helpers/index.js';
import type { Services } from '../services/index.js';
import { DATASET_TRACE_NAME } from './dataset-runner.js';

describe('DatasetRunner', () => {
  let services: Services;
  let datasetId: string;

  function failOn(bad: string[]) {
    return createTestAgent((input) => {
      if (typeof input === 'string' && bad.includes(input)) {
        throw new Error(`bad item ${input}`);
      }
      return input;
    });
  }

  function setup(agent = createTestAgent(), inputs = ['one', 'two', 'three']): void {
    services = createTestServices([agent]);
    datasetId = services.datasets.create({ name: 'qa', agentReference: TEST_AGENT_NAME }).id;
    for (const input of inputs) {
      services.items.create(datasetId, { input, expectedOutput: input });
    }
  }

  function newRun(name = 'baseline'): string {
    const run = services.runs.createRun(datasetId, { name });
    return services.runs.initializeRunItems(run.id).id;
  }

  beforeEach(async () => {
    await setupTestDb();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await closeDb();
  });

  it('completes a run and rolls up trace totals', async () => {
    setup();
    const run = await services.runner.execute(newRun());

    expect(run).toMatchObject({ status: 'completed', totalItems: 3, completedItems: 3, failedItems: 0, totalTokens: 45 });
    expect(run.totalCost).toBeCloseTo(0.03);
    expect(services.runs.runItems(run.id).map(v => v.outputMatches)).toEqual([true, true, true]);
  });

  it('records one session and one trace per item', async () => {
    setup();
    const run = await services.runner.execute(newRun());
    const [view] = services.runs.runItems(run.id);

    const trace = services.traces.getTraceById(view.traceId ?? '');
    expect(trace).toMatchObject({
      name: DATASET_TRACE_NAME,
      input: 'one',
      output: 'one',
      status: 'completed',
      tags: [DATASET_TRACE_NAME, 'qa', 'baseline'],
    });

    const session = services.traces.getSessionById(trace?.sessionId ?? '');
    expect(session).toMatchObject({
      userId: `dataset_run_${run.id}`,
      metadata: { datasetId, datasetRunId: run.id, datasetItemId: view.datasetItemId, source: DATASET_TRACE_NAME },
    });
  });

  it('fails only the items whose agent call throws', async () => {
    setup(failOn(['two']));
    const run = await services.runner.execute(newRun());

    expect(run).toMatchObject({ status: 'completed', completedItems: 2, failedItems: 1 });

    const [failed] = services.runs.runItems(run.id, 'failed');
    expect(failed.error).toBe('Error: bad item two');
    expect(services.traces.getTraceById(failed.traceId ?? '')).toMatchObject({
      status: 'error',
      error: 'bad item two',
      metadata: expect.objectContaining({ error: 'bad item two', errorClass: 'Error' }),
    });
  });

  it('fails the run when every item fails', async () => {
    setup(failOn(['one', 'two', 'three']));
    const run = await services.runner.execute(newRun());

    expect(run).toMatchObject({ status: 'failed', failedItems: 3, totalCost: 0, totalTokens: 0 });
  });

  it('fails a run with no items', async () => {
    setup(createTestAgent(), []);
    const run = await services.runner.execute(newRun());

    expect(run).toMatchObject({ status: 'failed', totalItems: 0, failedItems: 0 });
  });

  it('fails the run and rethrows when the agent is gone', async () => {
    setup();
    const runId = newRun();
    services.agents.unregister(TEST_AGENT_NAME);

    await expect(services.runner.execute(runId)).rejects.toThrow(NotFoundError);

    const run = services.runs.requireRun(runId);
    expect(run.status).toBe('failed');
    expect(run.metadata).toMatchObject({ error: `Agent '${TEST_AGENT_NAME}' not found`, errorClass: 'NotFoundError' });
  });

  it('refuses to execute a finished run', async () => {
    setup();
    const runId = newRun();
    await services.runner.execute(runId);

    await expect(services.runner.execute(runId)).rejects.toThrow(InvalidStateTransitionError);
  });
});

describe('DatasetRunnerJob', () => {
  let services: Services;
  let datasetId: string;

  beforeEach(async () => {
    await setupTestDb();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    services = createTestServices();
    datasetId = services.datasets.create({ name: 'qa', agentReference: TEST_AGENT_NAME }).id;
    services.items.create(datasetId, { input: 'one' });
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await closeDb();
  });

  function newRun(name = 'baseline'): string {
    const run = services.runs.createRun(datasetId, { name });
    return services.runs.initializeRunItems(run.id).id;
  }

  it('enqueue returns a running job that completes in the background', async () => {
    const runId = newRun();
    const job = services.jobs.enqueue(runId);

    expect(job.status).toBe('running');
    expect(job.jobId).toMatch(/^run-\d+-[a-z0-9]+$/);

    await services.jobs.drain();
    expect(services.jobs.getJob(job.jobId)).toMatchObject({ status: 'completed', executed: true, runId });
    expect(services.runs.requireRun(runId).status).toBe('completed');
  });

  it('perform skips a finished run', async () => {
    const runId = newRun();
    await services.jobs.perform(runId);

    expect(await services.jobs.perform(runId)).toBeNull();
  });

  it('marks the job skipped when the run already finished', async () => {
    const runId = newRun();
    await services.jobs.perform(runId);

    const job = services.jobs.enqueue(runId);
    await services.jobs.drain();
    expect(services.jobs.getJob(job.jobId)).toMatchObject({ status: 'completed', executed: false });
  });

  it('records the error when the run fails', async () => {
    const runId = newRun();
    services.agents.unregister(TEST_AGENT_NAME);

    const job = services.jobs.enqueue(runId);
    await services.jobs.drain();
    expect(services.jobs.getJob(job.jobId)).toMatchObject({
      status: 'failed',
      error: `Agent '${TEST_AGENT_NAME}' not found`,
    });
  });

  it('prune forgets settled jobs older than the cutoff', async () => {
    const job = services.jobs.enqueue(newRun());
    await services.jobs.drain();

    expect(services.jobs.prune(60_000)).toBe(0);
    expect(services.jobs.prune(-1)).toBe(1);
    expect(services.jobs.getJob(job.jobId)).toBeUndefined();
    expect(services.jobs.listJobs()).toEqual([]);
  });
});

/**
 * API Test Server Harness
 *
 * Builds the real Hono app with:
 *   - In-memory SQLite database (no disk I/O, fast reset)
 *   - A private agent registry holding the built-ins plus a stub agent
 *   - Requests dispatched in-process through app.request(), no open port
 *
 * Usage in tests:
 *   const harness = new ServerHarness();
 *   beforeAll(() => harness.start());
 *   afterEach(() => harness.reset());
 *   afterAll(() => harness.stop());
 */

import type { Hono } from 'hono';
import { AgentRegistry } from '../../src/agents/registry.js';
import type { Agent } from '../../src/agents/types.js';
import { closeDb, getDb, initDb } from '../../src/db/index.js';
import { initSchemas } from '../../src/db/schema.js';
import { createApp } from '../../src/server/index.js';
import { createServices } from '../../src/services/index.js';
import type { ServiceOptions, Services } from '../../src/services/index.js';
import { ApiClient } from './api-client.js';
import { STUB_AGENT_NAME } from './test-constants.js';

// ---------------------------------------------------------------------------
// Stub Agent
// ---------------------------------------------------------------------------

/**
 * Agent that upper-cases string input and throws on the input "fail".
 * Captures every input for assertion.
 */
export function createStubAgent(): Agent & { receivedInputs: unknown[] } {
  const receivedInputs: unknown[] = [];
  return {
    name: STUB_AGENT_NAME,
    description: 'Stub agent for API tests',
    receivedInputs,
    async run(input) {
      receivedInputs.push(input);
      if (input === 'fail') {
        throw new Error('stub agent failure');
      }
      const output = typeof input === 'string' ? input.toUpperCase() : input;
      return { output, usage: { inputTokens: 3, outputTokens: 2, cost: 0.001 } };
    },
  };
}

// ---------------------------------------------------------------------------
// Server Harness
// ---------------------------------------------------------------------------

const TABLES_IN_DELETE_ORDER = [
  'scores',
  'dataset_run_items',
  'dataset_runs',
  'dataset_items',
  'datasets',
  'traces',
  'sessions',
  'prompt_versions',
];

export class ServerHarness {
  private _app: Hono | null = null;
  private _services: Services | null = null;
  private _agent: ReturnType<typeof createStubAgent> | null = null;

  constructor(private readonly options: ServiceOptions = {}) {}

  get app(): Hono {
    if (!this._app) throw new Error('ServerHarness not started');
    return this._app;
  }

  /** Services behind the app, for seeding and direct assertions. */
  get services(): Services {
    if (!this._services) throw new Error('ServerHarness not started');
    return this._services;
  }

  /** The stub agent, to inspect captured inputs. */
  get agent(): ReturnType<typeof createStubAgent> {
    if (!this._agent) throw new Error('ServerHarness not started');
    return this._agent;
  }

  /** Create an ApiClient bound to this harness's app. */
  api(): ApiClient {
    return new ApiClient(this.app);
  }

  /**
   * Boot the app:
   *  1. Init in-memory SQLite and create every table
   *  2. Register the stub agent next to the built-ins
   *  3. Wire services and mount the routes
   */
  async start(): Promise<void> {
    await closeDb();
    await initDb(':memory:');
    initSchemas();
    this.build();
  }

  /**
   * Wait for queued runs, clear every table and rebuild the services so
   * caches and job records start empty.
   */
  async reset(): Promise<void> {
    await this.services.jobs.drain();
    const db = getDb();
    for (const table of TABLES_IN_DELETE_ORDER) {
      db.rawExec(`DELETE FROM ${table}`);
    }
    this.build();
  }

  async stop(): Promise<void> {
    if (this._services) {
      await this._services.jobs.drain();
    }
    this._app = null;
    this._services = null;
    this._agent = null;
    await closeDb();
  }

  private build(): void {
    const agents = new AgentRegistry();
    this._agent = createStubAgent();
    agents.register(this._agent);

    this._services = createServices({ ...this.options, agents });
    this._app = createApp({ services: this._services, perPage: 10, allowedOrigins: ['http://localhost:5173'] });
  }
}

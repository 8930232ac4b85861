import 'dotenv/config';
import { validateEnv, buildConfig } from './config/index.js';
import { initDb, closeDb } from './db/index.js';
import { initSchemas } from './db/schema.js';
import { JOB_PRUNE_INTERVAL_MS, JOB_RETENTION_MS } from './constants.js';
import { createServices } from './services/index.js';
import { PromptLabServer } from './server/index.js';

// Configuration - validated at startup via Zod schema
// Throws when an env value is invalid
const validatedEnv = validateEnv();
const CONFIG = buildConfig(validatedEnv);

async function main(): Promise<void> {
  console.log('promptlab starting...\n');

  // Initialize database
  console.log('[Init] Initializing database...');
  await initDb(CONFIG.dbPath);
  initSchemas();

  console.log('[Init] Creating services...');
  const services = createServices({
    promptCache: CONFIG.promptCache,
    prompts: CONFIG.prompts,
  });
  console.log(`[Init] Registered agents: ${services.agents.list().map(agent => agent.name).join(', ')}`);

  if (CONFIG.promptCache.warming && CONFIG.promptCache.ttlSeconds > 0) {
    console.log('[Init] Warming prompt cache...');
    services.prompts.warmCache();
  }

  const pruneTimer = setInterval(() => {
    const removed = services.jobs.prune(JOB_RETENTION_MS);
    if (removed > 0) {
      console.log(`[Jobs] Pruned ${removed} finished jobs`);
    }
  }, JOB_PRUNE_INTERVAL_MS);
  pruneTimer.unref();

  const server = new PromptLabServer({
    port: CONFIG.port,
    bindAddress: CONFIG.bindAddress,
    perPage: CONFIG.perPage,
    services,
  });
  server.start();

  console.log(`
promptlab ready!

  API:        http://${CONFIG.bindAddress}:${CONFIG.port}/api
  Database:   ${CONFIG.dbPath}
  Cache TTL:  ${CONFIG.promptCache.ttlSeconds}s
`);

  // Handle shutdown
  const shutdown = async (): Promise<void> => {
    console.log('\n[Shutdown] Gracefully shutting down...');
    clearInterval(pruneTimer);
    await server.stop();
    await services.jobs.drain();
    await closeDb();
    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

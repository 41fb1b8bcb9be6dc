/**
 * Macro Narrative Orchestrator: entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import { buildApp } from './app.js';
import { bootstrap } from './bootstrap.js';
import { getEnv } from './config/env.js';
import { getLogger } from './core/logger.js';

async function main(): Promise<void> {
  const env = getEnv();
  const runtime = await bootstrap(env);
  const log = getLogger();

  const app = buildApp({ env, core: runtime.core });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'shutting down');
    await runtime.close();
    await app.close();
    log.info('shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      log.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });

  if (env.ORCHESTRATOR_ENABLED) {
    runtime.core.orchestrator.start();
  } else {
    log.warn('ORCHESTRATOR_ENABLED=false; serving the read API only');
  }
}

main().catch((err) => {
  getLogger().fatal({ err }, 'fatal error during startup');
  process.exit(1);
});

/**
 * Process bootstrap shared by the server and the CLI scripts:
 * env → logger → settings → catalog → adapters → AI capability → store → macro core.
 */

import type { Env } from './config/env.js';
import { loadOrchestratorConfig, type OrchestratorConfig } from './config/orchestrator.config.js';
import { createAlertSink } from './core/alerts/alert.sink.js';
import { configureLogger, moduleLogger } from './core/logger.js';
import { ensureIndexes } from './db/indexes.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import {
  AnthropicCapability,
  buildSeriesCatalog,
  createDefaultProviders,
  createMacroCore,
  DEFAULT_SERIES,
  MemoryHistoryStore,
  MongoHistoryStore,
  UnconfiguredAICapability,
  type MacroCore,
} from './modules/macro-core/index.js';
import type { HistoryStore } from './modules/macro-core/storage/history.store.js';
import type { AICapability } from './modules/macro-core/synthesis/ai.types.js';

export interface Runtime {
  config: OrchestratorConfig;
  core: MacroCore;
  close(): Promise<void>;
}

async function openStore(env: Env): Promise<HistoryStore> {
  if (env.STORE_DRIVER === 'memory') {
    return new MemoryHistoryStore();
  }
  await connectMongo(env.MONGO_URL);
  await ensureIndexes();
  return new MongoHistoryStore();
}

function createAICapability(env: Env, config: OrchestratorConfig): AICapability {
  if (!env.ANTHROPIC_API_KEY) {
    return new UnconfiguredAICapability('ANTHROPIC_API_KEY not configured');
  }
  return AnthropicCapability.fromApiKey(
    env.ANTHROPIC_API_KEY,
    env.AI_MODEL,
    config.synthesis.maxOutputTokens,
    config.synthesis.aiTimeoutMs,
  );
}

export async function bootstrap(env: Env): Promise<Runtime> {
  configureLogger(env.LOG_LEVEL);
  const log = moduleLogger('boot');

  const config = loadOrchestratorConfig(env.ORCHESTRATOR_CONFIG_FILE);
  log.info({ config, store: env.STORE_DRIVER }, 'orchestrator settings resolved');

  const catalog = buildSeriesCatalog(DEFAULT_SERIES, config.seriesOverrides, config.enabledSeries);
  const providers = createDefaultProviders({ fredApiKey: env.FRED_API_KEY, blsApiKey: env.BLS_API_KEY });
  if (!env.FRED_API_KEY) {
    log.warn('FRED_API_KEY not set; FRED series will fail until it is configured');
  }

  const ai = createAICapability(env, config);
  if (ai instanceof UnconfiguredAICapability) {
    log.warn('ANTHROPIC_API_KEY not set; change-sets will queue in the synthesis backlog');
  }

  const store = await openStore(env);
  const core = createMacroCore({
    store,
    catalog,
    providers,
    ai,
    config,
    alerts: createAlertSink({ webhookUrl: env.ALERT_WEBHOOK_URL }),
  });

  return {
    config,
    core,
    async close() {
      await core.orchestrator.stop();
      if (env.STORE_DRIVER === 'mongo') await disconnectMongo();
    },
  };
}

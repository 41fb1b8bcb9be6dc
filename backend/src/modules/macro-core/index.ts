/**
 * MACRO CORE MODULE
 *
 * Wires catalog, provider adapters, reconciliation, scheduler, synthesis and
 * the orchestrator loop over one HistoryStore, and mounts the read API.
 */

import type { FastifyInstance } from 'fastify';
import type { OrchestratorConfig } from '../../config/orchestrator.config.js';
import { createAlertSink, type AlertSink } from '../../core/alerts/alert.sink.js';
import { moduleLogger, type Logger } from '../../core/logger.js';
import { registerMacroRoutes } from './api/macro.routes.js';
import type { SeriesCatalog } from './data/series.catalog.js';
import type { ProviderRegistry } from './ingest/provider.registry.js';
import { ReconciliationEngine } from './reconcile/reconcile.service.js';
import type { RandomSource } from './scheduler/schedule.machine.js';
import { SchedulerService } from './scheduler/scheduler.service.js';
import { IngestPipeline } from './services/ingest.pipeline.js';
import { OrchestratorService } from './services/orchestrator.service.js';
import type { HistoryStore } from './storage/history.store.js';
import type { AICapability } from './synthesis/ai.types.js';
import { SynthesisBacklog } from './synthesis/synthesis.backlog.js';
import { SynthesisService } from './synthesis/synthesis.service.js';

export interface MacroCoreOptions {
  store: HistoryStore;
  catalog: SeriesCatalog;
  providers: ProviderRegistry;
  ai: AICapability;
  config: OrchestratorConfig;
  alerts?: AlertSink;
  now?: () => Date;
  random?: RandomSource;
  logger?: Logger;
}

export interface MacroCore {
  store: HistoryStore;
  catalog: SeriesCatalog;
  providers: ProviderRegistry;
  reconciler: ReconciliationEngine;
  pipeline: IngestPipeline;
  scheduler: SchedulerService;
  synthesis: SynthesisService;
  backlog: SynthesisBacklog;
  orchestrator: OrchestratorService;
}

export function createMacroCore(options: MacroCoreOptions): MacroCore {
  const { store, catalog, providers, ai, config, now, random } = options;
  const child = (module: string): Logger => (options.logger ? options.logger.child({ module }) : moduleLogger(module));

  providers.assertCovers(catalog);
  const alerts = options.alerts ?? createAlertSink({ logger: child('alerts') });

  const reconciler = new ReconciliationEngine(store, catalog, { now, logger: child('reconcile') });
  const pipeline = new IngestPipeline({
    store,
    catalog,
    providers,
    reconciler,
    config: config.scheduler,
    now,
    logger: child('ingest'),
  });
  const scheduler = new SchedulerService({
    store,
    catalog,
    pipeline,
    alerts,
    config: config.scheduler,
    now,
    random,
    logger: child('scheduler'),
  });
  const synthesis = new SynthesisService({ store, catalog, ai, config: config.synthesis, now, logger: child('synthesis') });
  const backlog = new SynthesisBacklog({
    store,
    synthesis,
    config: config.synthesis,
    alerts,
    alertAfterAttempts: config.scheduler.alertThreshold,
    now,
    logger: child('backlog'),
  });
  const orchestrator = new OrchestratorService({
    store,
    catalog,
    providers,
    pipeline,
    scheduler,
    backlog,
    config,
    now,
    logger: child('orchestrator'),
  });

  return { store, catalog, providers, reconciler, pipeline, scheduler, synthesis, backlog, orchestrator };
}

// ═══════════════════════════════════════════════════════════════
// REGISTER MODULE
// ═══════════════════════════════════════════════════════════════

export async function registerMacroCoreModule(fastify: FastifyInstance, core: MacroCore): Promise<void> {
  await registerMacroRoutes(fastify, core);
  fastify.log.info({ series: core.catalog.size }, 'macro-core routes registered');
}

export * from './contracts/macro.contracts.js';
export { DEFAULT_SERIES, buildSeriesCatalog, SeriesCatalog } from './data/series.catalog.js';
export { createDefaultProviders, ProviderRegistry } from './ingest/provider.registry.js';
export { MemoryHistoryStore } from './storage/memory.store.js';
export { MongoHistoryStore } from './storage/mongo.store.js';
export { AnthropicCapability } from './synthesis/anthropic.capability.js';
export { UnconfiguredAICapability } from './synthesis/ai.types.js';

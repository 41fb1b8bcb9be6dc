/**
 * SYNTHESIS TRIGGER
 *
 * Change-set in, narrative artifact out. One artifact per change-set: a
 * second call for the same change-set returns the stored artifact.
 */

import { v4 as uuid } from 'uuid';
import {
  AIUnavailableError,
  ContextTooLargeError,
  DataIntegrityError,
  ValidationError,
} from '../../../common/errors.js';
import { TimeoutError, withTimeout } from '../../../common/timeout.js';
import type { SynthesisConfig } from '../../../config/orchestrator.config.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type { ChangeSet, NarrativeArtifact } from '../contracts/macro.contracts.js';
import { comparePeriods } from '../data/period.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import { isEmptyChangeSet } from '../reconcile/reconcile.service.js';
import type { HistoryStore } from '../storage/history.store.js';
import { estimateTokens, type AICapability, type GenerateResult } from './ai.types.js';
import { selectContextWindows, truncateWindows, type SeriesContextWindow } from './context.window.js';
import { buildSynthesisPrompt } from './prompt.builder.js';

export interface SynthesisDeps {
  store: HistoryStore;
  catalog: SeriesCatalog;
  ai: AICapability;
  config: SynthesisConfig;
  now?: () => Date;
  newId?: () => string;
  logger?: Logger;
}

export class SynthesisService {
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly log: Logger;

  constructor(private readonly deps: SynthesisDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? (() => uuid());
    this.log = deps.logger ?? moduleLogger('synthesis');
  }

  /**
   * @throws AIUnavailableError when the capability fails or times out
   * @throws ContextTooLargeError when even the truncated windows do not fit
   */
  async synthesize(changeSet: ChangeSet, signal?: AbortSignal): Promise<NarrativeArtifact> {
    if (isEmptyChangeSet(changeSet)) {
      throw new ValidationError(`Change-set ${changeSet.id} is empty; nothing to synthesize`);
    }

    const existing = await this.deps.store.findArtifactByChangeSet(changeSet.id);
    if (existing) return existing;

    const windows = await selectContextWindows(
      changeSet,
      this.deps.store,
      this.deps.catalog,
      this.deps.config.windowPeriods,
    );

    let truncated = false;
    let generated: { result: GenerateResult; promptTokens: number };
    try {
      generated = await this.generate(changeSet, windows, signal);
    } catch (err) {
      if (!(err instanceof ContextTooLargeError)) throw err;
      this.log.warn({ changeSetId: changeSet.id, estimatedTokens: err.estimatedTokens }, 'context too large, halving windows');
      truncated = true;
      generated = await this.generate(changeSet, truncateWindows(windows), signal);
    }

    const periods = changeSet.entries.map((e) => e.period).sort(comparePeriods);
    const artifact: NarrativeArtifact = {
      id: this.newId(),
      generatedAt: this.now(),
      coveredSeries: [...new Set(changeSet.entries.map((e) => e.seriesKey))].sort(),
      coveredPeriodRange: { from: periods[0], to: periods[periods.length - 1] },
      text: generated.result.text,
      sourceChangeSetRef: changeSet.id,
      model: generated.result.model,
      promptTokensEstimate: generated.promptTokens,
      truncated,
    };

    try {
      await this.deps.store.appendArtifact(artifact);
    } catch (err) {
      // another worker finished the same change-set first
      if (err instanceof DataIntegrityError) {
        const winner = await this.deps.store.findArtifactByChangeSet(changeSet.id);
        if (winner) return winner;
      }
      throw err;
    }

    this.log.info(
      { artifactId: artifact.id, changeSetId: changeSet.id, series: artifact.coveredSeries, truncated },
      'narrative stored',
    );
    return artifact;
  }

  private async generate(
    changeSet: ChangeSet,
    windows: readonly SeriesContextWindow[],
    signal: AbortSignal | undefined,
  ): Promise<{ result: GenerateResult; promptTokens: number }> {
    const prompt = buildSynthesisPrompt(changeSet, windows);
    const { maxContextTokens, maxOutputTokens, aiTimeoutMs } = this.deps.config;

    try {
      const result = await withTimeout(
        `synthesis ${changeSet.id}`,
        aiTimeoutMs,
        (s) => this.deps.ai.generate(prompt.user, { system: prompt.system, maxContextTokens, maxOutputTokens, signal: s }),
        signal,
      );
      return { result, promptTokens: estimateTokens(prompt.system) + estimateTokens(prompt.user) };
    } catch (err) {
      if (err instanceof TimeoutError) throw new AIUnavailableError(err.message, err);
      throw err;
    }
  }
}

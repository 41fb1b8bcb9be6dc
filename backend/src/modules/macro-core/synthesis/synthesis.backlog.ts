/**
 * SYNTHESIS BACKLOG
 *
 * Change-sets whose narrative could not be written yet. Entries leave the
 * backlog only once an artifact exists for them; failed attempts push
 * `nextAttemptAt` out with exponential backoff.
 */

import { errorMessage } from '../../../common/errors.js';
import type { SynthesisConfig } from '../../../config/orchestrator.config.js';
import type { AlertSink } from '../../../core/alerts/alert.sink.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type { ChangeSet, NarrativeArtifact, PendingSynthesis } from '../contracts/macro.contracts.js';
import { isEmptyChangeSet } from '../reconcile/reconcile.service.js';
import { backoffDelayMs } from '../scheduler/schedule.machine.js';
import type { HistoryStore } from '../storage/history.store.js';
import type { SynthesisService } from './synthesis.service.js';

export type SubmitOutcome =
  | { status: 'synthesized'; artifact: NarrativeArtifact }
  | { status: 'queued'; pending: PendingSynthesis }
  | { status: 'skipped' };

export interface DrainReport {
  attempted: number;
  synthesized: number;
  requeued: number;
}

export interface BacklogDeps {
  store: HistoryStore;
  synthesis: Pick<SynthesisService, 'synthesize'>;
  config: Pick<SynthesisConfig, 'backlogBackoffBaseMs' | 'backlogBackoffMaxMs'>;
  alerts?: AlertSink;
  /** Attempts after which each further failure raises an alert. */
  alertAfterAttempts?: number;
  now?: () => Date;
  logger?: Logger;
}

const DRAIN_BATCH = 10;

export class SynthesisBacklog {
  /** Entries the store refused; flushed on the next drain. */
  private readonly unsaved = new Map<string, PendingSynthesis>();
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: BacklogDeps) {
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? moduleLogger('backlog');
  }

  /** Try to synthesize now; on any failure the change-set is queued. */
  async submit(changeSet: ChangeSet, signal?: AbortSignal): Promise<SubmitOutcome> {
    if (isEmptyChangeSet(changeSet)) return { status: 'skipped' };

    try {
      const artifact = await this.deps.synthesis.synthesize(changeSet, signal);
      return { status: 'synthesized', artifact };
    } catch (err) {
      const pending = this.nextAttempt(
        { changeSetId: changeSet.id, changeSet, attempts: 0, nextAttemptAt: this.now(), createdAt: this.now() },
        err,
      );
      await this.save(pending);
      this.log.warn(
        { changeSetId: changeSet.id, nextAttemptAt: pending.nextAttemptAt.toISOString(), err: pending.lastError },
        'synthesis queued for retry',
      );
      return { status: 'queued', pending };
    }
  }

  /** Retry entries whose backoff has elapsed. */
  async drain(signal?: AbortSignal, limit = DRAIN_BATCH): Promise<DrainReport> {
    await this.flushUnsaved();

    const report: DrainReport = { attempted: 0, synthesized: 0, requeued: 0 };
    const due = await this.deps.store.listDuePendingSyntheses(this.now(), limit);

    for (const entry of due) {
      if (signal?.aborted) break;
      report.attempted++;

      try {
        await this.deps.synthesis.synthesize(entry.changeSet, signal);
        await this.deps.store.removePendingSynthesis(entry.changeSetId);
        report.synthesized++;
        this.log.info({ changeSetId: entry.changeSetId, attempts: entry.attempts + 1 }, 'backlog entry synthesized');
      } catch (err) {
        const next = this.nextAttempt(entry, err);
        await this.save(next);
        report.requeued++;
        await this.maybeAlert(next);
      }
    }
    return report;
  }

  async list(): Promise<PendingSynthesis[]> {
    const stored = await this.deps.store.listPendingSyntheses();
    const ids = new Set(stored.map((p) => p.changeSetId));
    return [...stored, ...[...this.unsaved.values()].filter((p) => !ids.has(p.changeSetId))];
  }

  private nextAttempt(entry: PendingSynthesis, err: unknown): PendingSynthesis {
    const attempts = entry.attempts + 1;
    const delay = backoffDelayMs(attempts, this.deps.config.backlogBackoffBaseMs, this.deps.config.backlogBackoffMaxMs);
    return {
      ...entry,
      attempts,
      nextAttemptAt: new Date(this.now().getTime() + delay),
      lastError: errorMessage(err),
    };
  }

  private async save(entry: PendingSynthesis): Promise<void> {
    try {
      await this.deps.store.upsertPendingSynthesis(entry);
      this.unsaved.delete(entry.changeSetId);
    } catch (err) {
      this.unsaved.set(entry.changeSetId, entry);
      this.log.error({ changeSetId: entry.changeSetId, err: errorMessage(err) }, 'backlog entry kept in memory');
    }
  }

  private async flushUnsaved(): Promise<void> {
    for (const entry of [...this.unsaved.values()]) {
      await this.save(entry);
    }
  }

  private async maybeAlert(entry: PendingSynthesis): Promise<void> {
    const threshold = this.deps.alertAfterAttempts;
    if (!this.deps.alerts || threshold === undefined || entry.attempts < threshold) return;
    await this.deps.alerts.send({
      kind: 'SYNTHESIS_BACKLOG',
      severity: 'warning',
      message: `Synthesis for change-set ${entry.changeSetId} failed ${entry.attempts} times: ${entry.lastError ?? 'unknown'}`,
      context: { changeSetId: entry.changeSetId, nextAttemptAt: entry.nextAttemptAt.toISOString() },
      at: this.now(),
    });
  }
}

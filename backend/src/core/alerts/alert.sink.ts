/**
 * ALERTS: observability hook
 *
 * Sinks never throw: a failed delivery is logged and dropped, so an alert
 * can never turn into a pipeline failure.
 */

import axios from 'axios';
import { errorMessage } from '../../common/errors.js';
import { moduleLogger, type Logger } from '../logger.js';

export type AlertKind = 'SERIES_FAILING' | 'SYNTHESIS_BACKLOG';
export type AlertSeverity = 'warning' | 'critical';

export interface Alert {
  kind: AlertKind;
  severity: AlertSeverity;
  message: string;
  seriesKey?: string;
  context?: Record<string, unknown>;
  at: Date;
}

export interface AlertSink {
  send(alert: Alert): Promise<void>;
}

export class LogAlertSink implements AlertSink {
  constructor(private readonly log: Logger = moduleLogger('alerts')) {}

  async send(alert: Alert): Promise<void> {
    const fields = { kind: alert.kind, seriesKey: alert.seriesKey, ...alert.context };
    if (alert.severity === 'critical') {
      this.log.error(fields, alert.message);
    } else {
      this.log.warn(fields, alert.message);
    }
  }
}

/** The slice of axios the webhook sink calls. */
export interface WebhookPoster {
  post(
    url: string,
    body: unknown,
    config: { timeout: number; validateStatus: (status: number) => boolean },
  ): Promise<{ status: number }>;
}

export class WebhookAlertSink implements AlertSink {
  constructor(
    private readonly url: string,
    private readonly http: WebhookPoster = axios,
    private readonly log: Logger = moduleLogger('alerts'),
    private readonly timeoutMs = 10_000,
  ) {}

  async send(alert: Alert): Promise<void> {
    try {
      const res = await this.http.post(
        this.url,
        {
          kind: alert.kind,
          severity: alert.severity,
          message: alert.message,
          seriesKey: alert.seriesKey ?? null,
          context: alert.context ?? {},
          at: alert.at.toISOString(),
        },
        { timeout: this.timeoutMs, validateStatus: () => true },
      );
      if (res.status >= 300) {
        this.log.warn({ status: res.status, kind: alert.kind }, 'alert webhook rejected');
      }
    } catch (err) {
      this.log.error({ err: errorMessage(err), kind: alert.kind }, 'alert webhook failed');
    }
  }
}

export class CompositeAlertSink implements AlertSink {
  constructor(private readonly sinks: readonly AlertSink[]) {}

  async send(alert: Alert): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.send(alert)));
  }
}

export function createAlertSink(options: { webhookUrl?: string; logger?: Logger } = {}): AlertSink {
  const log = options.logger ?? moduleLogger('alerts');
  const sinks: AlertSink[] = [new LogAlertSink(log)];
  if (options.webhookUrl) {
    sinks.push(new WebhookAlertSink(options.webhookUrl, axios, log));
  }
  return sinks.length === 1 ? sinks[0] : new CompositeAlertSink(sinks);
}

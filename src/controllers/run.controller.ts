import type { Config } from '../config';
import logger, { type Logger } from '../lib/logger';
import { formatDate } from '../lib/time';
import { reportSubject, type ReportMail } from '../services/mailer';
import type { ReportVariables } from '../services/report';
import type { InventoryEntry } from '../types/inventory';
import type { CollectSummary } from './smart.controller';

export interface Collector {
  collect(entries: readonly InventoryEntry[]): Promise<CollectSummary>;
}

export interface Renderer {
  render(vars: ReportVariables): string;
}

export interface Notifier {
  send(mail: ReportMail): Promise<void>;
}

export type RunDependencies = {
  collector: Collector;
  renderer: Renderer;
  /** Present only when mail delivery is enabled. */
  notifier?: Notifier;
  now?: () => Date;
  logger?: Logger;
};

export type RunOutcome = {
  summary: CollectSummary;
  report?: string;
  mailed: boolean;
};

/**
 * One reporting run: collect every drive, render the report, then hand it to
 * the optional mailer. Output failures are logged and never abort the run.
 */
export class RunController {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly config: Config,
    private readonly deps: RunDependencies
  ) {
    this.log = deps.logger ?? logger.child('run');
    this.now = deps.now ?? (() => new Date());
  }

  async run(inventory: readonly InventoryEntry[]): Promise<RunOutcome> {
    const summary = await this.deps.collector.collect(inventory);
    this.log.info('collection finished', {
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      halted: summary.halted,
    });

    const date = formatDate(this.now());
    const report = this.renderReport({ org: this.config.org, date, servers: summary.servers });

    let mailed = false;
    if (report !== undefined && this.deps.notifier) {
      mailed = await this.mailReport(this.deps.notifier, date, report);
    } else if (this.deps.notifier) {
      this.log.warn('no report to send, skipping mail');
    }

    return { summary, report, mailed };
  }

  private renderReport(vars: ReportVariables): string | undefined {
    this.log.info('rendering the report');
    try {
      return this.deps.renderer.render(vars);
    } catch (err) {
      this.log.error('failed to render the report', { err });
      return undefined;
    }
  }

  private async mailReport(notifier: Notifier, date: string, report: string): Promise<boolean> {
    try {
      await notifier.send({ subject: reportSubject(this.config.org, date), html: report });
      return true;
    } catch (err) {
      this.log.error('failed to send the report', { err });
      return false;
    }
  }
}

import chalk from 'chalk';
import kleur from 'kleur';
import type { SearchLogger } from '../logger.js';
import type { AbortReason, QueryRecord, SessionAttempt, SessionEvent, SessionOutcome } from '../session/types.js';

const isTty = (): boolean => Boolean(process.stdout.isTTY);
const dim = (text: string): string => (isTty() ? kleur.dim(text) : text);

export const PROGRESS_BAR_WIDTH = 20;

export interface RunSummary {
  status: 'pending' | 'completed' | 'aborted';
  reason?: AbortReason;
  attempts: number;
  searchCount: number;
  succeeded: number;
  failedNavigation: number;
  failedInteraction: number;
  skipped: number;
}

const ABORT_LABELS: Record<AbortReason, string> = {
  'retry-budget-exhausted': 'the browser session kept failing and the retry budget is used up',
  'fatal-failure': 'an unrecoverable error stopped the run',
  cancelled: 'cancelled by the operator',
};

export function renderProgressBar(done: number, total: number, width = PROGRESS_BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, done / total)) : 1;
  const filled = Math.floor(width * ratio);
  return `[${'█'.repeat(filled)}${'─'.repeat(width - filled)}] ${done}/${total} searches`;
}

function tally(records: readonly QueryRecord[]) {
  const counts = { succeeded: 0, failedNavigation: 0, failedInteraction: 0, skipped: 0 };
  for (const record of records) {
    switch (record.outcome) {
      case 'success':
        counts.succeeded += 1;
        break;
      case 'failed-navigation':
        counts.failedNavigation += 1;
        break;
      case 'failed-interaction':
        counts.failedInteraction += 1;
        break;
      case 'skipped-no-more-queries':
        counts.skipped += 1;
        break;
    }
  }
  return counts;
}

/** Turns driver events into console/log output and keeps the numbers for the final summary. */
export class ProgressReporter {
  private searchCount = 0;
  private attemptsSeen = 0;
  private lastAttempt: SessionAttempt | null = null;
  private outcome: SessionOutcome | null = null;
  private processedThisAttempt = 0;

  constructor(private readonly logger: SearchLogger) {}

  handle(event: SessionEvent): void {
    switch (event.type) {
      case 'attempt-started':
        this.searchCount = event.searchCount;
        this.attemptsSeen = event.attemptNumber;
        this.processedThisAttempt = 0;
        this.logger(
          chalk.bold(
            event.attemptNumber === 1
              ? `Starting Edge session (attempt 1/${event.maxAttempts})`
              : `Restarting Edge session (attempt ${event.attemptNumber}/${event.maxAttempts})`,
          ),
        );
        return;
      case 'query-started':
        this.logger(`Search ${event.index}/${event.total}: "${event.query}"`);
        return;
      case 'query-finished':
        this.processedThisAttempt += 1;
        this.logRecord(event.record, event.total);
        this.logger(dim(renderProgressBar(this.processedThisAttempt, event.total)));
        return;
      case 'attempt-finished':
        this.lastAttempt = event.attempt;
        if (event.attempt.terminalOutcome === 'retryable-failure') {
          const done = event.attempt.queriesPerformed.length;
          this.logger.warn(
            `Attempt ${event.attempt.attemptNumber}/${event.maxAttempts} lost the browser session after ${done} search(es).`,
          );
        }
        return;
      case 'restart-scheduled':
        this.logger(dim(`Waiting ${Math.round(event.backoffMs / 1000)}s before attempt ${event.attemptNumber}...`));
        return;
      case 'run-finished':
        this.outcome = event.outcome;
        this.searchCount = event.searchCount;
        this.printSummary();
        return;
      case 'login-wait':
      case 'state':
        this.logger.debug(event.type === 'state' ? `Driver state: ${event.state}` : `Login wait: ${event.status}`);
        return;
    }
  }

  summary(): RunSummary {
    const counts = tally(this.lastAttempt?.queriesPerformed ?? []);
    const base = { attempts: this.attemptsSeen, searchCount: this.searchCount, ...counts };
    if (!this.outcome) {
      return { status: 'pending', ...base };
    }
    if (this.outcome.status === 'aborted') {
      return { status: 'aborted', reason: this.outcome.reason, ...base };
    }
    return { status: 'completed', ...base };
  }

  private logRecord(record: QueryRecord, total: number): void {
    const position = `${record.index}/${total}`;
    switch (record.outcome) {
      case 'success':
        this.logger(chalk.green(`Search ${position} done`));
        return;
      case 'failed-navigation':
        this.logger.warn(`Search ${position} skipped: the search page did not load (${record.detail ?? 'no detail'})`);
        return;
      case 'failed-interaction':
        this.logger.warn(`Search ${position} skipped: the search box could not be used (${record.detail ?? 'no detail'})`);
        return;
      case 'skipped-no-more-queries':
        this.logger.warn(`Search ${position} skipped: no unused queries left`);
        return;
    }
  }

  private printSummary(): void {
    const summary = this.summary();
    const failed = summary.failedNavigation + summary.failedInteraction;
    if (summary.status === 'aborted' && summary.reason) {
      this.logger.error(`Run aborted: ${ABORT_LABELS[summary.reason]}.`);
    }
    const line = `Completed ${summary.succeeded}/${summary.searchCount} searches successfully`;
    this.logger(summary.status === 'completed' && failed === 0 && summary.skipped === 0 ? chalk.green(line) : chalk.yellow(line));
    if (failed > 0 || summary.skipped > 0) {
      this.logger(
        dim(
          `Navigation failures: ${summary.failedNavigation}, interaction failures: ${summary.failedInteraction}, skipped: ${summary.skipped}`,
        ),
      );
    }
  }
}

import type { PageVisit, ProductRecord, RunResult, RunSummary, ScrapeMode, StopReason } from './types';

/**
 * Collects page visits for one run. Passed explicitly through the PDP and
 * PLP loops; `finish()` freezes the result.
 */
export class RunAccumulator {
  private readonly visits: PageVisit[] = [];
  private stopReason: StopReason | null = null;
  private readonly startedAt: Date;
  private finished: RunResult | null = null;

  constructor(private readonly mode: ScrapeMode, private readonly clock: () => Date = () => new Date()) {
    this.startedAt = this.clock();
  }

  add(visit: PageVisit): void {
    if (this.finished) throw new Error('Run already finished');
    this.visits.push(visit);
  }

  stop(reason: StopReason): void {
    this.stopReason = reason;
  }

  get stopped(): boolean {
    return this.stopReason !== null;
  }

  get pages(): readonly PageVisit[] {
    return this.visits;
  }

  records(): ProductRecord[] {
    return this.visits.flatMap(visit => visit.records);
  }

  summarize(finishedAt: Date = this.clock()): RunSummary {
    const count = (status: PageVisit['outcome']['status']) =>
      this.visits.filter(visit => visit.outcome.status === status).length;
    const records = this.records();

    return {
      mode: this.mode,
      attempted: this.visits.length,
      succeeded: count('OK'),
      blocked: count('BLOCK'),
      timedOut: count('TIMEOUT'),
      errored: count('ERROR'),
      partial: records.filter(record => record.partial).length,
      records: records.length,
      navigationAttempts: this.visits.reduce((total, visit) => total + visit.outcome.attempt, 0),
      stopReason: this.stopReason,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
    };
  }

  finish(): RunResult {
    if (!this.finished) {
      this.finished = Object.freeze({ summary: this.summarize(), visits: [...this.visits] });
    }
    return this.finished;
  }
}

/**
 * Run timing.
 *
 * Stage durations measured during a run, plus the `H:MM:SS` elapsed format
 * written to the workbook.
 */

import { format } from "date-fns";

export interface StageTiming {
  stage: string;
  durationMs: number;
  /** e.g. the message index for per-message stages */
  context: Record<string, unknown> | undefined;
}

export interface TimingSummary {
  operation: string;
  count: number;
  totalMs: number;
  maxMs: number;
  avgMs: number;
}

export interface RunMetrics {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  totalDurationMs: number;
  messagesProcessed: number;
  attachmentsSaved: number;
  summaries: TimingSummary[];
}

export class TimingCollector {
  private readonly stages = new Map<string, StageTiming[]>();
  readonly runId: string;

  constructor(readonly startedAt: Date = new Date()) {
    this.runId = `run-${format(startedAt, "yyyyMMdd-HHmmss")}`;
  }

  record(stage: string, durationMs: number, context?: Record<string, unknown>): void {
    const entries = this.stages.get(stage) ?? [];
    entries.push({ stage, durationMs, context });
    this.stages.set(stage, entries);
  }

  /**
   * Run `fn` and record how long it took, whether or not it throws.
   */
  timeSync<T>(stage: string, fn: () => T, context?: Record<string, unknown>): T {
    const began = performance.now();
    try {
      return fn();
    } finally {
      this.record(stage, performance.now() - began, context);
    }
  }

  /** Entries for one stage, or every entry in first-seen stage order */
  entries(stage?: string): StageTiming[] {
    if (stage !== undefined) return [...(this.stages.get(stage) ?? [])];
    return [...this.stages.values()].flat();
  }

  summarize(stage: string): TimingSummary | null {
    const entries = this.stages.get(stage);
    if (!entries || entries.length === 0) return null;

    let totalMs = 0;
    let maxMs = 0;
    for (const { durationMs } of entries) {
      totalMs += durationMs;
      maxMs = Math.max(maxMs, durationMs);
    }
    return { operation: stage, count: entries.length, totalMs, maxMs, avgMs: totalMs / entries.length };
  }

  finalize(messagesProcessed: number, attachmentsSaved: number, completedAt: Date = new Date()): RunMetrics {
    const summaries: TimingSummary[] = [];
    for (const stage of this.stages.keys()) {
      const summary = this.summarize(stage);
      if (summary) summaries.push(summary);
    }

    return {
      runId: this.runId,
      startedAt: this.startedAt,
      completedAt,
      totalDurationMs: completedAt.getTime() - this.startedAt.getTime(),
      messagesProcessed,
      attachmentsSaved,
      summaries,
    };
  }
}

/**
 * Elapsed time as `H:MM:SS`: whole seconds, hours not wrapped at 24.
 */
export function formatElapsed(durationMs: number): string {
  const totalSeconds = Math.max(0, Math.floor(durationMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const mm = String(Math.floor((totalSeconds % 3600) / 60)).padStart(2, "0");
  const ss = String(totalSeconds % 60).padStart(2, "0");
  return `${hours}:${mm}:${ss}`;
}

export function formatSummary(s: TimingSummary): string {
  return `${s.operation}: count=${s.count}, total=${s.totalMs.toFixed(0)}ms, avg=${s.avgMs.toFixed(1)}ms, max=${s.maxMs.toFixed(1)}ms`;
}

export function formatRunMetrics(metrics: RunMetrics): string {
  return [
    `=== Run Metrics (${metrics.runId}) ===`,
    `Duration: ${formatElapsed(metrics.totalDurationMs)}`,
    `Messages: ${metrics.messagesProcessed}`,
    `Attachments saved: ${metrics.attachmentsSaved}`,
    ...metrics.summaries.map((s) => `  ${formatSummary(s)}`),
  ].join("\n");
}

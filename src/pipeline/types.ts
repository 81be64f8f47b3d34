/**
 * Type definitions for the pipeline module: what a run produces.
 */

import type { SourceId } from '../discovery/types.js';

export type RunTrigger = 'scheduled' | 'manual' | 'direct';

/** A course that survived normalization, dedup, validation and history. */
export interface ConfirmedCourse {
  title: string;
  url: string;
  source: SourceId;
}

/** Non-fatal source problem surfaced with the run result. */
export interface SourceFailureNote {
  source: SourceId;
  url?: string;
  message: string;
  code: string;
}

export interface RunCounts {
  /** Raw candidates returned by all adapters. */
  candidates: number;
  /** Candidates rejected by the normalizer. */
  rejected: number;
  /** Candidates dropped as in-run duplicates. */
  duplicates: number;
  /** Unique URLs whose coupon was not confirmed free. */
  notFree: number;
  /** Free URLs already emitted by an earlier run. */
  alreadySeen: number;
  confirmed: number;
  perSource: Partial<Record<SourceId, number>>;
}

export interface PipelineRunResult {
  runId: string;
  trigger: RunTrigger;
  startedAt: string;
  /** Confirmed courses in first-seen order. */
  courses: ConfirmedCourse[];
  /** Same order as `courses`. */
  urls: string[];
  notes: SourceFailureNote[];
  stats: RunCounts;
  durationMs: number;
}

/** Anything that can produce a run; the scheduler depends on this. */
export interface PipelineRunner {
  run(trigger?: RunTrigger): Promise<PipelineRunResult>;
  clearHistory(): number;
  readonly historySize: number;
}

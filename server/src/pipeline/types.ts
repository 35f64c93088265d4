/**
 * Shared type definitions for the two-stage content pipeline.
 *
 * The session state machine owns every value defined here; executors and
 * runners only produce them and report upward.
 */

import type { PipelineConfig } from './schemas/pipeline-config.js';

// ─── Session ─────────────────────────────────────────────────────────

export type SessionStage =
  | 'idle'
  | 'running_ideas'
  | 'awaiting_selection'
  | 'running_docs'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_STAGES: readonly SessionStage[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStage(stage: SessionStage): boolean {
  return TERMINAL_STAGES.includes(stage);
}

/** Name of the stage a progress value belongs to. */
export type StageName = 'ideas' | 'documents';

export interface Topic {
  id: number;
  title: string;
  previewText: string;
  wordCount: number;
  sourcePath?: string;
}

export type DocumentStatus =
  | 'succeeded'
  | 'failed'
  | 'retried-then-succeeded'
  | 'retried-then-failed';

export type DocumentFailureReason = 'exit_code' | 'timed_out' | 'missing_artifact' | 'spawn_error';

export interface DocumentResult {
  topicId: number;
  status: DocumentStatus;
  outputLocation?: string;
  errorDetail?: string;
  reason?: DocumentFailureReason;
  attempts: number;
}

export interface ProgressEvent {
  stageName: StageName;
  percent: number;
  message: string;
  timestamp: string;
}

export type FailureCode = 'execution_error' | 'timeout' | 'fail_fast_abort' | 'internal_error';

export interface SessionFailure {
  code: FailureCode;
  detail: string;
}

export interface Session {
  id: string;
  stage: SessionStage;
  config: PipelineConfig;
  topics: Topic[];
  selection: number[];
  results: DocumentResult[];
  progress: Partial<Record<StageName, ProgressEvent>>;
  failure: SessionFailure | null;
  startedAt: string;
  endedAt: string | null;
  cancelRequested: boolean;
}

export interface PipelineSummary {
  status: 'completed' | 'failed' | 'cancelled';
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  durationMs: number;
}

/** Read-only view of the session handed to observers and the status route. */
export interface SessionSnapshot {
  session_id: string | null;
  stage: SessionStage;
  name: string | null;
  progress: Partial<Record<StageName, ProgressEvent>>;
  topics: Topic[];
  selection: number[];
  results: DocumentResult[];
  failure: SessionFailure | null;
  started_at: string | null;
  ended_at: string | null;
}

// ─── Event stream ────────────────────────────────────────────────────

export type PipelineSSEEventBody =
  | { type: 'snapshot'; snapshot: SessionSnapshot }
  | { type: 'stage_changed'; stage: SessionStage }
  | { type: 'progress'; stage: StageName; percent: number; message: string }
  | { type: 'topics_ready'; topics: Topic[] }
  | ({ type: 'document_result' } & DocumentResult)
  | { type: 'pipeline_finished'; summary: PipelineSummary }
  | { type: 'error'; code: FailureCode; detail: string };

export type PipelineSSEEvent = PipelineSSEEventBody & {
  session_id: string | null;
  timestamp: string;
};

// ─── Command results ─────────────────────────────────────────────────

export type RejectionCode = 'VALIDATION' | 'CONFLICT';

export interface CommandRejection {
  accepted: false;
  code: RejectionCode;
  error: string;
  details?: unknown;
}

export type CommandResult<T extends object = object> = ({ accepted: true } & T) | CommandRejection;

/**
 * Session State Machine — the only code that mutates a Session.
 *
 * `transition` is a pure function defined for every state × event pair: it
 * either returns the next Session or a rejection. `SessionStateMachine` holds
 * the single current Session and applies transitions to it.
 */

import type { PipelineConfig } from './schemas/pipeline-config.js';
import {
  isTerminalStage,
  type DocumentResult,
  type PipelineSummary,
  type ProgressEvent,
  type Session,
  type SessionFailure,
  type SessionSnapshot,
  type SessionStage,
  type Topic,
} from './types.js';

export type SessionEvent =
  | { type: 'start'; sessionId: string; config: PipelineConfig; at: string }
  | { type: 'ideaStageProgress'; sessionId: string; progress: ProgressEvent }
  | { type: 'ideaStageSucceeded'; sessionId: string; topics: Topic[] }
  | { type: 'ideaStageFailed'; sessionId: string; failure: SessionFailure; at: string }
  | { type: 'selectAndGenerate'; sessionId: string; selection: number[] }
  | { type: 'docStageProgress'; sessionId: string; progress: ProgressEvent }
  | { type: 'docStageProgress'; sessionId: string; result: DocumentResult }
  | { type: 'docStageFinished'; sessionId: string; aborted: boolean; at: string }
  | { type: 'stageCrashed'; sessionId: string; failure: SessionFailure; at: string }
  | { type: 'cancel'; sessionId: string; at: string };

export type TransitionRejection = {
  ok: false;
  code: 'CONFLICT' | 'VALIDATION' | 'STALE';
  error: string;
};

export type TransitionResult = { ok: true; session: Session } | TransitionRejection;

function reject(code: TransitionRejection['code'], error: string): TransitionRejection {
  return { ok: false, code, error };
}

function wrongStage(event: SessionEvent['type'], stage: SessionStage): TransitionRejection {
  return reject('CONFLICT', `Cannot apply '${event}' while the session is '${stage}'`);
}

export function validateSelection(selection: number[], topics: Topic[]): string | null {
  if (selection.length === 0) return 'Select at least one topic';
  const known = new Set(topics.map((t) => t.id));
  const seen = new Set<number>();
  for (const id of selection) {
    if (!known.has(id)) return `Unknown topic id ${id}`;
    if (seen.has(id)) return `Topic id ${id} was selected more than once`;
    seen.add(id);
  }
  return null;
}

function allSelectedConcluded(session: Session): boolean {
  const concluded = new Set(session.results.map((r) => r.topicId));
  return session.selection.every((id) => concluded.has(id));
}

export function transition(session: Session | null, event: SessionEvent): TransitionResult {
  if (event.type === 'start') {
    if (session && !isTerminalStage(session.stage)) {
      return reject('CONFLICT', `A pipeline is already ${session.stage}`);
    }
    return {
      ok: true,
      session: {
        id: event.sessionId,
        stage: 'running_ideas',
        config: event.config,
        topics: [],
        selection: [],
        results: [],
        progress: {},
        failure: null,
        startedAt: event.at,
        endedAt: null,
        cancelRequested: false,
      },
    };
  }

  if (!session) return wrongStage(event.type, 'idle');
  if (event.sessionId !== session.id) {
    return reject('STALE', `Event '${event.type}' belongs to session ${event.sessionId}, not ${session.id}`);
  }

  switch (event.type) {
    case 'ideaStageProgress':
      if (session.stage !== 'running_ideas') return wrongStage(event.type, session.stage);
      return { ok: true, session: { ...session, progress: { ...session.progress, ideas: event.progress } } };

    case 'ideaStageSucceeded':
      if (session.stage !== 'running_ideas') return wrongStage(event.type, session.stage);
      if (event.topics.length === 0) return reject('VALIDATION', 'Idea stage produced no topics');
      return { ok: true, session: { ...session, stage: 'awaiting_selection', topics: event.topics } };

    case 'ideaStageFailed':
      if (session.stage !== 'running_ideas') return wrongStage(event.type, session.stage);
      return { ok: true, session: { ...session, stage: 'failed', failure: event.failure, endedAt: event.at } };

    case 'selectAndGenerate': {
      if (session.stage !== 'awaiting_selection') return wrongStage(event.type, session.stage);
      const problem = validateSelection(event.selection, session.topics);
      if (problem) return reject('VALIDATION', problem);
      return { ok: true, session: { ...session, stage: 'running_docs', selection: [...event.selection] } };
    }

    case 'docStageProgress': {
      if (session.stage !== 'running_docs') return wrongStage(event.type, session.stage);
      if ('progress' in event) {
        return { ok: true, session: { ...session, progress: { ...session.progress, documents: event.progress } } };
      }
      const { result } = event;
      if (!session.selection.includes(result.topicId)) {
        return reject('CONFLICT', `Topic ${result.topicId} is not part of the selection`);
      }
      if (session.results.some((r) => r.topicId === result.topicId)) {
        return reject('CONFLICT', `Topic ${result.topicId} already has a result`);
      }
      return { ok: true, session: { ...session, results: [...session.results, result] } };
    }

    case 'docStageFinished':
      if (session.stage !== 'running_docs') return wrongStage(event.type, session.stage);
      if (event.aborted) {
        const skipped = session.selection.length - session.results.length;
        return {
          ok: true,
          session: {
            ...session,
            stage: 'failed',
            failure: {
              code: 'fail_fast_abort',
              detail: `Document generation stopped after a failure; ${skipped} topic(s) skipped`,
            },
            endedAt: event.at,
          },
        };
      }
      if (!allSelectedConcluded(session)) {
        return reject('CONFLICT', 'Not every selected topic has a result yet');
      }
      return { ok: true, session: { ...session, stage: 'completed', endedAt: event.at } };

    case 'stageCrashed':
      if (session.stage !== 'running_ideas' && session.stage !== 'running_docs') {
        return wrongStage(event.type, session.stage);
      }
      return { ok: true, session: { ...session, stage: 'failed', failure: event.failure, endedAt: event.at } };

    case 'cancel':
      if (isTerminalStage(session.stage)) return wrongStage(event.type, session.stage);
      return {
        ok: true,
        session: { ...session, stage: 'cancelled', cancelRequested: true, endedAt: event.at },
      };
  }
}

export function summarize(session: Session): PipelineSummary {
  const succeeded = session.results.filter(
    (r) => r.status === 'succeeded' || r.status === 'retried-then-succeeded',
  ).length;
  const ended = session.endedAt ? Date.parse(session.endedAt) : Date.now();
  return {
    status: session.stage === 'completed' ? 'completed' : session.stage === 'cancelled' ? 'cancelled' : 'failed',
    total: session.selection.length,
    succeeded,
    failed: session.results.length - succeeded,
    skipped: session.selection.length - session.results.length,
    durationMs: Math.max(0, ended - Date.parse(session.startedAt)),
  };
}

export function toSnapshot(session: Session | null): SessionSnapshot {
  if (!session) {
    return {
      session_id: null,
      stage: 'idle',
      name: null,
      progress: {},
      topics: [],
      selection: [],
      results: [],
      failure: null,
      started_at: null,
      ended_at: null,
    };
  }
  return {
    session_id: session.id,
    stage: session.stage,
    name: session.config.name,
    progress: { ...session.progress },
    topics: [...session.topics],
    selection: [...session.selection],
    results: [...session.results],
    failure: session.failure,
    started_at: session.startedAt,
    ended_at: session.endedAt,
  };
}

export class SessionStateMachine {
  private session: Session | null = null;

  get current(): Session | null {
    return this.session;
  }

  get stage(): SessionStage {
    return this.session?.stage ?? 'idle';
  }

  apply(event: SessionEvent): TransitionResult {
    const result = transition(this.session, event);
    if (result.ok) this.session = result.session;
    return result;
  }

  snapshot(): SessionSnapshot {
    return toSnapshot(this.session);
  }
}

/**
 * Session Controller — turns control commands into state transitions and
 * stage runs, and state changes into broadcast events.
 *
 * Commands validate, transition, launch the stage run without awaiting it,
 * and return. Stage runs pull signals from the executor and feed them back
 * through the state machine; anything the machine rejects (for example
 * progress arriving after a cancel) is dropped, not broadcast.
 */

import { randomUUID } from 'node:crypto';
import { SessionLock } from '../lib/session-lock.js';
import logger, { createSessionLogger, type Logger } from '../lib/logger.js';
import { EventBroadcaster, type ObserverQueue } from './event-broadcaster.js';
import { PipelineConfigSchema } from './schemas/pipeline-config.js';
import type { StageExecutor, StageSignal } from './stage-executor.js';
import { SessionStateMachine, summarize, type SessionEvent, type TransitionResult } from './state-machine.js';
import type {
  CommandRejection,
  CommandResult,
  FailureCode,
  PipelineSSEEvent,
  PipelineSSEEventBody,
  Session,
  SessionSnapshot,
} from './types.js';

interface ActiveRun {
  sessionId: string;
  stage: 'ideas' | 'documents';
  controller: AbortController;
  finished: boolean;
  done: Promise<void>;
}

export interface SessionControllerOptions {
  executor: StageExecutor;
  maxObserverQueue?: number;
  now?: () => Date;
  createSessionId?: () => string;
  log?: Logger;
}

export class SessionController {
  private readonly machine = new SessionStateMachine();
  private readonly lock = new SessionLock();
  private readonly broadcaster: EventBroadcaster<PipelineSSEEvent>;
  private readonly executor: StageExecutor;
  private readonly now: () => Date;
  private readonly createSessionId: () => string;
  private readonly log: Logger;
  private activeRun: ActiveRun | null = null;

  constructor(options: SessionControllerOptions) {
    this.executor = options.executor;
    this.now = options.now ?? (() => new Date());
    this.createSessionId = options.createSessionId ?? randomUUID;
    this.log = options.log ?? logger;
    this.broadcaster = new EventBroadcaster<PipelineSSEEvent>({
      snapshot: () => this.envelope({ type: 'snapshot', snapshot: this.machine.snapshot() }),
      maxQueue: options.maxObserverQueue,
      log: this.log,
    });
  }

  // ─── Commands ──────────────────────────────────────────────────────

  async start(rawConfig: unknown): Promise<CommandResult<{ session_id: string }>> {
    const parsed = PipelineConfigSchema.safeParse(rawConfig);
    if (!parsed.success) {
      return { accepted: false, code: 'VALIDATION', error: 'Invalid pipeline configuration', details: parsed.error.issues };
    }
    const config = parsed.data;

    return this.lock.withSessionLock<CommandResult<{ session_id: string }>>(() => {
      const sessionId = this.createSessionId();
      const result = this.machine.apply({ type: 'start', sessionId, config, at: this.timestamp() });
      if (!result.ok) return this.rejected(result);

      const log = createSessionLogger(sessionId, { pipeline: config.name });
      log.info({ mode: config.mode, source: config.idea.source }, 'Pipeline started');
      this.publish({ type: 'stage_changed', stage: 'running_ideas' });
      this.launch(sessionId, 'ideas', (signal) => this.runIdeas(sessionId, signal, log));
      return { accepted: true, session_id: sessionId };
    });
  }

  async selectAndGenerate(topicIds: number[]): Promise<CommandResult<{ session_id: string; count: number }>> {
    return this.lock.withSessionLock<CommandResult<{ session_id: string; count: number }>>(() => {
      const session = this.machine.current;
      if (!session) return { accepted: false, code: 'CONFLICT', error: 'No pipeline session exists' };

      const result = this.machine.apply({ type: 'selectAndGenerate', sessionId: session.id, selection: topicIds });
      if (!result.ok) return this.rejected(result);

      const log = createSessionLogger(session.id, { pipeline: session.config.name });
      log.info({ selection: topicIds }, 'Topics selected');
      this.publish({ type: 'stage_changed', stage: 'running_docs' });
      this.launch(session.id, 'documents', (signal) => this.runDocuments(session.id, signal, log));
      return { accepted: true, session_id: session.id, count: topicIds.length };
    });
  }

  async cancel(): Promise<CommandResult<{ session_id: string }>> {
    return this.lock.withSessionLock<CommandResult<{ session_id: string }>>(() => {
      const session = this.machine.current;
      if (!session) return { accepted: false, code: 'CONFLICT', error: 'No pipeline session exists' };

      const result = this.machine.apply({ type: 'cancel', sessionId: session.id, at: this.timestamp() });
      if (!result.ok) return this.rejected(result);

      const run = this.activeRun;
      if (run && run.sessionId === session.id && !run.finished) {
        run.controller.abort();
      }
      createSessionLogger(session.id).info({ hadActiveRun: Boolean(run && !run.finished) }, 'Pipeline cancelled');
      this.publish({ type: 'stage_changed', stage: 'cancelled' });
      this.publish({ type: 'pipeline_finished', summary: summarize(result.session) });
      return { accepted: true, session_id: session.id };
    });
  }

  status(): SessionSnapshot {
    return this.machine.snapshot();
  }

  subscribe(): ObserverQueue<PipelineSSEEvent> {
    return this.broadcaster.subscribe();
  }

  unsubscribe(observer: ObserverQueue<PipelineSSEEvent>): void {
    this.broadcaster.unsubscribe(observer);
  }

  get observerCount(): number {
    return this.broadcaster.size;
  }

  /** Resolves once the current stage run (if any) has drained. */
  async whenIdle(): Promise<void> {
    while (this.activeRun) {
      await this.activeRun.done;
    }
  }

  /** Cancels any in-flight run, waits for it to drain, and ends observer streams. */
  async shutdown(): Promise<void> {
    const session = this.machine.current;
    if (session && this.activeRun && !this.activeRun.finished) {
      await this.cancel();
    }
    await this.whenIdle();
    this.broadcaster.close();
  }

  // ─── Stage runs ────────────────────────────────────────────────────

  private launch(sessionId: string, stage: ActiveRun['stage'], body: (signal: AbortSignal) => Promise<void>): void {
    const previous = this.activeRun?.done ?? Promise.resolve();
    const controller = new AbortController();
    const run: ActiveRun = { sessionId, stage, controller, finished: false, done: Promise.resolve() };

    // A cancelled run may still be draining; its subprocess must exit before the next one starts.
    run.done = previous
      .then(() => (controller.signal.aborted ? undefined : body(controller.signal)))
      .catch((err: unknown) => this.crash(sessionId, stage, err))
      .finally(() => {
        run.finished = true;
        if (this.activeRun === run) this.activeRun = null;
      });
    this.activeRun = run;
  }

  private async runIdeas(sessionId: string, signal: AbortSignal, log: Logger): Promise<void> {
    const session = this.machine.current;
    if (!session || session.id !== sessionId) return;

    const stage = this.executor.runIdeaStage({ sessionId, config: session.config, signal, log });
    let step = await stage.next();
    while (!step.done) {
      this.forward(sessionId, step.value);
      step = await stage.next();
    }
    const outcome = step.value;

    await this.lock.withSessionLock(() => {
      if (outcome.status === 'succeeded') {
        const applied = this.apply({ type: 'ideaStageSucceeded', sessionId, topics: outcome.topics });
        if (!applied) return;
        log.info({ topics: outcome.topics.length }, 'Idea stage complete, awaiting topic selection');
        this.publish({ type: 'topics_ready', topics: outcome.topics });
        this.publish({ type: 'stage_changed', stage: 'awaiting_selection' });
        return;
      }
      if (outcome.status === 'cancelled') {
        log.info('Idea stage drained after cancellation');
        return;
      }
      const code: FailureCode = outcome.status === 'timed-out' ? 'timeout' : 'execution_error';
      log.error({ code, detail: outcome.detail }, 'Idea stage failed');
      this.fail(sessionId, { type: 'ideaStageFailed', sessionId, failure: { code, detail: outcome.detail }, at: this.timestamp() });
    });
  }

  private async runDocuments(sessionId: string, signal: AbortSignal, log: Logger): Promise<void> {
    const session = this.machine.current;
    if (!session || session.id !== sessionId) return;

    const stage = this.executor.runDocStage({
      sessionId,
      config: session.config,
      topics: session.topics,
      selection: session.selection,
      signal,
      log,
    });
    let step = await stage.next();
    while (!step.done) {
      this.forward(sessionId, step.value);
      step = await stage.next();
    }
    const outcome = step.value;

    await this.lock.withSessionLock(() => {
      if (outcome.status === 'cancelled') {
        log.info('Document stage drained after cancellation');
        return;
      }
      if (outcome.aborted) {
        log.warn({ skipped: outcome.skipped }, 'Document stage aborted by fail-fast policy');
        this.fail(sessionId, { type: 'docStageFinished', sessionId, aborted: true, at: this.timestamp() });
        return;
      }
      const applied = this.apply({ type: 'docStageFinished', sessionId, aborted: false, at: this.timestamp() });
      if (!applied) return;
      const summary = summarize(applied);
      log.info({ summary }, 'Pipeline completed');
      this.publish({ type: 'stage_changed', stage: 'completed' });
      this.publish({ type: 'pipeline_finished', summary });
    });
  }

  private forward(sessionId: string, signal: StageSignal): void {
    const session = this.machine.current;
    if (!session || session.id !== sessionId) return;

    if (signal.type === 'progress') {
      const applied = session.stage === 'running_ideas'
        ? this.apply({ type: 'ideaStageProgress', sessionId, progress: signal.progress })
        : this.apply({ type: 'docStageProgress', sessionId, progress: signal.progress });
      if (!applied) return;
      const { stageName, percent, message } = signal.progress;
      this.publish({ type: 'progress', stage: stageName, percent, message });
      return;
    }

    const applied = this.apply({ type: 'docStageProgress', sessionId, result: signal.result });
    if (applied) this.publish({ type: 'document_result', ...signal.result });
  }

  private crash(sessionId: string, stage: ActiveRun['stage'], err: unknown): void {
    const detail = err instanceof Error ? err.message : String(err);
    createSessionLogger(sessionId).error({ err, stage }, 'Stage run crashed');
    this.fail(sessionId, {
      type: 'stageCrashed',
      sessionId,
      failure: { code: 'internal_error', detail },
      at: this.timestamp(),
    });
  }

  /** Applies a failing transition and, when it lands, publishes the failure trio. */
  private fail(sessionId: string, event: SessionEvent): void {
    const session = this.apply(event);
    if (!session || session.id !== sessionId || !session.failure) return;
    this.publish({ type: 'error', code: session.failure.code, detail: session.failure.detail });
    this.publish({ type: 'stage_changed', stage: 'failed' });
    this.publish({ type: 'pipeline_finished', summary: summarize(session) });
  }

  // ─── Helpers ───────────────────────────────────────────────────────

  private apply(event: SessionEvent): Session | null {
    const result = this.machine.apply(event);
    if (!result.ok) {
      this.log.debug({ event: event.type, code: result.code, error: result.error }, 'Transition rejected');
      return null;
    }
    return result.session;
  }

  private rejected(result: Extract<TransitionResult, { ok: false }>): CommandRejection {
    return {
      accepted: false,
      code: result.code === 'VALIDATION' ? 'VALIDATION' : 'CONFLICT',
      error: result.error,
    };
  }

  private publish(body: PipelineSSEEventBody): void {
    this.broadcaster.publish(this.envelope(body));
  }

  private envelope(body: PipelineSSEEventBody): PipelineSSEEvent {
    return { ...body, session_id: this.machine.current?.id ?? null, timestamp: this.timestamp() };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

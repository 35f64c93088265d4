/**
 * Stage Executor — runs one pipeline stage to a terminal outcome.
 *
 * Each run is an async generator: it yields progress and per-document
 * signals as they happen and returns the stage outcome. The controller pulls
 * from it, so cancellation is an AbortSignal and backpressure is the pull.
 * Executors hold no session state; they only report upward.
 */

import path from 'node:path';
import type { Logger } from '../lib/logger.js';
import type { ToolSettings } from '../lib/settings.js';
import {
  listOutputFiles as defaultListOutputFiles,
  locateArtifact as defaultLocateArtifact,
  parseOutputMarker,
  type ArtifactLocator,
  type OutputLister,
} from './artifact-locator.js';
import { startProcess, DEFAULT_KILL_GRACE_MS, type ProcessLauncher, type ProcessOutcome } from './process-runner.js';
import { parseProgressLine, ProgressTracker } from './progress-parser.js';
import type { PipelineConfig } from './schemas/pipeline-config.js';
import { buildDocArgs, buildIdeaArgs } from './tool-commands.js';
import {
  collectTopicFiles as defaultCollectTopicFiles,
  decodeTopicPayload,
  isTopicPayloadLine,
} from './topic-payload.js';
import type { DocumentFailureReason, DocumentResult, ProgressEvent, Topic } from './types.js';

export type StageSignal =
  | { type: 'progress'; progress: ProgressEvent }
  | { type: 'document_result'; result: DocumentResult };

export type IdeaStageOutcome =
  | { status: 'succeeded'; topics: Topic[] }
  | { status: 'failed' | 'timed-out'; detail: string }
  | { status: 'cancelled' };

export type DocStageOutcome =
  | { status: 'finished'; aborted: boolean; skipped: number[] }
  | { status: 'cancelled' };

type AttemptOutcome =
  | { kind: 'succeeded'; outputLocation: string }
  | { kind: 'failed'; reason: DocumentFailureReason; detail: string }
  | { kind: 'cancelled' };

export interface StageExecutorDeps {
  ideaTool: ToolSettings;
  docTool: ToolSettings;
  sessionsDir: string;
  killGraceMs?: number;
  launch?: ProcessLauncher;
  locateArtifact?: ArtifactLocator;
  listOutputFiles?: OutputLister;
  collectTopicFiles?: (toolDir: string, destinationDir: string) => Promise<Topic[]>;
  now?: () => Date;
}

export interface IdeaStageInput {
  sessionId: string;
  config: PipelineConfig;
  signal: AbortSignal;
  log: Logger;
}

export interface DocStageInput extends IdeaStageInput {
  topics: Topic[];
  selection: number[];
}

const MAX_ERROR_DETAIL_CHARS = 500;

function describeExit(tool: string, outcome: ProcessOutcome): string {
  const stderr = outcome.stderr.trim();
  const head = outcome.exitCode === null
    ? `${tool} could not be started`
    : `${tool} failed with exit code ${outcome.exitCode}`;
  const detail = stderr ? `${head}: ${stderr}` : head;
  return detail.length > MAX_ERROR_DETAIL_CHARS ? `${detail.slice(0, MAX_ERROR_DETAIL_CHARS - 3)}...` : detail;
}

export class StageExecutor {
  private readonly launch: ProcessLauncher;
  private readonly locateArtifact: ArtifactLocator;
  private readonly listOutputFiles: OutputLister;
  private readonly collectTopicFiles: (toolDir: string, destinationDir: string) => Promise<Topic[]>;
  private readonly now: () => Date;

  constructor(private readonly deps: StageExecutorDeps) {
    this.launch = deps.launch ?? startProcess;
    this.locateArtifact = deps.locateArtifact ?? defaultLocateArtifact;
    this.listOutputFiles = deps.listOutputFiles ?? defaultListOutputFiles;
    this.collectTopicFiles = deps.collectTopicFiles ?? defaultCollectTopicFiles;
    this.now = deps.now ?? (() => new Date());
  }

  async *runIdeaStage(input: IdeaStageInput): AsyncGenerator<StageSignal, IdeaStageOutcome> {
    const { sessionId, config, signal, log } = input;
    const tool = this.deps.ideaTool;
    const tracker = new ProgressTracker('ideas', this.now);

    yield { type: 'progress', progress: tracker.advance(0, 'Starting idea generation...') };

    const args = [...tool.baseArgs, ...buildIdeaArgs(config)];
    log.info({ command: tool.command, args, cwd: tool.cwd }, 'Launching idea generator');
    const handle = this.launch({
      command: tool.command,
      args,
      cwd: tool.cwd,
      timeoutMs: config.stage1Timeout * 1000,
      killGraceMs: this.deps.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
      signal,
    });

    let payloadLine: string | null = null;
    for await (const line of handle.lines()) {
      // Drain silently once cancelled so the pipe never blocks the child.
      if (signal.aborted) continue;
      if (isTopicPayloadLine(line)) {
        payloadLine = line;
        continue;
      }
      const event = tracker.accept(parseProgressLine(line));
      if (event) yield { type: 'progress', progress: event };
    }

    const outcome = await handle.outcome();
    log.info({ status: outcome.status, exitCode: outcome.exitCode, durationMs: outcome.durationMs }, 'Idea generator exited');

    if (signal.aborted || outcome.status === 'cancelled') return { status: 'cancelled' };
    if (outcome.status === 'timed-out') {
      return { status: 'timed-out', detail: `Idea generation timed out after ${config.stage1Timeout}s` };
    }
    if (outcome.status === 'failed') {
      return { status: 'failed', detail: describeExit('Idea generator', outcome) };
    }

    yield { type: 'progress', progress: tracker.advance(tracker.percent, 'Analyzing generated topics...') };

    let topics: Topic[];
    if (payloadLine) {
      const decoded = decodeTopicPayload(payloadLine);
      if (!decoded.ok) return { status: 'failed', detail: decoded.error };
      topics = decoded.topics;
    } else {
      try {
        topics = await this.collectTopicFiles(tool.cwd, path.join(this.deps.sessionsDir, sessionId, 'topics'));
      } catch (err) {
        return {
          status: 'failed',
          detail: `Could not read topic files: ${err instanceof Error ? err.message : String(err)}`,
        };
      }
      if (topics.length === 0) {
        return { status: 'failed', detail: 'Idea generator finished without producing any topics' };
      }
    }

    if (signal.aborted) return { status: 'cancelled' };
    yield {
      type: 'progress',
      progress: tracker.advance(100, `Generated ${topics.length} topics. Ready for review.`),
    };
    return { status: 'succeeded', topics };
  }

  async *runDocStage(input: DocStageInput): AsyncGenerator<StageSignal, DocStageOutcome> {
    const { config, signal, log, selection } = input;
    const total = selection.length;
    const tracker = new ProgressTracker('documents', this.now);
    let succeeded = 0;

    yield { type: 'progress', progress: tracker.advance(0, `Generating ${total} documents...`) };

    for (const [index, topicId] of selection.entries()) {
      if (signal.aborted) return { status: 'cancelled' };
      const topic = input.topics.find((t) => t.id === topicId);
      if (!topic) throw new Error(`Selected topic ${topicId} is missing from the topic list`);

      yield {
        type: 'progress',
        progress: tracker.advance(
          (index / total) * 100,
          `Generating document ${index + 1}/${total}: ${topic.title.slice(0, 40)}...`,
        ),
      };

      const first = yield* this.attemptDocument(input, topic, index, tracker);
      if (first.kind === 'cancelled') return { status: 'cancelled' };

      let result: DocumentResult;
      if (first.kind === 'succeeded') {
        result = { topicId, status: 'succeeded', outputLocation: first.outputLocation, attempts: 1 };
      } else if (config.retryOnFailure) {
        log.warn({ topicId, reason: first.reason }, 'Document generation failed, retrying once');
        yield { type: 'progress', progress: tracker.advance(tracker.percent, `Retrying "${topic.title.slice(0, 40)}"...`) };
        const retry = yield* this.attemptDocument(input, topic, index, tracker);
        if (retry.kind === 'cancelled') return { status: 'cancelled' };
        result = retry.kind === 'succeeded'
          ? { topicId, status: 'retried-then-succeeded', outputLocation: retry.outputLocation, attempts: 2 }
          : { topicId, status: 'retried-then-failed', errorDetail: retry.detail, reason: retry.reason, attempts: 2 };
      } else {
        result = { topicId, status: 'failed', errorDetail: first.detail, reason: first.reason, attempts: 1 };
      }

      if (result.outputLocation) succeeded += 1;
      log.info({ topicId, status: result.status, attempts: result.attempts }, 'Document concluded');
      yield { type: 'document_result', result };

      if (result.status === 'failed' && config.doc.failureMode === 'fail_fast') {
        const skipped = selection.slice(index + 1);
        log.warn({ topicId, skipped }, 'Fail-fast policy: skipping remaining topics');
        return { status: 'finished', aborted: true, skipped };
      }
    }

    yield {
      type: 'progress',
      progress: tracker.advance(100, `Completed! ${succeeded}/${total} documents generated.`),
    };
    return { status: 'finished', aborted: false, skipped: [] };
  }

  private async *attemptDocument(
    input: DocStageInput,
    topic: Topic,
    index: number,
    tracker: ProgressTracker,
  ): AsyncGenerator<StageSignal, AttemptOutcome> {
    const { config, signal } = input;
    const tool = this.deps.docTool;
    const total = input.selection.length;
    const before = await this.listOutputFiles(config.doc.outputLocation, tool.cwd);

    const handle = this.launch({
      command: tool.command,
      args: [...tool.baseArgs, ...buildDocArgs(config, topic)],
      cwd: tool.cwd,
      timeoutMs: config.stage2Timeout * 1000,
      killGraceMs: this.deps.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
      signal,
    });

    let reportedPath: string | null = null;
    for await (const line of handle.lines()) {
      if (signal.aborted) continue;
      const marker = parseOutputMarker(line);
      if (marker) {
        reportedPath = marker;
        continue;
      }
      const parsed = parseProgressLine(line);
      const event = parsed.kind === 'progress'
        ? tracker.advance(((index + parsed.percent / 100) / total) * 100, parsed.message)
        : tracker.note(parsed.message);
      if (event) yield { type: 'progress', progress: event };
    }

    const outcome = await handle.outcome();
    if (signal.aborted || outcome.status === 'cancelled') return { kind: 'cancelled' };
    if (outcome.status === 'timed-out') {
      return { kind: 'failed', reason: 'timed_out', detail: `Timed out after ${config.stage2Timeout}s` };
    }
    if (outcome.status === 'failed') {
      return {
        kind: 'failed',
        reason: outcome.exitCode === null ? 'spawn_error' : 'exit_code',
        detail: describeExit('Document generator', outcome),
      };
    }

    const outputLocation = await this.locateArtifact({
      outputLocation: config.doc.outputLocation,
      cwd: tool.cwd,
      before,
      reportedPath,
    });
    if (!outputLocation) {
      return {
        kind: 'failed',
        reason: 'missing_artifact',
        detail: `Document generator exited cleanly but no output was found under ${config.doc.outputLocation}`,
      };
    }
    return { kind: 'succeeded', outputLocation };
  }
}

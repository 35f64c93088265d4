import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { StageExecutor, type StageExecutorDeps, type StageSignal } from '../pipeline/stage-executor.js';
import { EXAMPLE_PIPELINE_CONFIG, type PipelineConfig } from '../pipeline/schemas/pipeline-config.js';
import { locateArtifact, type ArtifactLocator } from '../pipeline/artifact-locator.js';
import type { Topic } from '../pipeline/types.js';
import { createFakeLauncher, drainGenerator, type FakeRun } from './helpers/fake-launcher.js';

const log = pino({ level: 'silent' });
const NOW = new Date('2025-03-01T12:00:00.000Z');
const TIMESTAMP = NOW.toISOString();

const ideaTool = { command: 'idea-tool', baseArgs: ['ideas.py'], cwd: '/tools/ideas' };
const docTool = { command: 'doc-tool', baseArgs: ['docs.py'], cwd: '/tools/docs' };

const topics: Topic[] = [
  { id: 0, title: 'Alpha', previewText: '', wordCount: 0 },
  { id: 1, title: 'Beta', previewText: '', wordCount: 0 },
  { id: 2, title: 'Gamma', previewText: '', wordCount: 0 },
];

function createExecutor(scripts: Record<string, FakeRun[]>, overrides: Partial<StageExecutorDeps> = {}) {
  const fake = createFakeLauncher(scripts);
  let produced = 0;
  const locateArtifact = vi.fn<ArtifactLocator>(async () => {
    produced += 1;
    return `/out/doc-${produced}.md`;
  });
  const executor = new StageExecutor({
    ideaTool,
    docTool,
    sessionsDir: '/var/sessions',
    launch: fake.launch,
    locateArtifact,
    now: () => NOW,
    ...overrides,
  });
  return { executor, fake, locateArtifact };
}

function progressOf(signals: StageSignal[]) {
  return signals.flatMap((s) => (s.type === 'progress' ? [[s.progress.percent, s.progress.message]] : []));
}

function resultsOf(signals: StageSignal[]) {
  return signals.flatMap((s) => (s.type === 'document_result' ? [s.result] : []));
}

function withConfig(overrides: Partial<PipelineConfig>, doc: Partial<PipelineConfig['doc']> = {}): PipelineConfig {
  return { ...EXAMPLE_PIPELINE_CONFIG, ...overrides, doc: { ...EXAMPLE_PIPELINE_CONFIG.doc, ...doc } };
}

describe('StageExecutor.runIdeaStage', () => {
  it('streams progress and decodes the topic payload', async () => {
    const { executor, fake } = createExecutor({
      'idea-tool': [{
        lines: [
          'Progress: 10% Fetching sources',
          '@@TOPICS [{"title":"A","content":"x y"},{"title":"B"}]',
          'Progress: 80% Ranking',
        ],
      }],
    });

    const { signals, outcome } = await drainGenerator(executor.runIdeaStage({
      sessionId: 's1',
      config: EXAMPLE_PIPELINE_CONFIG,
      signal: new AbortController().signal,
      log,
    }));

    expect(progressOf(signals)).toEqual([
      [0, 'Starting idea generation...'],
      [10, 'Fetching sources'],
      [80, 'Ranking'],
      [80, 'Analyzing generated topics...'],
      [100, 'Generated 2 topics. Ready for review.'],
    ]);
    expect(signals[0]).toEqual({
      type: 'progress',
      progress: { stageName: 'ideas', percent: 0, message: 'Starting idea generation...', timestamp: TIMESTAMP },
    });
    expect(outcome).toEqual({
      status: 'succeeded',
      topics: [
        { id: 0, title: 'A', previewText: 'x y', wordCount: 2 },
        { id: 1, title: 'B', previewText: '', wordCount: 0 },
      ],
    });

    const [spec] = fake.specs;
    expect(spec.command).toBe('idea-tool');
    expect(spec.cwd).toBe('/tools/ideas');
    expect(spec.timeoutMs).toBe(600_000);
    expect(spec.args).toEqual([
      'ideas.py',
      '--mode', 'test',
      '--source', 'source_a',
      '--save-local',
      '--start-date', '01012025',
      '--label', 'AIQ',
      '--focus', 'AI transformation and business strategy',
    ]);
  });

  it('reports a non-zero exit with its stderr', async () => {
    const { executor } = createExecutor({
      'idea-tool': [{ status: 'failed', exitCode: 2, stderr: 'boom\n' }],
    });

    const { outcome } = await drainGenerator(executor.runIdeaStage({
      sessionId: 's1',
      config: EXAMPLE_PIPELINE_CONFIG,
      signal: new AbortController().signal,
      log,
    }));

    expect(outcome).toEqual({ status: 'failed', detail: 'Idea generator failed with exit code 2: boom' });
  });

  it('reports a timeout in seconds', async () => {
    const { executor } = createExecutor({ 'idea-tool': [{ status: 'timed-out', exitCode: null }] });

    const { outcome } = await drainGenerator(executor.runIdeaStage({
      sessionId: 's1',
      config: EXAMPLE_PIPELINE_CONFIG,
      signal: new AbortController().signal,
      log,
    }));

    expect(outcome).toEqual({ status: 'timed-out', detail: 'Idea generation timed out after 600s' });
  });

  it('rejects a malformed topic payload', async () => {
    const { executor } = createExecutor({ 'idea-tool': [{ lines: ['@@TOPICS not-json'] }] });

    const { outcome } = await drainGenerator(executor.runIdeaStage({
      sessionId: 's1',
      config: EXAMPLE_PIPELINE_CONFIG,
      signal: new AbortController().signal,
      log,
    }));

    expect(outcome.status).toBe('failed');
  });

  it('falls back to topic files moved into the session directory', async () => {
    const collected: Topic[] = [{ id: 0, title: 'From File', previewText: 'body', wordCount: 1, sourcePath: '/x.md' }];
    const collectTopicFiles = vi.fn(async () => collected);
    const { executor } = createExecutor({ 'idea-tool': [{ lines: ['done'] }] }, { collectTopicFiles });

    const { outcome } = await drainGenerator(executor.runIdeaStage({
      sessionId: 's1',
      config: EXAMPLE_PIPELINE_CONFIG,
      signal: new AbortController().signal,
      log,
    }));

    expect(collectTopicFiles).toHaveBeenCalledWith('/tools/ideas', path.join('/var/sessions', 's1', 'topics'));
    expect(outcome).toEqual({ status: 'succeeded', topics: collected });
  });

  it('fails when the tool produced no topics at all', async () => {
    const { executor } = createExecutor({ 'idea-tool': [{}] }, { collectTopicFiles: async () => [] });

    const { outcome } = await drainGenerator(executor.runIdeaStage({
      sessionId: 's1',
      config: EXAMPLE_PIPELINE_CONFIG,
      signal: new AbortController().signal,
      log,
    }));

    expect(outcome).toEqual({ status: 'failed', detail: 'Idea generator finished without producing any topics' });
  });

  it('stops yielding once cancelled and returns cancelled', async () => {
    const { executor } = createExecutor({
      'idea-tool': [{ lines: ['Progress: 20% Working'], hangUntilAborted: true }],
    });
    const controller = new AbortController();
    const stage = executor.runIdeaStage({ sessionId: 's1', config: EXAMPLE_PIPELINE_CONFIG, signal: controller.signal, log });

    expect((await stage.next()).done).toBe(false);
    expect((await stage.next()).done).toBe(false);

    const pending = stage.next();
    controller.abort();
    expect(await pending).toEqual({ done: true, value: { status: 'cancelled' } });
  });
});

describe('StageExecutor.runDocStage', () => {
  function docInput(config: PipelineConfig, selection: number[], signal = new AbortController().signal) {
    return { sessionId: 's1', config, topics, selection, signal, log };
  }

  it('generates each selected topic and maps progress across the batch', async () => {
    const { executor, fake, locateArtifact } = createExecutor({
      'doc-tool': [
        { lines: ['50% drafting', '@@OUTPUT out/a.md'] },
        { lines: ['50% drafting'] },
      ],
    });

    const { signals, outcome } = await drainGenerator(
      executor.runDocStage(docInput(withConfig({ retryOnFailure: false }), [0, 2])),
    );

    expect(progressOf(signals)).toEqual([
      [0, 'Generating 2 documents...'],
      [0, 'Generating document 1/2: Alpha...'],
      [25, 'drafting'],
      [50, 'Generating document 2/2: Gamma...'],
      [75, 'drafting'],
      [100, 'Completed! 2/2 documents generated.'],
    ]);
    expect(resultsOf(signals)).toEqual([
      { topicId: 0, status: 'succeeded', outputLocation: '/out/doc-1.md', attempts: 1 },
      { topicId: 2, status: 'succeeded', outputLocation: '/out/doc-2.md', attempts: 1 },
    ]);
    expect(outcome).toEqual({ status: 'finished', aborted: false, skipped: [] });

    expect(locateArtifact).toHaveBeenNthCalledWith(1, {
      outputLocation: './output',
      cwd: '/tools/docs',
      before: new Map(),
      reportedPath: 'out/a.md',
    });
    expect(fake.specs[0].args).toEqual([
      'docs.py',
      '--mode', 'test',
      '--topic', 'Alpha',
      '--audience', 'business executives',
      '--type', 'blog post',
      '--size', '800 words',
      '--output', './output',
    ]);
    expect(fake.specs[0].timeoutMs).toBe(300_000);
  });

  it('retries a failed topic exactly once when retry is enabled', async () => {
    const { executor, fake } = createExecutor({
      'doc-tool': [{ status: 'failed', exitCode: 1, stderr: 'flaky' }, {}],
    });

    const { signals } = await drainGenerator(executor.runDocStage(docInput(withConfig({ retryOnFailure: true }), [1])));

    expect(fake.calls('doc-tool')).toHaveLength(2);
    expect(resultsOf(signals)).toEqual([
      { topicId: 1, status: 'retried-then-succeeded', outputLocation: '/out/doc-1.md', attempts: 2 },
    ]);
  });

  it('records retried-then-failed when the retry also fails', async () => {
    const { executor, fake } = createExecutor({
      'doc-tool': [{ status: 'failed', exitCode: 1 }, { status: 'failed', exitCode: 3, stderr: 'still broken' }],
    });

    const { signals, outcome } = await drainGenerator(
      executor.runDocStage(docInput(withConfig({ retryOnFailure: true }, { failureMode: 'fail_fast' }), [1])),
    );

    expect(fake.calls('doc-tool')).toHaveLength(2);
    expect(resultsOf(signals)).toEqual([{
      topicId: 1,
      status: 'retried-then-failed',
      errorDetail: 'Document generator failed with exit code 3: still broken',
      reason: 'exit_code',
      attempts: 2,
    }]);
    expect(outcome).toEqual({ status: 'finished', aborted: false, skipped: [] });
  });

  it('continues past a failure in partial mode', async () => {
    const { executor } = createExecutor({
      'doc-tool': [{}, { status: 'failed', exitCode: 1 }, {}],
    });

    const { signals, outcome } = await drainGenerator(
      executor.runDocStage(docInput(withConfig({ retryOnFailure: false }), [0, 1, 2])),
    );

    expect(resultsOf(signals).map((r) => r.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(progressOf(signals).at(-1)).toEqual([100, 'Completed! 2/3 documents generated.']);
    expect(outcome).toEqual({ status: 'finished', aborted: false, skipped: [] });
  });

  it('stops at the first failure in fail-fast mode', async () => {
    const { executor, fake } = createExecutor({
      'doc-tool': [{ status: 'failed', exitCode: 1 }],
    });

    const { signals, outcome } = await drainGenerator(
      executor.runDocStage(docInput(withConfig({ retryOnFailure: false }, { failureMode: 'fail_fast' }), [0, 1, 2])),
    );

    expect(fake.calls('doc-tool')).toHaveLength(1);
    expect(resultsOf(signals)).toEqual([{
      topicId: 0,
      status: 'failed',
      errorDetail: 'Document generator failed with exit code 1',
      reason: 'exit_code',
      attempts: 1,
    }]);
    expect(outcome).toEqual({ status: 'finished', aborted: true, skipped: [1, 2] });
  });

  it('treats a timed-out document as a per-topic failure', async () => {
    const { executor } = createExecutor({ 'doc-tool': [{ status: 'timed-out', exitCode: null }] });

    const { signals } = await drainGenerator(executor.runDocStage(docInput(withConfig({ retryOnFailure: false }), [0])));

    expect(resultsOf(signals)).toEqual([{
      topicId: 0,
      status: 'failed',
      errorDetail: 'Timed out after 300s',
      reason: 'timed_out',
      attempts: 1,
    }]);
  });

  it('fails a topic whose clean exit left no artifact', async () => {
    const { executor } = createExecutor({ 'doc-tool': [{}] }, { locateArtifact: async () => null });

    const { signals } = await drainGenerator(executor.runDocStage(docInput(withConfig({ retryOnFailure: false }), [2])));

    expect(resultsOf(signals)).toEqual([{
      topicId: 2,
      status: 'failed',
      errorDetail: 'Document generator exited cleanly but no output was found under ./output',
      reason: 'missing_artifact',
      attempts: 1,
    }]);
  });

  it('does not launch the next topic after cancellation', async () => {
    const { executor, fake } = createExecutor({ 'doc-tool': [{}, {}] });
    const controller = new AbortController();
    const stage = executor.runDocStage(docInput(withConfig({ retryOnFailure: false }), [0, 1], controller.signal));

    let step = await stage.next();
    while (!step.done && step.value.type !== 'document_result') {
      step = await stage.next();
    }
    controller.abort();

    expect(await stage.next()).toEqual({ done: true, value: { status: 'cancelled' } });
    expect(fake.calls('doc-tool')).toHaveLength(1);
  });

  describe('with a real output directory', () => {
    let toolDir: string;

    beforeEach(async () => {
      toolDir = await mkdtemp(path.join(tmpdir(), 'doc-tool-'));
      await mkdir(path.join(toolDir, 'out'));
    });

    afterEach(async () => {
      await rm(toolDir, { recursive: true, force: true });
    });

    function writeOutput(name: string) {
      return async () => {
        await writeFile(path.join(toolDir, 'out', name), `# ${name}`);
      };
    }

    function realLocatorExecutor(scripts: FakeRun[]) {
      return createExecutor({ 'doc-tool': scripts }, {
        docTool: { ...docTool, cwd: toolDir },
        locateArtifact,
      }).executor;
    }

    it('does not credit a topic with the previous topic\'s file', async () => {
      const executor = realLocatorExecutor([{ effect: writeOutput('alpha.md') }, {}]);

      const { signals } = await drainGenerator(executor.runDocStage(
        docInput(withConfig({ retryOnFailure: false }, { outputLocation: 'out' }), [0, 1]),
      ));

      expect(resultsOf(signals)).toEqual([
        { topicId: 0, status: 'succeeded', outputLocation: path.join(toolDir, 'out', 'alpha.md'), attempts: 1 },
        {
          topicId: 1,
          status: 'failed',
          errorDetail: 'Document generator exited cleanly but no output was found under out',
          reason: 'missing_artifact',
          attempts: 1,
        },
      ]);
    });

    it('does not credit a retry with the file its failed attempt left behind', async () => {
      const executor = realLocatorExecutor([
        { effect: writeOutput('partial.md'), status: 'failed', exitCode: 1 },
        {},
      ]);

      const { signals } = await drainGenerator(executor.runDocStage(
        docInput(withConfig({ retryOnFailure: true }, { outputLocation: 'out' }), [0]),
      ));

      expect(resultsOf(signals)).toEqual([{
        topicId: 0,
        status: 'retried-then-failed',
        errorDetail: 'Document generator exited cleanly but no output was found under out',
        reason: 'missing_artifact',
        attempts: 2,
      }]);
    });

    it('credits a retry that writes its own file', async () => {
      const executor = realLocatorExecutor([
        { status: 'failed', exitCode: 1 },
        { effect: writeOutput('beta.md') },
      ]);

      const { signals } = await drainGenerator(executor.runDocStage(
        docInput(withConfig({ retryOnFailure: true }, { outputLocation: 'out' }), [1]),
      ));

      expect(resultsOf(signals)).toEqual([{
        topicId: 1,
        status: 'retried-then-succeeded',
        outputLocation: path.join(toolDir, 'out', 'beta.md'),
        attempts: 2,
      }]);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { getEventListeners } from 'node:events';
import { startProcess, tailText } from '../pipeline/process-runner.js';

function nodeScript(source: string) {
  return { command: process.execPath, args: ['-e', source] };
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe('startProcess', () => {
  it('streams stdout lines and reports success', async () => {
    const handle = startProcess({
      ...nodeScript("console.log('Progress: 50% half'); console.log('done')"),
      timeoutMs: 10_000,
    });

    expect(await collect(handle.lines())).toEqual(['Progress: 50% half', 'done']);
    const outcome = await handle.outcome();
    expect(outcome.status).toBe('succeeded');
    expect(outcome.exitCode).toBe(0);
    expect(handle.outcome()).toBe(handle.outcome());
  });

  it('reports a non-zero exit with stderr', async () => {
    const handle = startProcess({
      ...nodeScript("process.stderr.write('bad input'); process.exit(3)"),
      timeoutMs: 10_000,
    });

    await collect(handle.lines());
    expect(await handle.outcome()).toMatchObject({ status: 'failed', exitCode: 3, stderr: 'bad input' });
  });

  it('kills a process that exceeds its timeout', async () => {
    const handle = startProcess({
      ...nodeScript('setTimeout(() => {}, 30_000)'),
      timeoutMs: 200,
      killGraceMs: 500,
    });

    expect((await handle.outcome()).status).toBe('timed-out');
  });

  it('cancels when the caller signal aborts', async () => {
    const controller = new AbortController();
    const handle = startProcess({
      ...nodeScript("console.log('ready'); setTimeout(() => {}, 30_000)"),
      timeoutMs: 10_000,
      killGraceMs: 500,
      signal: controller.signal,
    });

    const lines: string[] = [];
    for await (const line of handle.lines()) {
      lines.push(line);
      controller.abort();
    }

    expect(lines).toEqual(['ready']);
    expect((await handle.outcome()).status).toBe('cancelled');
  });

  it('releases its listener on a shared signal once the process exits', async () => {
    const stage = new AbortController();

    for (let i = 0; i < 12; i++) {
      const handle = startProcess({
        ...nodeScript(`console.log('run ${i}')`),
        timeoutMs: 10_000,
        signal: stage.signal,
      });
      expect(await collect(handle.lines())).toEqual([`run ${i}`]);
      expect((await handle.outcome()).status).toBe('succeeded');
    }

    expect(getEventListeners(stage.signal, 'abort')).toHaveLength(0);
  });

  it('reports a command that cannot be spawned', async () => {
    const handle = startProcess({ command: '/nonexistent/content-tool', args: [], timeoutMs: 1_000 });

    expect(await collect(handle.lines())).toEqual([]);
    const outcome = await handle.outcome();
    expect(outcome.status).toBe('failed');
    expect(outcome.exitCode).toBeNull();
    expect(outcome.stderr).toContain('ENOENT');
  });
});

describe('tailText', () => {
  it('keeps the end of long output', () => {
    expect(tailText('abcdef', 3)).toBe('def');
    expect(tailText('abc', 3)).toBe('abc');
  });
});

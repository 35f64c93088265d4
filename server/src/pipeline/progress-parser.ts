import type { ProgressEvent, StageName } from './types.js';

export type ParsedProgressLine =
  | { kind: 'progress'; percent: number; message: string }
  | { kind: 'log'; message: string };

// "10% parsing", "[10%] parsing", "10 % - parsing"
const LEADING_PERCENT = /^\[?\s*([^\s%\]]+)\s*%\s*\]?\s*[-:|]?\s*(.*)$/;
// "Progress: 10% parsing", "PROGRESS 10 parsing", "progress=10 parsing"
const PROGRESS_KEYWORD = /^progress\s*[:=]?\s*([^\s%]+)\s*%?\s*[-:|]?\s*(.*)$/i;

function toPercent(raw: string): number | null {
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(raw)) return null;
  const value = Number(raw);
  if (!Number.isFinite(value)) return null;
  return Math.min(100, Math.max(0, value));
}

/**
 * Converts one line of tool output into a progress value or a plain log line.
 * Never throws: anything unrecognized degrades to a log line carrying the text.
 */
export function parseProgressLine(line: string): ParsedProgressLine {
  const text = line.replace(/[\r\n]+$/, '').trim();
  if (!text) return { kind: 'log', message: '' };

  const match = PROGRESS_KEYWORD.exec(text) ?? LEADING_PERCENT.exec(text);
  if (!match) return { kind: 'log', message: text };

  const percent = toPercent(match[1]);
  if (percent === null) return { kind: 'log', message: text };

  return { kind: 'progress', percent, message: match[2].trim() };
}

/**
 * Keeps the displayed percent of one stage from going backwards.
 *
 * Lower values are replaced by the current one; the message still goes out.
 */
export class ProgressTracker {
  private current = 0;

  constructor(
    private readonly stageName: StageName,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get percent(): number {
    return this.current;
  }

  /** Records a raw percent value, returning the event to emit. */
  advance(percent: number, message: string): ProgressEvent {
    if (percent > this.current) this.current = percent;
    return {
      stageName: this.stageName,
      percent: this.current,
      message,
      timestamp: this.now().toISOString(),
    };
  }

  /** Emits a message at the current percent. Returns null for blank messages. */
  note(message: string): ProgressEvent | null {
    if (!message) return null;
    return this.advance(this.current, message);
  }

  accept(parsed: ParsedProgressLine): ProgressEvent | null {
    return parsed.kind === 'progress'
      ? this.advance(parsed.percent, parsed.message)
      : this.note(parsed.message);
  }
}

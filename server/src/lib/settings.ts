import path from 'node:path';

type Env = Record<string, string | undefined>;

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Splits a whitespace-separated argument list. Double-quoted segments are
 * kept together so script paths with spaces survive.
 */
export function envList(raw: string | undefined): string[] {
  if (!raw?.trim()) return [];
  const matches = raw.match(/"[^"]*"|\S+/g) ?? [];
  return matches.map((part) => (part.startsWith('"') && part.endsWith('"') ? part.slice(1, -1) : part));
}

export interface ToolSettings {
  command: string;
  /** Arguments placed before the generated ones (usually the script path). */
  baseArgs: string[];
  cwd: string;
}

export interface ServerSettings {
  port: number;
  isProduction: boolean;
  allowedOrigins: string[];
  ideaTool: ToolSettings;
  docTool: ToolSettings;
  sessionsDir: string;
  killGraceMs: number;
  maxObserverQueue: number;
  maxConfigBodyBytes: number;
  heartbeatMs: number;
}

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:5001'];

export function loadServerSettings(env: Env = process.env): ServerSettings {
  const isProduction = env.NODE_ENV === 'production';
  const toolsRoot = path.resolve(env.TOOLS_ROOT ?? '..');

  const ideaScript = path.join(toolsRoot, 'DocIdeaGenerator', 'cli.py');
  const docScript = path.join(toolsRoot, 'PersonalizedDocGenerator', 'document_generator.py');

  return {
    port: parsePositiveInt(env.PORT, 5001),
    isProduction,
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
      : isProduction
        ? []
        : DEV_ORIGINS,
    ideaTool: {
      command: env.IDEA_TOOL_COMMAND ?? 'python3',
      baseArgs: env.IDEA_TOOL_ARGS !== undefined ? envList(env.IDEA_TOOL_ARGS) : [ideaScript],
      cwd: path.resolve(env.IDEA_TOOL_CWD ?? path.dirname(ideaScript)),
    },
    docTool: {
      command: env.DOC_TOOL_COMMAND ?? 'python3',
      baseArgs: env.DOC_TOOL_ARGS !== undefined ? envList(env.DOC_TOOL_ARGS) : [docScript],
      cwd: path.resolve(env.DOC_TOOL_CWD ?? path.dirname(docScript)),
    },
    sessionsDir: path.resolve(env.SESSIONS_DIR ?? 'sessions'),
    killGraceMs: parsePositiveInt(env.KILL_GRACE_MS, 5_000),
    maxObserverQueue: parsePositiveInt(env.MAX_OBSERVER_QUEUE, 1_000),
    maxConfigBodyBytes: parsePositiveInt(env.MAX_CONFIG_BODY_BYTES, 20_000),
    heartbeatMs: parsePositiveInt(env.SSE_HEARTBEAT_MS, 15_000),
  };
}

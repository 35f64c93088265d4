/**
 * Decodes the idea tool's final result into Topics.
 *
 * Two sources are understood:
 *   - a `@@TOPICS <json>` line on stdout (preferred)
 *   - topic files (`topic_*.md`, else `analysis_*.md`) left in the tool's
 *     working directory, which are moved into the session directory
 */

import { copyFile, mkdir, readdir, readFile, rename, unlink } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Topic } from './types.js';

export const TOPICS_MARKER = '@@TOPICS ';
export const PREVIEW_MAX_CHARS = 300;

const TopicItemSchema = z.object({
  title: z.string().trim().min(1).max(500),
  content: z.string().optional(),
  wordCount: z.number().int().nonnegative().optional(),
}).passthrough();

const TopicPayloadSchema = z.union([
  z.array(TopicItemSchema),
  z.object({ topics: z.array(TopicItemSchema) }).passthrough().transform((value) => value.topics),
]);

export type TopicDecodeResult =
  | { ok: true; topics: Topic[] }
  | { ok: false; error: string };

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function isTopicPayloadLine(line: string): boolean {
  return line.trimStart().startsWith(TOPICS_MARKER);
}

function buildTopic(id: number, title: string, content: string | undefined, wordCount?: number, sourcePath?: string): Topic {
  return {
    id,
    title,
    previewText: content ? Array.from(content).slice(0, PREVIEW_MAX_CHARS).join('') : '',
    wordCount: content !== undefined ? countWords(content) : (wordCount ?? 0),
    ...(sourcePath ? { sourcePath } : {}),
  };
}

export function decodeTopicPayload(line: string): TopicDecodeResult {
  const raw = line.trimStart().slice(TOPICS_MARKER.length).trim();
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `Topic payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = TopicPayloadSchema.safeParse(parsedJson);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `Topic payload is malformed at ${issue.path.join('.') || '<root>'}: ${issue.message}` };
  }
  if (parsed.data.length === 0) {
    return { ok: false, error: 'Topic payload contained no topics' };
  }

  return {
    ok: true,
    topics: parsed.data.map((item, index) => buildTopic(index, item.title, item.content, item.wordCount)),
  };
}

function titleFromStem(stem: string): string {
  return stem
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function extractTitle(content: string, fallbackStem: string): string {
  for (const line of content.split('\n')) {
    if (line.startsWith('#')) {
      const heading = line.replace(/^#+/, '').trim();
      if (heading) return heading;
    }
  }
  return titleFromStem(fallbackStem);
}

async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    await copyFile(source, destination);
    await unlink(source);
  }
}

async function listTopicFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir);
  const markdown = entries.filter((name) => name.endsWith('.md')).sort();
  const topicFiles = markdown.filter((name) => name.startsWith('topic_'));
  return topicFiles.length > 0 ? topicFiles : markdown.filter((name) => name.startsWith('analysis_'));
}

/**
 * Collects topic files written by the idea tool and moves them under
 * `destinationDir`. Returns an empty list when the tool wrote none.
 */
export async function collectTopicFiles(toolDir: string, destinationDir: string): Promise<Topic[]> {
  const files = await listTopicFiles(toolDir);
  if (files.length === 0) return [];

  await mkdir(destinationDir, { recursive: true });
  const topics: Topic[] = [];
  for (const [index, name] of files.entries()) {
    const source = path.join(toolDir, name);
    const content = await readFile(source, 'utf8');
    const destination = path.join(destinationDir, name);
    await moveFile(source, destination);
    topics.push(buildTopic(index, extractTitle(content, path.basename(name, '.md')), content, undefined, destination));
  }
  return topics;
}

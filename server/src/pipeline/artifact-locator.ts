import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

export const OUTPUT_MARKER = '@@OUTPUT ';

export function parseOutputMarker(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(OUTPUT_MARKER.trim())) return null;
  const reported = trimmed.slice(OUTPUT_MARKER.trim().length).trim();
  return reported || null;
}

/** Files under an output directory keyed by path, with their mtime. */
export type OutputListing = Map<string, number>;

export interface ArtifactQuery {
  outputLocation: string;
  cwd?: string;
  /** Listing taken just before the invocation launched. */
  before: OutputListing;
  reportedPath: string | null;
}

/** Resolves the file a document invocation produced, or null when none is found. */
export type ArtifactLocator = (query: ArtifactQuery) => Promise<string | null>;

/** Lists the output directory so a later lookup can tell what one invocation wrote. */
export type OutputLister = (outputLocation: string, cwd?: string) => Promise<OutputListing>;

function resolveOutputDir(outputLocation: string, cwd?: string): string {
  return path.resolve(cwd ?? process.cwd(), outputLocation);
}

async function isFile(filePath: string): Promise<boolean> {
  return stat(filePath)
    .then((info) => info.isFile())
    .catch(() => false);
}

async function listFiles(dir: string): Promise<OutputListing> {
  const listing: OutputListing = new Map();
  let entries: string[];
  try {
    entries = await readdir(dir, { recursive: true });
  } catch {
    return listing;
  }
  for (const entry of entries) {
    const file = path.join(dir, entry);
    const info = await stat(file).catch(() => null);
    if (info?.isFile()) listing.set(file, info.mtimeMs);
  }
  return listing;
}

export const listOutputFiles: OutputLister = (outputLocation, cwd) =>
  listFiles(resolveOutputDir(outputLocation, cwd));

export const locateArtifact: ArtifactLocator = async ({ outputLocation, cwd, before, reportedPath }) => {
  if (reportedPath) {
    const resolved = path.resolve(cwd ?? process.cwd(), reportedPath);
    if (await isFile(resolved)) return resolved;
  }

  // Only files this invocation created or rewrote count.
  const after = await listFiles(resolveOutputDir(outputLocation, cwd));
  let newest: { file: string; mtimeMs: number } | null = null;
  for (const [file, mtimeMs] of after) {
    if (before.get(file) === mtimeMs) continue;
    if (!newest || mtimeMs > newest.mtimeMs) newest = { file, mtimeMs };
  }
  return newest?.file ?? null;
};

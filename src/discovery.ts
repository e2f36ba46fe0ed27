import fs from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_VIDEO_EXTENSIONS } from './config';
import { DiscoveryError, errorMessage, hasErrorCode } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { deriveDisplayName } from './titles';
import type { WorkItem } from './types';

export type DiscoverOptions = {
  extensions?: readonly string[];
  logger?: Logger;
  now?: () => Date;
};

// Snapshot of the transcodable files directly inside `inputPath`, ordered by path.
// Subdirectories and hidden files are ignored. A missing input directory is created
// and yields an empty batch; one that exists but cannot be listed is a DiscoveryError.
export async function discover(inputPath: string, options: DiscoverOptions = {}): Promise<WorkItem[]> {
  const log = options.logger ?? defaultLogger;
  const extensions = new Set((options.extensions ?? DEFAULT_VIDEO_EXTENSIONS).map((e) => e.toLowerCase()));
  const now = options.now ?? (() => new Date());
  const root = path.resolve(inputPath);

  // Create the input directory on first use
  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) throw new DiscoveryError(root, 'not a directory');
  } catch (err) {
    if (err instanceof DiscoveryError) throw err;
    if (!hasErrorCode(err, 'ENOENT')) throw new DiscoveryError(root, errorMessage(err), { cause: err });
    try {
      await fs.mkdir(root, { recursive: true });
    } catch (mkdirErr) {
      throw new DiscoveryError(root, errorMessage(mkdirErr), { cause: mkdirErr });
    }
    log.info({ inputPath: root }, 'Created missing input directory');
    return [];
  }

  // List the directory once; later changes belong to the next batch
  let entries: string[];
  try {
    entries = await fs.readdir(root);
  } catch (err) {
    throw new DiscoveryError(root, errorMessage(err), { cause: err });
  }

  // Keep regular files with a known extension
  const items = new Map<string, WorkItem>();
  for (const name of entries) {
    if (name.startsWith('.')) {
      log.debug({ file: name }, 'Skipping hidden file');
      continue;
    }
    if (!extensions.has(path.extname(name).toLowerCase())) continue;

    const sourcePath = path.join(root, name);
    try {
      // stat follows symlinks, so linked files count and linked directories do not
      const stats = await fs.stat(sourcePath);
      if (!stats.isFile()) continue;
      items.set(sourcePath, {
        sourcePath,
        displayName: deriveDisplayName(name),
        sizeBytes: stats.size,
        discoveredAt: now(),
      });
    } catch (err) {
      // removed between listing and stat
      log.warn({ file: sourcePath, err }, 'Could not stat file, skipping');
    }
  }

  // Dispatch order is path order
  const ordered = [...items.values()].sort((a, b) =>
    a.sourcePath < b.sourcePath ? -1 : a.sourcePath > b.sourcePath ? 1 : 0
  );
  log.info({ inputPath: root, count: ordered.length }, `Found ${ordered.length} file(s) to process`);
  return ordered;
}

import type { Dirent } from 'node:fs';
import fsPromises from 'node:fs/promises';
import path from 'node:path';
import type { ScannedFile } from '../types/catalog.js';
import { calculateDigest } from '../utils/digest.js';
import { filesystemError } from '../utils/errors.js';
import { toRelativePath } from '../utils/model-path.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('FileProcessingService');

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

type EntryKind = 'directory' | 'file' | 'other';

/**
 * Classify a directory entry, following symlinks to their target. A dangling
 * link is reported as 'other'.
 */
async function entryKind(entryPath: string, entry: Dirent): Promise<EntryKind> {
  if (entry.isSymbolicLink()) {
    try {
      const target = await fsPromises.stat(entryPath);
      if (target.isDirectory()) return 'directory';
      return target.isFile() ? 'file' : 'other';
    } catch (err) {
      logger.debug({ path: entryPath, err }, 'Skipping unresolvable symlink');
      return 'other';
    }
  }
  if (entry.isDirectory()) return 'directory';
  return entry.isFile() ? 'file' : 'other';
}

async function realDirectory(dir: string): Promise<string> {
  try {
    return await fsPromises.realpath(dir);
  } catch (err) {
    throw filesystemError(`Cannot resolve directory ${dir}`, err);
  }
}

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fsPromises.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    throw filesystemError(`Cannot read directory ${dir}`, err);
  }
}

export class FileProcessingService {
  /**
   * Immediate, non-hidden subdirectories of `dir` as absolute paths, in name
   * order. Symlinked directories count; stray files at this level are skipped.
   */
  async listSubdirectories(dir: string): Promise<string[]> {
    const entries = await readEntries(dir);
    const dirs: string[] = [];

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (isHidden(entry.name)) {
        logger.debug({ path: entryPath }, 'Skipping hidden entry');
        continue;
      }
      if ((await entryKind(entryPath, entry)) !== 'directory') {
        logger.debug({ path: entryPath }, 'Skipping non-directory');
        continue;
      }
      dirs.push(entryPath);
    }

    return dirs;
  }

  /**
   * Every regular file at any depth under `modelDir`, digested one at a time.
   * Symlinks are followed; a link back to a directory already being walked
   * is skipped.
   */
  async *walkFiles(modelDir: string): AsyncGenerator<ScannedFile> {
    yield* this.walkDirectory(modelDir, modelDir, new Set([await realDirectory(modelDir)]));
  }

  private async *walkDirectory(
    modelDir: string,
    dir: string,
    ancestors: ReadonlySet<string>,
  ): AsyncGenerator<ScannedFile> {
    const entries = await readEntries(dir);

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const kind = await entryKind(fullPath, entry);

      if (kind === 'directory') {
        const real = await realDirectory(fullPath);
        if (ancestors.has(real)) {
          logger.warn({ path: fullPath, target: real }, 'Skipping symlink cycle');
          continue;
        }
        logger.info({ path: fullPath }, 'Processing directory');
        yield* this.walkDirectory(modelDir, fullPath, new Set([...ancestors, real]));
      } else if (kind === 'file') {
        yield await this.scanFile(modelDir, fullPath);
      } else {
        logger.debug({ path: fullPath }, 'Skipping special file');
      }
    }
  }

  async scanFile(modelDir: string, filePath: string): Promise<ScannedFile> {
    try {
      const stat = await fsPromises.stat(filePath);
      const digest = await calculateDigest(filePath);
      return {
        filename: toRelativePath(modelDir, filePath),
        absolutePath: filePath,
        sizeBytes: stat.size,
        digest,
      };
    } catch (err) {
      throw filesystemError(`Cannot read file ${filePath}`, err);
    }
  }
}

export const fileProcessingService = new FileProcessingService();

import path from 'node:path';
import type { ParsedModelPath } from '../types/catalog.js';
import { VARIANT_SEPARATOR } from '../constants/index.js';
import { pathFormatError } from './errors.js';

/**
 * Splits a model directory name on its last separator:
 *   "Dragon-Bust-1234" → { modelName: "Dragon-Bust", variant: "1234" }
 *
 * Separators inside the name are kept. A name without a separator, or with
 * nothing before it, is a format error.
 */
export function splitVariant(dirName: string): { modelName: string; variant: string } {
  const index = dirName.lastIndexOf(VARIANT_SEPARATOR);
  if (index === -1) {
    throw pathFormatError(
      `Model directory "${dirName}" has no "${VARIANT_SEPARATOR}" before its variant suffix`,
      'modelDirName',
    );
  }

  const modelName = dirName.slice(0, index);
  if (!modelName) {
    throw pathFormatError(`Model directory "${dirName}" has an empty name`, 'modelDirName');
  }

  return { modelName, variant: dirName.slice(index + VARIANT_SEPARATOR.length) };
}

/**
 * Reads creator, collection and model identity from the last three segments
 * of a model directory path: <creator>/<collection>/<model>-<variant>.
 */
export function parseModelPath(modelPath: string): ParsedModelPath {
  const segments = path
    .normalize(modelPath)
    .split(path.sep)
    .filter((s) => s.length > 0);

  if (segments.length < 3) {
    throw pathFormatError(
      `Model path "${modelPath}" must have creator, collection and model segments`,
      'modelPath',
    );
  }

  const [creatorName, collectionName, modelDirName] = segments.slice(-3);
  const { modelName, variant } = splitVariant(modelDirName);

  return { creatorName, collectionName, modelName, variant };
}

/** Path of `target` relative to `root`, '/'-separated regardless of platform. */
export function toRelativePath(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/');
}

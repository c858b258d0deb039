import crypto from 'node:crypto';
import fsPromises from 'node:fs/promises';
import { DIGEST_ALGORITHM } from '../constants/index.js';

export function digestBuffer(content: Buffer): string {
  return crypto.createHash(DIGEST_ALGORITHM).update(content).digest('hex');
}

/**
 * SHA-512 of the whole file as lowercase hex. The file is read into memory in
 * one piece; nothing is cached between calls.
 */
export async function calculateDigest(filePath: string): Promise<string> {
  const content = await fsPromises.readFile(filePath);
  return digestBuffer(content);
}

/**
 * HEIC → JPEG conversion for attachments, via macOS `sips`.
 *
 * Browsers other than Safari cannot display HEIC. Converted files are
 * cached by attachment id; when conversion is impossible the caller
 * serves the original bytes.
 */

import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';

import type { Logger } from '../types/index.js';

/** Runs an external command; rejects on non-zero exit or timeout. */
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<void>;

export interface ImageConvertOptions {
  /** Directory holding `<attachmentId>.jpg` files. */
  cacheDir: string;
  timeoutMs: number;
  logger: Logger;
  run?: CommandRunner;
}

const execFileAsync = promisify(execFile);

const runCommand: CommandRunner = async (file, args, timeoutMs) => {
  await execFileAsync(file, args, { timeout: timeoutMs });
};

/** Whether an attachment is HEIC, judged by MIME type or extension. */
export function isHeic(mimeType: string | null, path: string): boolean {
  return (mimeType?.toLowerCase().includes('heic') ?? false) || path.toLowerCase().endsWith('.heic');
}

/**
 * Convert `source` to JPEG, reusing a cached copy when present. Returns
 * the JPEG path, or null when conversion failed.
 */
export async function convertHeicToJpeg(
  source: string,
  attachmentId: number,
  options: ImageConvertOptions,
): Promise<string | null> {
  const { cacheDir, timeoutMs, logger } = options;
  const run = options.run ?? runCommand;
  const outPath = join(cacheDir, `${attachmentId}.jpg`);

  if (existsSync(outPath)) {
    return outPath;
  }

  try {
    await mkdir(cacheDir, { recursive: true });
    await run('sips', ['-s', 'format', 'jpeg', source, '--out', outPath], timeoutMs);
  } catch (err) {
    logger.warn({ err, attachmentId, source }, 'HEIC conversion failed, serving original');
    return null;
  }

  if (!existsSync(outPath)) {
    logger.warn({ attachmentId, outPath }, 'sips produced no output, serving original');
    return null;
  }
  logger.debug({ attachmentId, outPath }, 'Converted HEIC attachment');
  return outPath;
}

import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import pino from 'pino';
import type { z } from 'zod';
import { StorageCorruptionError, getErrorMessage, logError } from '../../utils/errors.js';

const log = pino({ name: 'state-store' });

export function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a JSON state file and validate it against `schema`.
 *
 * A missing file returns `fallback` quietly. A file that cannot be parsed or
 * that no longer matches the schema also returns `fallback`, but is logged as
 * storage corruption so an operator can see it.
 */
export async function loadState<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: () => T,
): Promise<T> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      log.debug({ filePath }, 'No state file yet, using defaults');
      return fallback();
    }
    logError('state_read_failed', new StorageCorruptionError(filePath, getErrorMessage(error), error));
    return fallback();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logError('state_corrupt', new StorageCorruptionError(filePath, 'invalid JSON', error));
    return fallback();
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    logError('state_corrupt', new StorageCorruptionError(filePath, 'schema mismatch'), { issues });
    return fallback();
  }

  return parsed.data;
}

/**
 * Write `value` as JSON so that readers only ever see the old file or the new one.
 *
 * The document goes to a uniquely named temp file in the destination directory,
 * is fsync'd, then renamed over the destination. On failure the temp file is
 * removed and the error is rethrown; the previous file is left untouched.
 */
export async function saveState(filePath: string, value: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`);

  await fs.mkdir(dir, { recursive: true });

  try {
    const handle = await fs.open(tmpPath, 'w');
    try {
      await handle.writeFile(JSON.stringify(value, null, 2), 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }

  log.debug({ filePath }, 'State saved');
}

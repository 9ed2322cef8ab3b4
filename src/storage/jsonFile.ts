import fs from 'fs/promises';
import path from 'path';
import {z} from 'zod';
import {StoreUnavailableError} from '../services/errors';
import {isRecord} from '../utils/guards';
import {logger} from '../utils/logger';

/**
 * Reads a JSON document checked against `schema`. A missing file yields
 * `fallback`; unreadable or malformed content is reported as a
 * StoreUnavailableError.
 */
export async function readJsonFile<T>(
  filePath: string,
  fallback: T,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return fallback;
    }
    throw new StoreUnavailableError(filePath, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StoreUnavailableError(filePath, error);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new StoreUnavailableError(
      filePath,
      new Error(`unexpected document shape${where}: ${issue?.message ?? 'invalid'}`)
    );
  }
  return result.data;
}

/**
 * Replaces the whole document. The temp-file rename keeps readers from
 * ever seeing a half-written file; concurrent writers still race (last
 * write wins).
 */
let writeCounter = 0;

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  writeCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${writeCounter}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), {recursive: true});
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, {force: true}).catch((cleanupError: unknown) => {
      logger.warn(`Could not remove ${tempPath}`, cleanupError);
    });
    throw new StoreUnavailableError(filePath, error);
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

// fs errors may come from another realm; match on the code
export function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

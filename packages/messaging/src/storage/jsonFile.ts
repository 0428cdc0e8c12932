import fs from 'fs/promises';
import path from 'path';
import { describeError, type Logger } from '@push-dispatch/router';

/**
 * Read and parse a JSON file. Returns undefined when the file is missing,
 * unreadable or not valid JSON; the last two are logged as warnings.
 */
export async function readJsonFile(
  filePath: string,
  description: string,
  logger: Logger
): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (!isNotFound(err)) {
      logger.warn(`Could not read ${description} ${filePath}: ${describeError(err)}`);
    }
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    logger.warn(`Ignoring corrupt ${description} ${filePath}: ${describeError(err)}`);
    return undefined;
  }
}

/** Write `value` as JSON, creating parent directories. Atomic replace via rename. */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(value), 'utf8');
  await fs.rename(tmpPath, filePath);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

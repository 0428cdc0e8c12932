/**
 * FileTokenStore: keeps the last messaging token in a small JSON file
 * (`{ "token": "..." }`), so a token fetched at startup can be compared with
 * the previous launch's.
 *
 * Lookup order:
 *  1. The token file.
 *  2. The PUSH_LAST_TOKEN environment variable.
 */
import { createLogger, type Logger } from '@push-dispatch/router';
import fs from 'fs/promises';
import type { TokenStore } from '../types/storage';
import { readJsonFile, writeJsonFile } from './jsonFile';

const TOKEN_ENV_KEY = 'PUSH_LAST_TOKEN';

export class FileTokenStore implements TokenStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = createLogger('token-store'),
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async get(): Promise<string | null> {
    return (await this.readToken()) ?? (this.env[TOKEN_ENV_KEY] || null);
  }

  set(token: string): Promise<void> {
    return writeJsonFile(this.filePath, { token });
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }

  private async readToken(): Promise<string | null> {
    const parsed = await readJsonFile(this.filePath, 'token file', this.logger);
    if (parsed === undefined) return null;

    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('token' in parsed) ||
      typeof parsed.token !== 'string' ||
      parsed.token.length === 0
    ) {
      this.logger.warn(`Ignoring token file ${this.filePath}: expected a "token" string`);
      return null;
    }
    return parsed.token;
  }
}

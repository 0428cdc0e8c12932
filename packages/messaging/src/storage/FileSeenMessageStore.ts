import { createLogger, type Logger, type SeenMessageStore } from '@push-dispatch/router';
import { readJsonFile, writeJsonFile } from './jsonFile';

/**
 * Keeps dispatched message ids in a JSON array on disk (oldest first) so a
 * launch message the provider replays on the next start is recognised.
 * A missing or unreadable file counts as empty.
 */
export class FileSeenMessageStore implements SeenMessageStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = createLogger('seen-store')
  ) {}

  async load(): Promise<string[]> {
    const parsed = await readJsonFile(this.filePath, 'seen-id file', this.logger);
    if (parsed === undefined) return [];

    if (!Array.isArray(parsed)) {
      this.logger.warn(`Ignoring seen-id file ${this.filePath}: expected an array`);
      return [];
    }
    return parsed.filter((id): id is string => typeof id === 'string' && id.length > 0);
  }

  save(ids: readonly string[]): Promise<void> {
    return writeJsonFile(this.filePath, ids);
  }
}

import type { Logger } from '../logging/logger';
import type { SeenMessageStore } from '../types/channels';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

export class MemorySeenStore implements SeenMessageStore {
  saves: string[][] = [];

  constructor(private ids: string[] = []) {}

  load(): Promise<string[]> {
    return Promise.resolve([...this.ids]);
  }

  save(ids: readonly string[]): Promise<void> {
    this.ids = [...ids];
    this.saves.push([...ids]);
    return Promise.resolve();
  }
}

export function nextTick(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

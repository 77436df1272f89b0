import pino from 'pino';
import { z } from 'zod';
import type { Logger } from '../../src/core/logging/index.js';

/**
 * Fake logger for testing - a real pino logger whose output lands in memory.
 */
export type LogEntryLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  readonly level: LogEntryLevel;
  readonly msg?: string;
  readonly component?: string;
  readonly fields: Record<string, unknown>;
}

const LEVELS: Readonly<Record<number, LogEntryLevel>> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
};

const LogLineSchema = z
  .object({
    level: z.number(),
    msg: z.string().optional(),
    component: z.string().optional(),
  })
  .passthrough();

export class FakeLogger {
  readonly entries: LogEntry[] = [];
  readonly logger: Logger;

  constructor() {
    this.logger = pino(
      { level: 'trace', base: null, timestamp: false },
      { write: (line: string) => this.record(line) }
    );
  }

  private record(line: string): void {
    const parsed = LogLineSchema.parse(JSON.parse(line));
    const { level, msg, component, ...fields } = parsed;
    this.entries.push({ level: LEVELS[level] ?? 'info', msg, component, fields });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Test Helpers
  // ═══════════════════════════════════════════════════════════════════

  clear(): void {
    this.entries.length = 0;
  }

  hasEntry(level: LogEntryLevel, msgContains: string): boolean {
    return this.entries.some(e =>
      e.level === level && e.msg?.includes(msgContains)
    );
  }

  getEntries(level?: LogEntryLevel): LogEntry[] {
    return level
      ? this.entries.filter(e => e.level === level)
      : [...this.entries];
  }
}

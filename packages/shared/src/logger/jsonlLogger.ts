import * as fs from 'fs/promises';
import type { ProvisionEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import type { Logger } from './types';

/**
 * Appends redacted events to a JSONL file and forwards plain log lines to
 * `delegate` (console output stays readable while the file keeps the record).
 */
export class JsonlLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly delegate: Logger,
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  async log(event: ProvisionEvent): Promise<void> {
    const line = JSON.stringify({ ...redactForLogs(event), ...this.bindings }) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Best-effort: do not fail the run due to logging.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: ProvisionEvent, message: string): Promise<void> {
    await this.log(event);
    await this.delegate.info(message);
  }

  debug(message: string) {
    return this.delegate.debug(message);
  }

  info(message: string) {
    return this.delegate.info(message);
  }

  warn(message: string) {
    return this.delegate.warn(message);
  }

  error(error: Error, message?: string) {
    return this.delegate.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.delegate.child(bindings), {
      ...this.bindings,
      ...bindings,
    });
  }
}

import * as fs from 'fs/promises';
import type { GenerationEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import type { Logger } from './types';

/**
 * Appends redacted events to a JSONL trace file. Level messages go to the
 * console unless `quiet` is set.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly quiet: boolean;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    options: { quiet?: boolean } = {},
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.quiet = options.quiet ?? false;
  }

  async log(event: GenerationEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken trace file must not fail the session.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: GenerationEvent, message: string): Promise<void> {
    await this.log(event);
    this.info(message);
  }

  debug(message: string): void {
    if (this.quiet) return;
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    if (this.quiet) return;
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    if (this.quiet) return;
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, { quiet: this.quiet });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

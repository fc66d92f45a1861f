import type { GenerationEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Keeps events and messages in memory. Children share the parent's buffers.
 */
export class MemoryLogger implements Logger {
  readonly events: GenerationEvent[];
  readonly messages: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string }>;

  constructor(
    events: GenerationEvent[] = [],
    messages: MemoryLogger['messages'] = [],
  ) {
    this.events = events;
    this.messages = messages;
  }

  log(event: GenerationEvent): void {
    this.events.push(event);
  }

  trace(event: GenerationEvent, message: string): void {
    this.log(event);
    this.info(message);
  }

  debug(message: string): void {
    this.messages.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }

  error(error: Error, message?: string): void {
    this.messages.push({ level: 'error', message: message ?? error.message });
  }

  child(_bindings: Record<string, unknown>): Logger {
    return new MemoryLogger(this.events, this.messages);
  }

  /** Events of one type, in emission order */
  ofType<T extends GenerationEvent['type']>(type: T): Array<Extract<GenerationEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<GenerationEvent, { type: T }> => event.type === type);
  }
}

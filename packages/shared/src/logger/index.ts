import { ConsoleLogger, SilentLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { MemoryLogger } from './memoryLogger';
export type { Logger, MaybePromise } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, MemoryLogger, SilentLogger };

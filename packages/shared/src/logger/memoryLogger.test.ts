import { describe, it, expect } from 'vitest';
import { MemoryLogger } from './memoryLogger';
import { createEvent } from '../types/events';

describe('MemoryLogger', () => {
  it('records events and filters them by type', () => {
    const logger = new MemoryLogger();
    logger.log(createEvent('run-1', { type: 'GapFillResolved', payload: { path: 'a.py', chars: 3 } }));
    logger.log(createEvent('run-1', { type: 'GapFillUnresolved', payload: { path: 'b.py', reason: 'empty reply' } }));

    expect(logger.events).toHaveLength(2);
    expect(logger.ofType('GapFillUnresolved').map((e) => e.payload.path)).toEqual(['b.py']);
  });

  it('shares buffers with children', () => {
    const logger = new MemoryLogger();
    logger.child({ group: 'config' }).warn('careful');
    expect(logger.messages).toEqual([{ level: 'warn', message: 'careful' }]);
  });
});

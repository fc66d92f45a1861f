import { describe, it, expect } from 'vitest';
import { redactString, redactUnknown, redactForLogs } from './redaction';

describe('redaction', () => {
  describe('redactString', () => {
    it('should not change a string with no secrets', () => {
      const input = 'This is a test string.';
      const { redacted, redactionCount } = redactString(input);
      expect(redacted).toBe(input);
      expect(redactionCount).toBe(0);
    });

    it('should redact an OpenAI-style API key', () => {
      const input = 'My API key is sk-testtesttesttesttesttest.';
      const { redacted, redactionCount } = redactString(input);
      expect(redacted).toBe('My API key is [REDACTED].');
      expect(redactionCount).toBe(1);
    });

    it('should redact an Anthropic-style API key once', () => {
      const input = 'key: sk-ant-REDACTED end';
      const { redacted, redactionCount } = redactString(input);
      expect(redacted).toBe('key: [REDACTED] end');
      expect(redactionCount).toBe(1);
    });

    it('should redact KEY=value assignments', () => {
      const { redacted } = redactString('export API_KEY=test-secret');
      expect(redacted).toBe('export [REDACTED]');
    });
  });

  describe('redactUnknown', () => {
    it('walks nested objects and arrays', () => {
      const input = {
        list: ['plain', 'sk-testtesttesttesttesttest'],
        nested: { note: 'ok' },
        count: 3,
      };
      const { redacted, redactionCount } = redactUnknown(input);
      expect(redacted).toEqual({
        list: ['plain', '[REDACTED]'],
        nested: { note: 'ok' },
        count: 3,
      });
      expect(redactionCount).toBe(1);
    });

    it('masks sensitive keys regardless of value shape', () => {
      const { redacted } = redactUnknown({ api_key: 'test-secret', api_key_env: 'ANTHROPIC_API_KEY' });
      expect(redacted).toEqual({ api_key: '[REDACTED]', api_key_env: 'ANTHROPIC_API_KEY' });
    });
  });

  it('redactForLogs keeps non-secret values intact', () => {
    const event = { type: 'SessionStarted', payload: { mode: 'staged' } };
    expect(redactForLogs(event)).toEqual(event);
  });
});

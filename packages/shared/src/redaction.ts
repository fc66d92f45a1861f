const REDACTION_PLACEHOLDER = '[REDACTED]';

// Common API key prefixes
const apiKeyPatterns = [
  /sk-ant-[a-zA-Z0-9_-]{20,}/g, // Anthropic style
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI style
];

// KEY=value assignments
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?[a-zA-Z0-9_-]+['"]?/g];

const allPatterns = [...apiKeyPatterns, ...envVarPatterns];

// Object keys whose values are always masked
const SENSITIVE_KEYS = new Set(['api_key', 'apiKey', 'authorization']);

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (SENSITIVE_KEYS.has(key) && typeof value === 'string' && value.length > 0) {
        redactedObj[key] = REDACTION_PLACEHOLDER;
        totalRedactions++;
        continue;
      }
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

/**
 * Returns a copy of `value` with secrets masked, ready for serialization.
 */
export function redactForLogs(value: unknown): unknown {
  return redactUnknown(value).redacted;
}

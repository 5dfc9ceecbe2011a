/**
 * Log Sanitization
 * Redacts email addresses, verification codes and session capability tokens
 * before they reach a log line
 */

export enum DataClassification {
  PUBLIC = 'public',
  INTERNAL = 'internal',
  CONFIDENTIAL = 'confidential',
  RESTRICTED = 'restricted'
}

export interface SensitiveDataPattern {
  pattern: RegExp;
  classification: DataClassification;
  replacement: string;
  description: string;
}

export interface SanitizationOptions {
  classification: DataClassification;
  environment: 'development' | 'test' | 'production';
  allowStackTraces: boolean;
}

export interface SanitizedError {
  name: string;
  message: string;
  stack?: string;
}

const CLASSIFICATION_RANK: Record<DataClassification, number> = {
  [DataClassification.PUBLIC]: 0,
  [DataClassification.INTERNAL]: 1,
  [DataClassification.CONFIDENTIAL]: 2,
  [DataClassification.RESTRICTED]: 3
};

// Matched as substrings of the lower-cased key
const SENSITIVE_KEYS = [
  'password', 'pass', 'secret', 'token', 'email', 'toaddress',
  'secondaryid', 'verificationcode', 'attemptedcode'
];

export const REDACTED_VALUE = '[REDACTED]';

export class LogSanitizer {
  private patterns: SensitiveDataPattern[] = [
    // Session capability tokens
    {
      pattern: /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi,
      classification: DataClassification.RESTRICTED,
      replacement: '[SESSION_ID_REDACTED]',
      description: 'Session capability tokens'
    },
    // Bot tokens, SMTP passwords and other long secrets
    {
      pattern: /\b[A-Za-z0-9]{32,}\b/g,
      classification: DataClassification.RESTRICTED,
      replacement: '[SECRET_REDACTED]',
      description: 'API keys and secrets'
    },
    {
      pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
      classification: DataClassification.CONFIDENTIAL,
      replacement: '[EMAIL_REDACTED]',
      description: 'Email addresses'
    }
  ];

  public sanitize(data: unknown, options: SanitizationOptions): unknown {
    if (typeof data === 'string') {
      return this.sanitizeString(data, options);
    }

    if (Array.isArray(data)) {
      return data.map(item => this.sanitize(item, options));
    }

    if (data instanceof Error) {
      return this.sanitizeError(data, options);
    }

    if (data && typeof data === 'object') {
      return this.sanitizeObject(data, options);
    }

    return data;
  }

  public sanitizeString(value: string, options: SanitizationOptions): string {
    let sanitized = value;

    for (const pattern of this.patterns) {
      if (this.shouldApplyPattern(pattern, options)) {
        sanitized = sanitized.replace(pattern.pattern, pattern.replacement);
      }
    }

    return sanitized;
  }

  /**
   * Sanitizes an object recursively. Values under sensitive keys are
   * replaced outright; everything else goes through the pattern filters.
   */
  public sanitizeObject(obj: object, options: SanitizationOptions): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (value === undefined) {
        continue;
      }
      sanitized[key] = this.isSensitiveKey(key) ? REDACTED_VALUE : this.sanitize(value, options);
    }

    return sanitized;
  }

  public sanitizeError(error: Error, options: SanitizationOptions): SanitizedError {
    const sanitized: SanitizedError = {
      name: error.name,
      message: this.sanitizeString(error.message, options)
    };

    if (options.allowStackTraces && error.stack) {
      sanitized.stack = this.sanitizeString(error.stack, options);
    }

    return sanitized;
  }

  private isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey));
  }

  private shouldApplyPattern(pattern: SensitiveDataPattern, options: SanitizationOptions): boolean {
    return CLASSIFICATION_RANK[pattern.classification] >= CLASSIFICATION_RANK[options.classification];
  }
}

export const logSanitizer = new LogSanitizer();

// Sanitization presets for different environments
export const SanitizationPresets: Record<SanitizationOptions['environment'], SanitizationOptions> = {
  development: {
    classification: DataClassification.INTERNAL,
    environment: 'development',
    allowStackTraces: true
  },
  test: {
    classification: DataClassification.CONFIDENTIAL,
    environment: 'test',
    allowStackTraces: false
  },
  production: {
    classification: DataClassification.CONFIDENTIAL,
    environment: 'production',
    allowStackTraces: false
  }
};

import { randomUUID } from 'node:crypto';
import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Clinical-grade logger with PHI redaction
 * Prevents patient identifiers and credentials from reaching logs (HIPAA/GDPR)
 */

// PHI and credential patterns redacted from free-text values
const PII_PATTERNS = {
  // Email addresses
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  // US social security numbers
  ssn: /\b\d{3}-\d{2}-\d{4}\b/g,
  // JWT tokens
  jwt: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  // Bearer tokens
  bearer: /Bearer\s+[a-zA-Z0-9._-]+/gi,
};

// Fields to completely redact (case-insensitive matching)
const REDACTED_FIELDS = [
  'patientname',
  'firstname',
  'lastname',
  'fullname',
  'mrn',
  'ssn',
  'dob',
  'birthdate',
  'address',
  'phone',
  'email',
  'notes',
  'password',
  'secret',
  'token',
  'apikey',
  'authorization',
  'cookie',
];

/**
 * Recursively redact PHI from an object
 */
export function redactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    let result = obj;
    for (const pattern of Object.values(PII_PATTERNS)) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const keyLower = key.toLowerCase();
      const shouldRedact = REDACTED_FIELDS.some(
        (field) => keyLower === field || keyLower.includes(field)
      );
      redacted[key] = shouldRedact ? '[REDACTED]' : redactObject(value);
    }
    return redacted;
  }

  return obj;
}

/**
 * Log object keys redacted by pino, in the spellings callers use.
 * Paths are case-sensitive, so new PHI fields must be listed here explicitly.
 */
export const REDACTION_PATHS: readonly string[] = [
  // Patient identity
  'patientName',
  'patient_name',
  'firstName',
  'first_name',
  'lastName',
  'last_name',
  'fullName',
  'full_name',
  'mrn',
  'ssn',
  'dob',
  'dateOfBirth',
  'date_of_birth',
  'birthDate',

  // Contact details
  'address',
  'phone',
  'phoneNumber',
  'email',

  // Clinical free text
  'notes',
  'clinicalNotes',

  // Credentials
  'password',
  'secret',
  'token',
  'accessToken',
  'apiKey',
  'api_key',
  'authorization',
  'cookie',
];

function createRedactor() {
  return {
    paths: REDACTION_PATHS.flatMap((field) => [field, `*.${field}`]),
    censor: '[REDACTED]',
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Output stream (default: stdout) */
  destination?: DestinationStream;
}

/**
 * Create a logger instance with PHI redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
      payload: redactObject,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${randomUUID().slice(0, 12)}`;
}

export const logger = createLogger({ name: 'carelens' });

export type { Logger };

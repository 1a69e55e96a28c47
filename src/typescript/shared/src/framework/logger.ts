import * as winston from 'winston';

export interface LoggerOptions {
  level: string;
  serviceName: string;
}

// Helper to serialize Error objects for logging
export function serializeErrors(value: unknown): unknown {
  if (value instanceof Error) {
    const extra: Record<string, unknown> = {};
    // Include any custom properties (statusCode, details, issues...)
    for (const key of Object.getOwnPropertyNames(value)) {
      if (!['message', 'name', 'stack'].includes(key)) {
        extra[key] = serializeErrors(Reflect.get(value, key));
      }
    }
    return {
      message: value.message,
      name: value.name,
      stack: value.stack,
      ...extra
    };
  }
  if (Array.isArray(value)) {
    return value.map(serializeErrors);
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = serializeErrors(nested);
    }
    return result;
  }
  return value;
}

// Custom format to properly serialize Error objects in metadata.
// Mutates in place so winston's symbol keys survive.
const errorSerializer = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = serializeErrors(info[key]);
  }
  return info;
});

/**
 * Renders a log entry with the keys Cloud Logging reads: severity, timestamp
 * and a message prefixed with the emitting component.
 */
export function formatGcpEntry(info: winston.Logform.TransformableInfo): string {
  const { level, ...rest } = info;
  const message = rest.component ? `[${String(rest.component)}] ${String(rest.message)}` : rest.message;

  return JSON.stringify({
    timestamp: rest.timestamp,
    ...rest,
    severity: level.toUpperCase(),
    message
  });
}

/**
 * Structured JSON logger, one per process. Invocations derive child loggers
 * carrying their executionId and component.
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level,
    format: winston.format.combine(
      errorSerializer(),
      winston.format.json()
    ),
    defaultMeta: { service: options.serviceName },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.printf(formatGcpEntry)
        )
      })
    ]
  });
}

import * as winston from 'winston';

export interface LoggerOptions {
  serviceName: string;
  level: string;
}

/** Expands Error instances (including custom properties) so they survive JSON serialization. */
export function serializeErrors(value: unknown): unknown {
  if (value instanceof Error) {
    const extra: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(value)) {
      if (!['message', 'name', 'stack'].includes(key)) {
        extra[key] = serializeErrors(Reflect.get(value, key));
      }
    }
    return { message: value.message, name: value.name, stack: value.stack, ...extra };
  }
  if (Array.isArray(value)) {
    return value.map(serializeErrors);
  }
  if (value && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = serializeErrors(nested);
    }
    return result;
  }
  return value;
}

const errorSerializer = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = serializeErrors(info[key]);
  }
  return info;
});

/**
 * Structured JSON logger. Output lines carry Cloud Logging's `severity` key and
 * prefix the message with the `component` metadata when present.
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level,
    format: winston.format.combine(errorSerializer(), winston.format.json()),
    defaultMeta: { service: options.serviceName },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.printf((info) => {
            const { level, ...rest } = info;
            return JSON.stringify({
              timestamp: info.timestamp,
              ...rest,
              severity: level.toUpperCase(),
              message: info.component ? `[${String(info.component)}] ${String(info.message)}` : info.message,
            });
          })
        ),
      }),
    ],
  });
}

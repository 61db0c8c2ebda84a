import pino, { type Logger as PinoInstance, type LevelWithSilent } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = Record<string, unknown>;

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLevel(raw: string | undefined): LevelWithSilent {
  const normalized = raw?.trim().toLowerCase();
  const match = LEVELS.find((level) => level === normalized);
  return match ?? 'info';
}

export function serializeError(value: unknown): Record<string, unknown> {
  if (value instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: value.name,
      message: value.message
    };
    if (value.stack) serialized.stack = value.stack;
    if ('code' in value && value.code !== undefined) serialized.code = value.code;
    if ('details' in value && value.details !== undefined) serialized.details = value.details;
    if (value.cause !== undefined) serialized.cause = serializeError(value.cause);
    return serialized;
  }
  if (value && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value));
  }
  return { value: String(value) };
}

function serializeContext(context?: LogContext): LogContext | undefined {
  if (!context) return undefined;
  const output: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    output[key] = key === 'error' || key === 'cause' ? serializeError(value) : value;
  }
  return Object.keys(output).length ? output : undefined;
}

export class Log {
  constructor(private readonly instance: PinoInstance) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(context: LogContext): Log {
    return new Log(this.instance.child(serializeContext(context) ?? {}));
  }

  private write(level: LogLevel, message: string, context?: LogContext) {
    const serialized = serializeContext(context);
    if (serialized) {
      this.instance[level](serialized, message);
      return;
    }
    this.instance[level](message);
  }
}

export const log = new Log(
  pino({
    level: resolveLevel(process.env.LOG_LEVEL),
    base: undefined,
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`
  })
);

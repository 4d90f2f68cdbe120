export type LogPayload = unknown;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const isProduction = process.env.NODE_ENV === 'production';

function formatContext(context?: LogPayload): string | undefined {
  if (context === null || context === undefined) {
    return undefined;
  }
  if (context instanceof Error) {
    return JSON.stringify({ message: context.message, stack: context.stack });
  }
  if (typeof context !== 'object') {
    return String(context);
  }
  if (Object.keys(context).length === 0) {
    return undefined;
  }
  try {
    return JSON.stringify(context);
  } catch {
    return '[unserializable-context]';
  }
}

function emit(level: LogLevel, message: string, context: LogPayload[]): void {
  const payloads = context
    .map(formatContext)
    .filter((payload): payload is string => payload !== undefined);
  const line = `[lookup] ${message}`;
  if (payloads.length > 0) {
    console[level](line, ...payloads);
    return;
  }
  console[level](line);
}

export function logDebug(message: string, ...context: LogPayload[]): void {
  if (isProduction) return;
  emit('debug', message, context);
}

export function logInfo(message: string, ...context: LogPayload[]): void {
  emit('info', message, context);
}

export function logWarn(message: string, ...context: LogPayload[]): void {
  emit('warn', message, context);
}

export function logError(message: string, ...context: LogPayload[]): void {
  emit('error', message, context);
}

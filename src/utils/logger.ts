type LogLevel = 'debug' | 'error';

function write(level: LogLevel, message: string, meta: Record<string, unknown>) {
  const line = JSON.stringify({ level, message, ...meta });
  if (level === 'error') console.error(line);
  else console.log(line);
}

export function logDebug(message: string, meta: Record<string, unknown> = {}) {
  write('debug', message, meta);
}

export function logError(message: string, meta: Record<string, unknown> = {}) {
  write('error', message, meta);
}

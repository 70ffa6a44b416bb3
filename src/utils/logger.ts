import * as util from 'util';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

function formatLogMessage(level: LogLevel, message: string, args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const formattedMessage = args.length > 0 ? util.format(message, ...args) : message;
  return `[${timestamp}] [${level.toUpperCase().padEnd(5, ' ')}] ${formattedMessage}`;
}

function log(level: LogLevel, message: string, args: unknown[]): void {
  const line = formatLogMessage(level, message, args);

  switch (level) {
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
    case 'debug':
      if (process.env.APP_DEBUG === 'true') {
        console.debug(line);
      }
      break;
  }
}

/**
 * Level-tagged console logger shared by the server and the services.
 * Messages accept util.format placeholders (%s, %d, %o).
 */
export const logger = {
  info: (message: string, ...args: unknown[]) => log('info', message, args),
  warn: (message: string, ...args: unknown[]) => log('warn', message, args),
  error: (message: string, ...args: unknown[]) => log('error', message, args),
  debug: (message: string, ...args: unknown[]) => log('debug', message, args),
};

import pino, { type Logger } from 'pino';
import { getConfig } from './config.js';
import type { LogLevel } from './types.js';

export function createLogger(
  name: string = 'contract-assertions',
  level: LogLevel = 'warn',
  verbose: boolean = false,
): Logger {
  if (verbose) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  // Test runners own stdout; diagnostics go to stderr.
  return pino({ name, level }, pino.destination(2));
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    const config = getConfig();
    _logger = createLogger('contract-assertions', config.logLevel, config.verbose);
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}

import pino from 'pino';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'ticker-warehouse-sync' },
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  redact: ['connectionString', 'config.warehouseUrl'],
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Child logger for one module. The name travels as the `module` field, so
 * messages carry no prefix of their own.
 */
export function moduleLogger(name: string): pino.Logger {
  return logger.child({ module: name });
}

export default logger;

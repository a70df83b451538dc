import winston from 'winston';
import { config } from './config';

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const essentialMeta = Object.keys(meta).filter(key => key !== 'service');

    let output = `${timestamp} [${level}]: ${message}`;

    if (component && component !== 'dustat') {
      output += ` (${component})`;
    }

    if (essentialMeta.length > 0) {
      const essentialData: Record<string, unknown> = {};
      for (const key of essentialMeta) {
        essentialData[key] = meta[key];
      }

      // Only show if it's small and useful
      if (JSON.stringify(essentialData).length < 200) {
        output += ` ${JSON.stringify(essentialData)}`;
      }
    }

    return output;
  })
);

// stdout is reserved for reports, so every level goes to stderr
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: 'dustat' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ALL_LEVELS,
      silent: config.nodeEnv === 'test',
    }),
  ],
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    })
  );
}

// Create child loggers for different components
export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setTimeout(resolve, 100);
    });
  });
};

import winston from 'winston';
import fs from 'fs';

const SERVICE_NAME = 'flight-risk-board';
const LOG_DIR = 'logs';

// Request logs and feed degradations carry a few fields; keep them on one line
export const formatConsoleLine = (info: winston.Logform.TransformableInfo): string => {
  const {
    level, message, timestamp, service, stack, ...meta
  } = info;
  const time = typeof timestamp === 'string' ? timestamp : new Date().toISOString();
  const fields = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${time} ${level} ${String(message)}${fields}${trace}`;
};

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: process.env.NODE_ENV === 'test' && process.env.LOG_IN_TESTS !== 'true',
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(formatConsoleLine),
    ),
  }),
];

// Opt-in file logging; containers usually ship stdout instead
if (process.env.LOG_TO_FILES === 'true') {
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR);
  }
  transports.push(
    new winston.transports.File({
      filename: `${LOG_DIR}/${SERVICE_NAME}.error.log`,
      level: 'error',
    }),
    new winston.transports.File({
      filename: `${LOG_DIR}/${SERVICE_NAME}.log`,
    }),
  );
}

/**
 * Service logger: JSON records for files, one readable line per record on
 * the console
 */
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: SERVICE_NAME },
  transports,
});

export default logger;

// Logger
// Console + file logging shared by every component

import winston from 'winston';
import configManager from './config';

const { logLevel, logFile, environment } = configManager.getSection('app');

const lineFormat = winston.format.printf(({ timestamp, level, message, stack }) => {
  const text = typeof stack === 'string' ? `${String(message)}\n${stack}` : String(message);
  return `${String(timestamp)} - ${level.toUpperCase()} - ${text}`;
});

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
  new winston.transports.Console(),
];

if (environment !== 'test' && logFile) {
  transports.push(new winston.transports.File({ filename: logFile }));
}

const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss,SSS' }),
    lineFormat
  ),
  transports,
});

export default logger;

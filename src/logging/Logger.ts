import pino from 'pino';
import {
  DataAccessRecord,
  SecurityEvent,
  SecurityEventSeverity,
} from './SecurityEvents';

const isDevelopment = process.env.NODE_ENV === 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Credentials never reach the log stream
  redact: {
    paths: ['authorization', 'cookie', 'password', 'token', 'secret', 'apiKey'],
    remove: true,
  },
});

/**
 * Write a security event to the log stream at a level derived from its severity
 */
export function logSecurityEvent(event: SecurityEvent): void {
  const logData = {
    eventType: event.category,
    severity: event.severity,
    timestamp: event.timestamp,
    ip: event.clientIp,
    userId: event.userId,
    path: event.requestPath,
    method: event.httpMethod,
    userAgent: event.userAgent,
    matchedValue: event.matchedValue,
    field: event.field,
  };
  const message = `Security event: ${event.category} - ${event.detail}`;

  switch (event.severity) {
    case SecurityEventSeverity.High:
      logger.error(logData, message);
      break;
    case SecurityEventSeverity.Medium:
      logger.warn(logData, message);
      break;
    default:
      logger.info(logData, message);
  }
}

/**
 * Audit trail entry for authenticated access to a sensitive area
 */
export function logDataAccessRecord(record: DataAccessRecord): void {
  logger.info(
    {
      eventType: record.area,
      timestamp: record.timestamp,
      userId: record.userId,
      path: record.path,
      method: record.method,
      statusCode: record.statusCode,
    },
    `Data access: ${record.area}`
  );
}

export default logger;

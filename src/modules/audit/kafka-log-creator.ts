import { Logger } from '@nestjs/common';
import { LogEntry, logCreator, logLevel } from 'kafkajs';

const loggers = new Map<string, Logger>();

function loggerFor(namespace: string): Logger {
  const context = namespace ? `Kafka:${namespace}` : 'Kafka';
  let logger = loggers.get(context);
  if (!logger) {
    logger = new Logger(context);
    loggers.set(context, logger);
  }
  return logger;
}

export function formatKafkaLogEntry({ log }: LogEntry): string {
  const extra = Object.entries(log).filter(([key]) => key !== 'message' && key !== 'timestamp');
  if (extra.length === 0) {
    return log.message;
  }
  return `${log.message} ${JSON.stringify(Object.fromEntries(extra))}`;
}

/**
 * Routes kafkajs client logs into the Nest logger
 */
export const kafkaLogCreator: logCreator = () => (entry: LogEntry) => {
  const logger = loggerFor(entry.namespace);
  const text = formatKafkaLogEntry(entry);

  switch (entry.level) {
    case logLevel.ERROR:
      logger.error(text);
      break;
    case logLevel.WARN:
      logger.warn(text);
      break;
    case logLevel.INFO:
      logger.log(text);
      break;
    case logLevel.DEBUG:
      logger.debug(text);
      break;
    default:
      break;
  }
};

import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Child logger scoped to one document's pipeline run.
 */
export function createDocumentLogger(
  documentId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ documentId, ...extra });
}

export function createMatchLogger(
  matchId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ matchId, ...extra });
}

export default logger;

import pino from 'pino';

const defaultLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
};

// Pino logger instance configured for the app
// name: identifies this logger in output
// level: LOG_LEVEL wins; otherwise production logs info, tests stay silent, dev uses debug
// redact: removes the bot token, the webhook secret and any leased credential material
export const logger = pino({
  name: 'casebridge',
  level: defaultLevel(),
  redact: {
    paths: [
      'env.DISCORD_TOKEN',
      'DISCORD_TOKEN',
      'env.INGEST_SECRET',
      'INGEST_SECRET',
      'lease.credentials',
      'credentials',
      '*.secretAccessKey',
      '*.sessionToken',
    ],
    remove: true,
  },
});

// Child logger tagged with the component that writes through it
export const componentLogger = (component: string): pino.Logger => logger.child({ component });

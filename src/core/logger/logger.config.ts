import pino from 'pino';

export const logger = () => {
  const logLevel = process.env.LOG_LEVEL || 'info';

  return pino({
    name: 'memberful-client',
    level: logLevel,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
};

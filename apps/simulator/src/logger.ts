import pino from 'pino';

export const createLogger = (level: string, pretty: boolean): pino.Logger => {
  const loggerOptions: pino.LoggerOptions = { level };

  if (pretty) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
};

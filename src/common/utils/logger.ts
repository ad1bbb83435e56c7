import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';

const transport = isTest
  ? undefined
  : pino.transport({
      targets: [
        // Console only; the container runtime collects stdout
        {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
          level: 'trace',
        },
      ],
    });

const logger = pino(
  {
    level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  transport
);

export default logger;

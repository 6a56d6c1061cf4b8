import pino from 'pino';
import { config } from '../../config/config';

const buildLogger = () => {
  // Tests run without a transport so no worker thread outlives the run
  if (config.nodeEnv === 'test') {
    return pino({ level: 'silent' });
  }

  const transport = pino.transport({
    targets: [
      {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
        level: config.logLevel,
      },
    ],
  });

  return pino(
    {
      level: 'debug', // Must be the lowest level to allow transports to filter
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport
  );
};

const logger = buildLogger();

export default logger;

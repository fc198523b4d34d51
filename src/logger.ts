import pino, {Logger, LoggerOptions} from 'pino';
import config from './config';

const isProduction = config.nodeEnv === 'production';
const isTest = config.nodeEnv === 'test';
const logLevel = config.logLevel || 'trace';

const baseOptions: LoggerOptions = {
  level: isTest ? 'silent' : logLevel,
  base: {service: 'ocpp-central-system'},
  // Basic credentials some chargers send on the upgrade request
  redact: ['req.headers.authorization'],
};

let logger: Logger;

if (isProduction || isTest) {
  logger = pino(baseOptions);
} else {
  logger = pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
      },
    },
  });
}

/** Logger for everything that happens on one charge point's connection. */
export const sessionLogger = (identity: string): Logger => logger.child({identity});

export default logger;

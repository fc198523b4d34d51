import dotenv from 'dotenv';

dotenv.config();

interface Config {
  nodeEnv: string;
  logLevel: string;
  port: number;
  host: string;
  databaseFile: string;
  heartbeatIntervalSec: number;
  heartbeatTimeoutMultiplier: number;
  callTimeoutMs: number;
}

const getEnvVar = (name: string, defaultValue?: string | number | boolean): string => {
  const value = process.env[name];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      if (process.env.NODE_ENV !== 'test') {
        console.warn(`Environment variable ${name} is not provided. Using default value: ${defaultValue}`);
      }
      return String(defaultValue);
    }
    throw new Error(`Environment variable ${name} is missing!`);
  }
  return value;
};

const getNumericEnvVar = (name: string, defaultValue: number): number => {
  const value = Number(getEnvVar(name, defaultValue));
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive number`);
  }
  return value;
};

const config: Config = {
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
  logLevel: getEnvVar('LOG_LEVEL', 'info'),
  port: getNumericEnvVar('PORT', 3000),
  host: getEnvVar('HOST', 'localhost'),
  databaseFile: getEnvVar('DATABASE_FILE', './central-system.db'),
  // Interval handed to charge points in BootNotification.conf
  heartbeatIntervalSec: getNumericEnvVar('HEARTBEAT_INTERVAL_SECONDS', 300),
  heartbeatTimeoutMultiplier: getNumericEnvVar('HEARTBEAT_TIMEOUT_MULTIPLIER', 3),
  callTimeoutMs: getNumericEnvVar('CALL_TIMEOUT_MS', 30000),
};

export default Object.freeze(config);

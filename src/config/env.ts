import { config } from 'dotenv';

// Load environment variables once
config();

export type LogLevel =
  | 'trace'
  | 'debug'
  | 'info'
  | 'warn'
  | 'error'
  | 'fatal'
  | 'silent';

export interface EnvironmentConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  LOG_LEVEL: LogLevel;
  AGENT_CONFIG_PATH: string;
  AUTO_START: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

const NODE_ENVS = ['development', 'production', 'test'] as const;

class EnvironmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvironmentError';
  }
}

function validateNodeEnv(
  value: string | undefined
): EnvironmentConfig['NODE_ENV'] {
  if (!value) {
    return 'development';
  }

  const match = NODE_ENVS.find(env => env === value);
  if (!match) {
    throw new EnvironmentError(
      `NODE_ENV must be one of: ${NODE_ENVS.join(', ')}. Got: ${value}`
    );
  }

  return match;
}

function validatePort(value: string | undefined): number {
  if (!value) {
    return 3000;
  }

  const port = parseInt(value, 10);

  if (isNaN(port)) {
    throw new EnvironmentError(`PORT must be a valid number. Got: ${value}`);
  }

  if (port < 1 || port > 65535) {
    throw new EnvironmentError(
      `PORT must be between 1 and 65535. Got: ${port}`
    );
  }

  return port;
}

function validateLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return 'info';
  }

  const match = LOG_LEVELS.find(level => level === value);
  if (!match) {
    throw new EnvironmentError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}. Got: ${value}`
    );
  }

  return match;
}

function validateBoolean(value: string | undefined, name: string): boolean {
  if (!value) {
    return false;
  }

  if (value !== 'true' && value !== 'false') {
    throw new EnvironmentError(`${name} must be true or false. Got: ${value}`);
  }

  return value === 'true';
}

function validateOptionalString(
  value: string | undefined,
  fallback: string
): string {
  return value || fallback;
}

let environmentConfig: EnvironmentConfig | null = null;

export function getEnvironmentConfig(): EnvironmentConfig {
  if (environmentConfig) {
    return environmentConfig;
  }

  try {
    environmentConfig = {
      NODE_ENV: validateNodeEnv(process.env['NODE_ENV']),
      PORT: validatePort(process.env['PORT']),
      HOST: validateOptionalString(process.env['HOST'], '0.0.0.0'),
      LOG_LEVEL: validateLogLevel(process.env['LOG_LEVEL']),
      AGENT_CONFIG_PATH: validateOptionalString(
        process.env['AGENT_CONFIG_PATH'],
        './config/agent.config.json'
      ),
      AUTO_START: validateBoolean(process.env['AUTO_START'], 'AUTO_START'),
    };

    return environmentConfig;
  } catch (error) {
    if (error instanceof EnvironmentError) {
      console.error(`Environment Configuration Error: ${error.message}`);
      console.error('Please check your environment variables and try again.');
      process.exit(1);
    }
    throw error;
  }
}

export { EnvironmentError };

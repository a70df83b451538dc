import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface FixConfig {
  renameTool: string;
}

export interface Config {
  logging: LoggingConfig;
  fix: FixConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'warn'),
    file: process.env.LOG_FILE,
  },
  fix: {
    renameTool: getEnvVar('DUSTAT_RENAME_TOOL', 'gopls'),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};

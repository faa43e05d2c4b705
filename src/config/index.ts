import dotenv from 'dotenv';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  auth: {
    tenantId: string;
    clientId: string;
    clientSecret: string;
    accessToken: string;
  };
  graph: {
    apiBaseUrl: string;
    loginBaseUrl: string;
  };
  http: {
    timeoutMs: number;
  };
  logging: {
    level: LogLevel;
  };
  storage: {
    exportOutputDir: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvVarAsLogLevel(key: string, defaultValue: LogLevel): LogLevel {
  const value = getEnvVar(key, defaultValue).toLowerCase();
  const level = LOG_LEVELS.find(candidate => candidate === value);
  if (!level) {
    throw new Error(`Environment variable ${key} must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export const config: Config = {
  auth: {
    tenantId: getEnvVar('TEAMS_TENANT_ID', ''),
    clientId: getEnvVar('TEAMS_CLIENT_ID', ''),
    clientSecret: getEnvVar('TEAMS_CLIENT_SECRET', ''),
    accessToken: getEnvVar('TEAMS_ACCESS_TOKEN', ''),
  },
  graph: {
    apiBaseUrl: getEnvVar('GRAPH_API_BASE_URL', 'https://graph.microsoft.com/beta'),
    loginBaseUrl: getEnvVar('LOGIN_BASE_URL', 'https://login.microsoftonline.com'),
  },
  http: {
    timeoutMs: getEnvVarAsNumber('HTTP_TIMEOUT_MS', 30000),
  },
  logging: {
    level: getEnvVarAsLogLevel('LOG_LEVEL', 'info'),
  },
  storage: {
    exportOutputDir: getEnvVar('EXPORT_OUTPUT_DIR', './exports'),
  },
};

export default config;

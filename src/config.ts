export interface AppConfig {
  dataFile: string;
  logLevel: string;
}

export const DEFAULT_DATA_FILE = 'grades.json';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    dataFile: env.GRADEBOOK_FILE || DEFAULT_DATA_FILE,
    logLevel: env.LOG_LEVEL || 'warn',
  };
}

// Environment configuration
//
//   LANGFOREST_MODEL  path of a model file used instead of the bundled asset
//   LOG_LEVEL         debug | info | warn | error (default info)
//   LOG_FORMAT        pretty | json (default pretty)

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';

export interface LangForestConfig {
  modelPath: string | undefined;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function getLogLevel(env: Env): LogLevel {
  const value = (env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(value) ? value : 'info';
}

function getLogFormat(env: Env): LogFormat {
  return env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'pretty';
}

export function loadConfig(env: Env = process.env): LangForestConfig {
  const modelPath = env.LANGFOREST_MODEL?.trim();
  return {
    modelPath: modelPath ? modelPath : undefined,
    logLevel: getLogLevel(env),
    logFormat: getLogFormat(env),
  };
}

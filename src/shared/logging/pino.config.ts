import { ConfigService } from '@nestjs/config';
import { Params } from 'nestjs-pino';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';

export interface LoggingSettings {
  serviceName: string;
  level: string;
  environment: string;
  version: string;
  logDir?: string;
}

/**
 * Read logging settings through ConfigService so values from .env apply
 */
export function loadLoggingSettings(config: ConfigService): LoggingSettings {
  return {
    serviceName:
      config.get<string>('SERVICE_NAME') || 'section-relevance-analyzer',
    level: config.get<string>('LOG_LEVEL') || 'info',
    environment: config.get<string>('NODE_ENV') || 'development',
    version: config.get<string>('APP_VERSION') || '0.1.0',
    logDir: config.get<string>('LOG_DIR') || undefined,
  };
}

function createStream(settings: LoggingSettings) {
  // Console output; stderr keeps stdout free for the interactive prompt
  const consoleStream =
    settings.environment !== 'production'
      ? pinoPretty({
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          singleLine: false,
          destination: 2,
        })
      : process.stderr;

  if (!settings.logDir) {
    return multistream([{ level: 'info', stream: consoleStream }]);
  }

  // File output with JSON formatting
  mkdirSync(settings.logDir, { recursive: true });
  return multistream([
    { level: 'info', stream: consoleStream },
    {
      level: 'debug',
      stream: createWriteStream(
        join(settings.logDir, `${settings.serviceName}.log`),
        { flags: 'a' },
      ),
    },
  ]);
}

export function createPinoConfig(settings: LoggingSettings): Params {
  return {
    pinoHttp: {
      level: settings.level,

      base: {
        service: settings.serviceName,
        environment: settings.environment,
        version: settings.version,
      },

      redact: {
        paths: ['apiKey', 'openAIApiKey', '*.apiKey', '*.openAIApiKey'],
        remove: true,
      },

      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

      stream: createStream(settings),
    },
  };
}

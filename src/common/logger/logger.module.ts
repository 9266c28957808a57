// winston.factory.ts
import { WinstonModuleOptions } from 'nest-winston';
import * as winston from 'winston';
import { EnvConfigService } from '../../config/env-config.service';
import * as fs from 'fs';
import * as path from 'path';

export type LogTag = 'SEED' | 'TRACE' | 'MERGE';

const TAG_PATTERN = /^\[(SEED|TRACE|MERGE)( WARNING| ERROR)?\]/;

function isStringMessage(
  info: winston.Logform.TransformableInfo,
): info is winston.Logform.TransformableInfo & { message: string } {
  return typeof info.message === 'string';
}

const customNestStyleFormat: winston.Logform.Format = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message }) => {
    return `[RiverRunner] ${String(timestamp)} ${String(level)} ${String(message)}`;
  }),
);

/** 태그가 붙은 메시지만 기록하는 파일 transport */
function taggedFileTransport(
  filename: string,
  level: 'info' | 'warn',
): winston.transport {
  return new winston.transports.File({
    filename,
    level,
    format: winston.format((info) =>
      isStringMessage(info) && TAG_PATTERN.test(info.message) ? info : false,
    )(),
  });
}

export function logFolderFor(logPath: string, today = new Date()): string {
  const dateStr = `${today.getFullYear()}${String(today.getMonth() + 1).padStart(2, '0')}${String(today.getDate()).padStart(2, '0')}`;
  return path.join(logPath, `${dateStr}_RIVER_RUNNER`, 'trace');
}

export function winstonLoggerFactory(
  envConfigService: EnvConfigService,
): WinstonModuleOptions {
  const traceLogDir = logFolderFor(envConfigService.logPath);
  fs.mkdirSync(traceLogDir, { recursive: true });

  const traceTransports: winston.transport[] = [
    taggedFileTransport(
      path.join(traceLogDir, envConfigService.traceLog),
      'info',
    ),
    taggedFileTransport(
      path.join(traceLogDir, envConfigService.traceErrorLog),
      'warn',
    ),
  ];

  const consoleTransport = new winston.transports.Console({
    format: customNestStyleFormat,
  });
  return {
    level: 'silly',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.label({ label: 'RiverRunner' }),
      winston.format.printf((info) => {
        const { timestamp, label, level } = info;
        const message = isStringMessage(info)
          ? info.message
          : JSON.stringify(info.message);
        return `[${String(label)}] ${String(timestamp)} ${String(level)}: ${String(message)}`;
      }),
    ),
    transports: [...traceTransports, consoleTransport],
  };
}

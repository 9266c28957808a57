import { Inject, Injectable } from '@nestjs/common';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import { LogTag } from '../logger/logger.module';

type LogLevel = 'info' | 'warn' | 'error';

@Injectable()
export class LoggingUtil {
  constructor(
    @Inject(WINSTON_MODULE_PROVIDER)
    private readonly logger: Logger,
  ) {}

  logSeed(message: string, level: LogLevel = 'info') {
    this.log('SEED', message, level);
  }

  logTrace(message: string, level: LogLevel = 'info') {
    this.log('TRACE', message, level);
  }

  logMerge(message: string, level: LogLevel = 'info') {
    this.log('MERGE', message, level);
  }

  startTimer(
    funcName: string,
    tag: LogTag,
  ): {
    end: () => void;
  } {
    const startTime = Date.now();
    const prefix = `[${tag}]`;

    this.logger.debug(`${prefix} Start ${funcName}`);

    return {
      end: () => {
        const duration = Date.now() - startTime;
        this.logger.info(`${prefix} ${funcName} took ${duration}ms`);
      },
    };
  }

  private log(tag: LogTag, message: string, level: LogLevel) {
    // [TRACE], [TRACE WARNING], [TRACE ERROR]
    const suffix =
      level === 'warn' ? ' WARNING' : level === 'error' ? ' ERROR' : '';
    this.logger[level](`[${tag}${suffix}] ${message}`);
  }
}

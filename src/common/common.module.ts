import { Module } from '@nestjs/common';
import { LoggingUtil } from './utils/logger.util';

@Module({
  providers: [LoggingUtil],
  exports: [LoggingUtil],
})
export class CommonModule {}

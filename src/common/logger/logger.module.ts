import { Global, Module } from '@nestjs/common';
import { WinstonModule } from 'nest-winston';
import { ConfigService } from '@nestjs/config';
import { buildWinstonOptions } from './winston.config';
import { LoggerService } from './logger.service';

/**
 * Global logger: every provider injects LoggerService and passes its
 * own class name as the context.
 */
@Global()
@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: buildWinstonOptions,
    }),
  ],
  providers: [LoggerService],
  exports: [LoggerService],
})
export class LoggerModule {}

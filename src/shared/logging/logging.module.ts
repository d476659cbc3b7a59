import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '../../config/config.module';
import { PinoLoggerService } from './pino-logger.service';
import { rootLoggerProvider } from './root-logger.provider';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [rootLoggerProvider, PinoLoggerService],
  exports: [PinoLoggerService],
})
export class LoggingModule {}

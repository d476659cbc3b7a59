import { Module } from '@nestjs/common';
import { HttpModule } from './http/http.module';
import { LoggingModule } from './logging/logging.module';

@Module({
  imports: [HttpModule, LoggingModule],
  exports: [HttpModule, LoggingModule],
})
export class SharedModule {}

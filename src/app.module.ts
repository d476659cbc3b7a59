import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { HarnessModule } from './harness/harness.module';

/**
 * Application Module
 * Integration harness for the translation pipeline: no HTTP server, one run per process
 */
@Module({
  imports: [ConfigModule, SharedModule, HarnessModule],
})
export class AppModule {}

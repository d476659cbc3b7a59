import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';
import {
  PROCESS_LAUNCHER_PORT,
  REPORTER_PORT,
  TRANSLATION_API_PORT,
} from '../application/ports/output/injection-tokens';

// Adapters (implementations)
import { TranslationApiHttpAdapter } from './adapters/http/translation-api-http.adapter';
import { ChildProcessLauncherAdapter } from './adapters/process/child-process-launcher.adapter';
import {
  REPORT_OUTPUT,
  StdoutReporterAdapter,
} from './adapters/reporting/stdout-reporter.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure modules (HTTP client, logging)
 * 2. Binds each port token to its adapter
 * 3. Exports the port tokens so use cases and the supervisor can inject them
 */
@Module({
  imports: [ConfigModule, LoggingModule, HttpModule],
  providers: [
    // Translation service
    {
      provide: TRANSLATION_API_PORT,
      useClass: TranslationApiHttpAdapter,
    },

    // Service processes
    {
      provide: PROCESS_LAUNCHER_PORT,
      useClass: ChildProcessLauncherAdapter,
    },

    // Report lines
    {
      provide: REPORT_OUTPUT,
      useValue: process.stdout,
    },
    {
      provide: REPORTER_PORT,
      useClass: StdoutReporterAdapter,
    },
  ],
  exports: [TRANSLATION_API_PORT, PROCESS_LAUNCHER_PORT, REPORTER_PORT],
})
export class InfrastructureModule {}

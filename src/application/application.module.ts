import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { SupervisorModule } from '../supervisor/supervisor.module';

// Use Cases
import {
  WaitUntilHealthyUseCase,
  SubmitTaskUseCase,
  PollTaskStatusUseCase,
  ResolveResultUseCase,
  RunIntegrationUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on output ports (tokens) and the process supervisor, never on
 * adapter classes. The implementations are bound by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule, SupervisorModule],
  providers: [
    WaitUntilHealthyUseCase,
    SubmitTaskUseCase,
    PollTaskStatusUseCase,
    ResolveResultUseCase,
    RunIntegrationUseCase,
  ],
  exports: [RunIntegrationUseCase],
})
export class ApplicationModule {}

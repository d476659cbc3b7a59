import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ProcessSupervisorService } from './process-supervisor.service';

@Module({
  imports: [ConfigModule, InfrastructureModule],
  providers: [ProcessSupervisorService],
  exports: [ProcessSupervisorService],
})
export class SupervisorModule {}

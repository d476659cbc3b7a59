import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { HarnessRunnerService } from './harness-runner.service';

@Module({
  imports: [ApplicationModule],
  providers: [HarnessRunnerService],
  exports: [HarnessRunnerService],
})
export class HarnessModule {}

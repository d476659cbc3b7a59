import { TaskHandle } from '../../../domain/entities/task-handle.entity';

/**
 * Submit Task Command
 */
export interface SubmitTaskCommand {
  filePath: string;
  targetLanguage: string;
  translateStyle: string;
  requestTimeoutMs: number;
}

/**
 * Submit Task Port (Driving Port / Use Case Interface)
 * Uploads the input file and obtains the task handle
 */
export interface SubmitTaskPort {
  execute(command: SubmitTaskCommand): Promise<TaskHandle>;
}

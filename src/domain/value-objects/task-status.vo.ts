/**
 * Task Status Value Object
 * Represents the status string the translation service reports for a task.
 *
 * The set is open: services add intermediate states (downloading, translating, ...)
 * without the harness knowing them. Only COMPLETED and FAILED are terminal.
 */
export enum TaskStatus {
  QUEUED = 'queued',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

const TERMINAL_STATUSES: readonly string[] = [TaskStatus.COMPLETED, TaskStatus.FAILED];

export class TaskStatusVO {
  private constructor(private readonly _value: string) {}

  /**
   * Keeps the reported value verbatim. Only the exact lowercase `completed` and
   * `failed` are terminal.
   */
  static fromString(value: string): TaskStatusVO {
    return new TaskStatusVO(value);
  }

  static queued(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.QUEUED);
  }

  static processing(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.PROCESSING);
  }

  static completed(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.COMPLETED);
  }

  static failed(): TaskStatusVO {
    return new TaskStatusVO(TaskStatus.FAILED);
  }

  get value(): string {
    return this._value;
  }

  isTerminal(): boolean {
    return TERMINAL_STATUSES.includes(this._value);
  }

  isCompleted(): boolean {
    return this._value === TaskStatus.COMPLETED;
  }

  isFailed(): boolean {
    return this._value === TaskStatus.FAILED;
  }

  equals(other: TaskStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

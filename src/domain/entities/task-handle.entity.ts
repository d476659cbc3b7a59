import { freeze } from 'immer';

/**
 * Task Handle Entity - identifies the one task a harness run submits
 *
 * Created once from the submission response and never changed afterwards:
 * the task id is the key for every later status and result request.
 */
export interface TaskHandle {
  readonly taskId: string;
  /** Status reported at submission time, recorded as-is */
  readonly initialStatus: string;
  readonly submittedAt: Date;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace TaskHandle {
  export interface CreateProps {
    taskId: string;
    initialStatus?: string;
    submittedAt?: Date;
  }

  export function create(props: CreateProps): TaskHandle {
    const taskId = props.taskId.trim();
    if (taskId.length === 0) {
      throw new Error('Task ID is required');
    }

    return freeze(
      {
        taskId,
        initialStatus: props.initialStatus ?? '',
        submittedAt: props.submittedAt ?? new Date(),
      },
      true,
    );
  }
}

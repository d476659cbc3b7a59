import { freeze } from 'immer';
import { TaskStatusVO } from '../value-objects/task-status.vo';

/**
 * Task Status Snapshot Entity - one observation of a task's progress
 *
 * The poller produces a new snapshot per request; snapshots are frozen and never
 * updated. Progress is expected to be non-decreasing across snapshots, but nothing
 * here enforces it: the harness reports what the service says.
 *
 * Same hybrid layout as the other entities: readonly data plus namespace functions.
 */
export interface TaskStatusSnapshotData {
  readonly taskId: string;
  readonly status: TaskStatusVO;
  /** Fraction in [0, 1] as reported; 0 when the service omits it */
  readonly progress: number;
  readonly processedFiles?: number;
  readonly totalFiles?: number;
  /** Only meaningful when the status is failed */
  readonly errorMessage?: string;
  readonly observedAt: Date;
}

export interface TaskStatusSnapshot extends TaskStatusSnapshotData {
  isTerminal(): boolean;
  isCompleted(): boolean;
  isFailed(): boolean;
  toJSON(): ReturnType<typeof TaskStatusSnapshot.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace TaskStatusSnapshot {
  export interface CreateProps {
    taskId: string;
    status: TaskStatusVO | string;
    progress?: number;
    processedFiles?: number;
    totalFiles?: number;
    errorMessage?: string;
    observedAt?: Date;
  }

  export function create(props: CreateProps): TaskStatusSnapshot {
    validate(props);

    const data: TaskStatusSnapshotData = {
      taskId: props.taskId,
      status:
        typeof props.status === 'string'
          ? TaskStatusVO.fromString(props.status)
          : props.status,
      progress: props.progress ?? 0,
      processedFiles: props.processedFiles,
      totalFiles: props.totalFiles,
      errorMessage: props.errorMessage,
      observedAt: props.observedAt ?? new Date(),
    };

    return freeze(attachMethods(data));
  }

  function attachMethods(data: TaskStatusSnapshotData): TaskStatusSnapshot {
    return {
      ...data,
      isTerminal: () => isTerminal(data),
      isCompleted: () => isCompleted(data),
      isFailed: () => isFailed(data),
      toJSON: () => toJSON(data),
    };
  }

  function validate(props: CreateProps): void {
    if (!props.taskId || props.taskId.trim().length === 0) {
      throw new Error('Task ID is required');
    }
    if (props.progress !== undefined && !Number.isFinite(props.progress)) {
      throw new Error('Progress must be a finite number');
    }
    for (const [field, count] of [
      ['processedFiles', props.processedFiles],
      ['totalFiles', props.totalFiles],
    ] as const) {
      if (count !== undefined && (!Number.isInteger(count) || count < 0)) {
        throw new Error(`${field} must be a non-negative integer`);
      }
    }
  }

  export function isTerminal(snapshot: TaskStatusSnapshotData): boolean {
    return snapshot.status.isTerminal();
  }

  export function isCompleted(snapshot: TaskStatusSnapshotData): boolean {
    return snapshot.status.isCompleted();
  }

  export function isFailed(snapshot: TaskStatusSnapshotData): boolean {
    return snapshot.status.isFailed();
  }

  export function toJSON(snapshot: TaskStatusSnapshotData) {
    return {
      taskId: snapshot.taskId,
      status: snapshot.status.toString(),
      progress: snapshot.progress,
      processedFiles: snapshot.processedFiles,
      totalFiles: snapshot.totalFiles,
      errorMessage: snapshot.errorMessage,
      observedAt: snapshot.observedAt.toISOString(),
    };
  }
}

/**
 * Wait Until Healthy Command
 */
export interface WaitUntilHealthyCommand {
  maxAttempts: number;
  intervalMs: number;
  requestTimeoutMs: number;
  /** Value the health body's `status` field must equal */
  readyValue: string;
}

/**
 * Wait Until Healthy Result
 */
export interface WaitUntilHealthyResult {
  attempts: number;
}

/**
 * Wait Until Healthy Port (Driving Port / Use Case Interface)
 * Blocks until the API reports ready or the attempt budget is spent
 */
export interface WaitUntilHealthyPort {
  /**
   * @throws HealthTimeoutError after maxAttempts probes without a ready answer
   */
  execute(command: WaitUntilHealthyCommand): Promise<WaitUntilHealthyResult>;
}

import { logger } from './logger.js';

type TrackedStatus = 'success' | 'error';

/**
 * Logs how long an operation took, escalating to warn past the slow threshold
 */
export class PerformanceTracker {
  private readonly startTime: number;

  constructor(
    private readonly operation: string,
    private readonly metadata?: Record<string, unknown>,
    private readonly slowThresholdMs = 2000
  ) {
    this.startTime = Date.now();
  }

  end(status: TrackedStatus = 'success', additionalMetadata?: Record<string, unknown>): number {
    const duration = Date.now() - this.startTime;
    const logData = {
      operation: this.operation,
      duration,
      status,
      ...this.metadata,
      ...additionalMetadata,
    };

    if (status === 'error') {
      logger.error(logData, `${this.operation} failed after ${duration}ms`);
    } else if (duration > this.slowThresholdMs) {
      logger.warn(logData, `${this.operation} completed slowly in ${duration}ms`);
    } else {
      logger.debug(logData, `${this.operation} completed in ${duration}ms`);
    }

    return duration;
  }
}

export async function trackAsync<T>(
  operation: string,
  fn: () => Promise<T>,
  metadata?: Record<string, unknown>
): Promise<T> {
  const tracker = new PerformanceTracker(operation, metadata);
  try {
    const result = await fn();
    tracker.end('success');
    return result;
  } catch (error) {
    tracker.end('error', { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}

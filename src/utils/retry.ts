/**
 * Retry and Circuit Breaker patterns for resilient Cortex REST calls
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
  timeoutMs: 50000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  success: boolean;
  error?: string;
  /** Absent on success and when no further attempt follows */
  nextRetryInMs?: number;
}

export interface RetryOptions {
  onLog?: (log: RetryLog) => void;
  /** Errors it rejects are rethrown immediately */
  shouldRetry?: (error: unknown) => boolean;
  /** Wait the server asked for, used instead of the backoff delay (still capped at maxDelayMs) */
  retryAfterMs?: (error: unknown) => number | undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Settle with `promise`, or reject once `ms` have passed
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `fn` until it succeeds, backing off exponentially between attempts
 * @throws the last error wrapped with the attempt count, or the first error `shouldRetry` rejects
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { onLog, shouldRetry = () => true, retryAfterMs } = options;
  let backoff = config.initialDelayMs;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await withTimeout(fn(), config.timeoutMs);
      onLog?.({ timestamp: new Date(), attempt, success: true });
      return result;
    } catch (error) {
      lastError = error;
      const retryable = shouldRetry(error);
      const willRetry = retryable && attempt < config.maxAttempts;
      const wait = Math.min(retryAfterMs?.(error) ?? backoff, config.maxDelayMs);

      onLog?.({
        timestamp: new Date(),
        attempt,
        success: false,
        error: errorMessage(error),
        nextRetryInMs: willRetry ? wait : undefined,
      });

      if (!retryable) {
        throw error;
      }
      if (!willRetry) {
        break;
      }

      await sleep(wait);
      backoff = Math.min(backoff * config.multiplier, config.maxDelayMs);
    }
  }

  throw new Error(`Failed after ${config.maxAttempts} attempts. Last error: ${errorMessage(lastError)}`, {
    cause: lastError,
  });
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitTransition {
  timestamp: Date;
  state: CircuitState;
  reason: string;
}

const HALF_OPEN_SUCCESSES_TO_CLOSE = 2;
const MAX_TRANSITIONS = 100;

export class CircuitOpenError extends Error {
  constructor(public readonly retryInMs: number) {
    super(`Circuit breaker is OPEN. The Cortex API is temporarily unavailable. Try again in ${retryInMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Stops calling the Cortex API for `resetTimeoutMs` after `failureThreshold`
 * failures; two successful trial calls close it again
 */
export class CircuitBreaker {
  private failureCount = 0;
  private trialSuccesses = 0;
  private openedAt: number | null = null;
  private state: CircuitState = 'closed';
  private transitions: CircuitTransition[] = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeoutMs: number = 60000
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const elapsed = Date.now() - (this.openedAt ?? 0);
      if (elapsed <= this.resetTimeoutMs) {
        throw new CircuitOpenError(this.resetTimeoutMs - elapsed);
      }
      this.trialSuccesses = 0;
      this.transition('half-open', 'Reset timeout reached');
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }

    if (this.state === 'half-open') {
      this.trialSuccesses++;
      if (this.trialSuccesses >= HALF_OPEN_SUCCESSES_TO_CLOSE) {
        this.failureCount = 0;
        this.transition('closed', 'Recovered from temporary failure');
      }
    } else {
      // Successes slowly pay back earlier failures
      this.failureCount = Math.max(0, this.failureCount - 1);
    }
    return result;
  }

  private recordFailure(): void {
    this.failureCount++;
    if (this.state === 'half-open') {
      this.open('Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.open(`Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private open(reason: string): void {
    this.openedAt = Date.now();
    this.transition('open', reason);
  }

  private transition(state: CircuitState, reason: string): void {
    this.state = state;
    this.transitions.push({ timestamp: new Date(), state, reason });
    if (this.transitions.length > MAX_TRANSITIONS) {
      this.transitions = this.transitions.slice(-MAX_TRANSITIONS);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      trialSuccesses: this.trialSuccesses,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt),
      transitions: this.transitions,
    };
  }

  reset(): void {
    this.failureCount = 0;
    this.trialSuccesses = 0;
    this.openedAt = null;
    this.transition('closed', 'Manual reset');
  }
}

const TRANSIENT_NETWORK_ERRORS = [
  'timeout',
  'econnrefused',
  'econnreset',
  'etimedout',
  'service unavailable',
  'temporarily unavailable',
  'getaddrinfo enotfound',
  'socket hang up',
];

/**
 * Check if an error message looks like a transient network failure
 */
export function isRetryableError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return TRANSIENT_NETWORK_ERRORS.some((pattern) => message.includes(pattern));
}

/**
 * Circuit Breaker for the Ollama server
 *
 * Shared by the language model and the embedding client: both talk to the
 * same local server, so an outage seen by one should stop the other too.
 *
 * Only transport-level failures (HTTP 429/5xx, refused or reset connections,
 * timeouts) count toward the threshold. A 4xx for an unknown model or a
 * malformed response is the caller's problem and leaves the state alone.
 *
 * @module services/llm/circuit-breaker
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

const NETWORK_ERROR_PATTERN =
  /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed|aborted|timed out/i;

function errorCode(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    return String(value.code);
  }
  return '';
}

/**
 * Whether an error is a server-side or transport failure.
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status === 429 || error.status >= 500;
  }

  const cause = error.cause;
  const causeMessage = cause instanceof Error ? cause.message : '';
  const combined = `${error.name} ${error.message} ${causeMessage} ${errorCode(cause)}`;

  if (/\b(429|500|502|503|504)\b/.test(combined)) {
    return true;
  }
  if (NETWORK_ERROR_PATTERN.test(combined) || /TimeoutError|AbortError/.test(combined)) {
    return true;
  }
  return /model.*(load|not ready)|service.?unavailable/i.test(combined);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 1,
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Run fn unless the circuit is open.
   *
   * @throws CircuitBreakerOpenError while OPEN
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === 'OPEN') {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Ollama circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state === 'OPEN' && this.lastFailureTime !== null) {
      if (Date.now() - this.lastFailureTime >= this.config.recoveryTimeMs) {
        console.error('[CircuitBreaker] OPEN -> HALF_OPEN');
        this.state = 'HALF_OPEN';
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, HALF_OPEN -> CLOSED');
        this.reset();
      }
      return;
    }
    this.failureCount = 0;
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      console.error(
        `[CircuitBreaker] ${this.state} -> OPEN after ${this.failureCount} failure(s), recovery in ${this.config.recoveryTimeMs}ms`
      );
      this.state = 'OPEN';
      this.successCount = 0;
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.config.recoveryTimeMs - (Date.now() - this.lastFailureTime));
  }

  isOpen(): boolean {
    this.checkRecovery();
    return this.state === 'OPEN';
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === 'OPEN' ? this.getTimeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
  }
}

/**
 * Thrown instead of calling the server while the circuit is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}

/**
 * Stops calls to the status page once it keeps failing, so an outage of the
 * backend does not hold every alert batch for the full retry budget. After
 * `recoveryTimeout` one call is let through; its outcome closes or reopens
 * the circuit.
 */

export interface CircuitBreakerConfig {
  failureThreshold: number; // consecutive failures
  recoveryTimeout: number; // ms
  // Errors for which this returns false pass through without counting (e.g. 4xx answers)
  isFailure?: (error: unknown) => boolean;
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export class CircuitOpenError extends Error {
  constructor() {
    super('Circuit breaker is OPEN - service unavailable');
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private nextAttemptTime = 0;

  constructor(private config: CircuitBreakerConfig) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() < this.nextAttemptTime) {
        throw new CircuitOpenError();
      }
      this.state = CircuitState.HALF_OPEN;
      console.log('Circuit breaker HALF_OPEN, letting one status page call through');
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.config.isFailure && !this.config.isFailure(error)) {
        // The backend answered; it is reachable
        this.onSuccess();
      } else {
        this.onFailure();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;
    if (this.state === CircuitState.HALF_OPEN) {
      this.state = CircuitState.CLOSED;
      console.log('Circuit breaker CLOSED, status page reachable again');
    }
  }

  private onFailure(): void {
    this.failureCount++;

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.state = CircuitState.OPEN;
      this.nextAttemptTime = Date.now() + this.config.recoveryTimeout;
      console.log(`Circuit breaker OPEN after ${this.failureCount} failed status page calls`);
    }
  }

  getStatus(): { state: CircuitState; failureCount: number } {
    return { state: this.state, failureCount: this.failureCount };
  }
}

export const BACKEND_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeout: 30000,
};

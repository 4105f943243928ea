/**
 * Circuit Breaker
 *
 * Wraps calls to external collaborators (registration lookup, text classifier,
 * QR codec). After repeated failures the circuit opens and calls fail fast
 * until the reset timeout elapses; nothing is retried automatically.
 */

import { CircuitOpenError, OperationTimeoutError } from '@/lib/errors';
import { loggers, type Logger } from '@/lib/logging/logger';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold?: number;
  successThreshold?: number;
  timeout?: number; // ms
  resetTimeout?: number; // ms
  onOpen?: (event: CircuitEvent) => void;
  onClose?: (event: CircuitEvent) => void;
  onHalfOpen?: (event: CircuitEvent) => void;
  logger?: Logger;
}

export interface CircuitEvent {
  name: string;
  state: CircuitState;
  timestamp: Date;
  stats: CircuitBreakerStats;
}

export interface CircuitBreakerStats {
  successCount: number;
  failureCount: number;
  rejectedCount: number;
  timeoutCount: number;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  successRate: number;
  stateTransitions: number;
  lastFailure?: Date;
  lastSuccess?: Date;
}

type Thresholds = Required<Pick<CircuitBreakerConfig, 'failureThreshold' | 'successThreshold' | 'timeout' | 'resetTimeout'>>;

/**
 * Operation run under a breaker. The signal fires on timeout or caller abort.
 */
export type GuardedOperation<T> = (signal: AbortSignal) => Promise<T>;

export class CircuitBreaker {
  private readonly name: string;
  private state: CircuitState = CircuitState.CLOSED;
  private readonly thresholds: Thresholds;
  private readonly hooks: Pick<CircuitBreakerConfig, 'onOpen' | 'onClose' | 'onHalfOpen'>;
  private readonly logger: Logger;
  private stats: CircuitBreakerStats;
  private lastStateChange: number = Date.now();
  private stateTransitionCount = 0;

  constructor(name: string, config: CircuitBreakerConfig = {}) {
    if (!name || name.trim() === '') {
      throw new Error('Circuit name is required');
    }

    if (
      (config.failureThreshold !== undefined && config.failureThreshold <= 0) ||
      (config.successThreshold !== undefined && config.successThreshold <= 0) ||
      (config.timeout !== undefined && config.timeout <= 0) ||
      (config.resetTimeout !== undefined && config.resetTimeout <= 0)
    ) {
      throw new Error('Invalid configuration');
    }

    this.name = name;
    this.thresholds = {
      failureThreshold: config.failureThreshold ?? 5,
      successThreshold: config.successThreshold ?? 2,
      timeout: config.timeout ?? 30000,
      resetTimeout: config.resetTimeout ?? 60000,
    };
    this.hooks = { onOpen: config.onOpen, onClose: config.onClose, onHalfOpen: config.onHalfOpen };
    this.logger = (config.logger ?? loggers.resilience).child({ circuit: name });
    this.stats = this.createEmptyStats();
  }

  getState(): CircuitState {
    if (this.state === CircuitState.OPEN) {
      const elapsed = Date.now() - this.lastStateChange;
      if (elapsed >= this.thresholds.resetTimeout) {
        this.transitionTo(CircuitState.HALF_OPEN);
      }
    }
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    const total = this.stats.successCount + this.stats.failureCount;
    return {
      ...this.stats,
      successRate: total > 0 ? this.stats.successCount / total : 0,
      stateTransitions: this.stateTransitionCount,
    };
  }

  /**
   * Run `fn` under the breaker. A caller abort rejects with the abort reason
   * and does not count as a failure of the guarded service.
   */
  async execute<T>(fn: GuardedOperation<T>, signal?: AbortSignal): Promise<T> {
    if (this.getState() === CircuitState.OPEN) {
      this.stats.rejectedCount++;
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await this.executeWithTimeout(fn, signal);
      this.recordSuccess();
      return result;
    } catch (error) {
      if (!signal?.aborted) {
        this.recordFailure(error);
      }
      throw error;
    }
  }

  private executeWithTimeout<T>(fn: GuardedOperation<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();

    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      let completed = false;

      const finish = (): boolean => {
        if (completed) return false;
        completed = true;
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
        return true;
      };

      const onAbort = (): void => {
        if (finish()) {
          controller.abort(signal?.reason);
          reject(signal?.reason);
        }
      };

      const timeoutId = setTimeout(() => {
        if (finish()) {
          this.stats.timeoutCount++;
          const timeoutError = new OperationTimeoutError(this.name, this.thresholds.timeout);
          controller.abort(timeoutError);
          reject(timeoutError);
        }
      }, this.thresholds.timeout);

      signal?.addEventListener('abort', onAbort, { once: true });

      fn(controller.signal).then(
        (result) => {
          if (finish()) resolve(result);
        },
        (error: unknown) => {
          if (finish()) reject(error);
        }
      );
    });
  }

  private recordSuccess(): void {
    this.stats.successCount++;
    this.stats.consecutiveSuccesses++;
    this.stats.consecutiveFailures = 0;
    this.stats.lastSuccess = new Date();

    if (this.state === CircuitState.HALF_OPEN && this.stats.consecutiveSuccesses >= this.thresholds.successThreshold) {
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  private recordFailure(error: unknown): void {
    this.stats.failureCount++;
    this.stats.consecutiveFailures++;
    this.stats.consecutiveSuccesses = 0;
    this.stats.lastFailure = new Date();

    this.logger.debug('Guarded call failed', {
      consecutiveFailures: this.stats.consecutiveFailures,
      cause: error instanceof Error ? error.message : String(error),
    });

    if (this.state === CircuitState.HALF_OPEN) {
      // any failure while probing reopens
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.stats.consecutiveFailures >= this.thresholds.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    if (oldState === newState) return;

    this.state = newState;
    this.lastStateChange = Date.now();
    this.stateTransitionCount++;

    if (newState === CircuitState.HALF_OPEN) {
      this.stats.consecutiveSuccesses = 0;
    }

    const event: CircuitEvent = {
      name: this.name,
      state: newState,
      timestamp: new Date(),
      stats: this.getStats(),
    };

    const logMeta = { from: oldState, to: newState };
    if (newState === CircuitState.OPEN) {
      this.logger.warn('Circuit opened', logMeta);
      this.hooks.onOpen?.(event);
    } else if (newState === CircuitState.CLOSED) {
      this.logger.info('Circuit closed', logMeta);
      this.hooks.onClose?.(event);
    } else {
      this.logger.info('Circuit half-open', logMeta);
      this.hooks.onHalfOpen?.(event);
    }
  }

  private createEmptyStats(): CircuitBreakerStats {
    return {
      successCount: 0,
      failureCount: 0,
      rejectedCount: 0,
      timeoutCount: 0,
      consecutiveFailures: 0,
      consecutiveSuccesses: 0,
      successRate: 0,
      stateTransitions: 0,
    };
  }
}

/**
 * One breaker per external service, shared by every analysis in the process
 */
export class CircuitBreakerRegistry {
  private readonly circuits: Map<string, CircuitBreaker> = new Map();
  private readonly defaults: CircuitBreakerConfig;

  constructor(defaults: CircuitBreakerConfig = {}) {
    this.defaults = defaults;
  }

  getOrCreate(name: string, config?: CircuitBreakerConfig): CircuitBreaker {
    let circuit = this.circuits.get(name);
    if (!circuit) {
      circuit = new CircuitBreaker(name, { ...this.defaults, ...config });
      this.circuits.set(name, circuit);
    }
    return circuit;
  }
}

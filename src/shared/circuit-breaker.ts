// Circuit Breaker System
// Stops hammering a failing pipeline stage and serves its fallback instead

import logger from './logger';

export interface CircuitBreakerState {
  name: string;
  isOpen: boolean;
  openAt: Date | null;
  lastError: Date | null;
  errorCount: number;
  successCount: number;
  threshold: number; // Errors before opening
  timeout: number; // ms to wait before attempting recovery
}

/**
 * Circuit Breaker System
 * Protects the blog pipeline from cascading failures across scheduled runs
 */
export class CircuitBreakerSystem {
  private breakers: Map<string, CircuitBreakerState> = new Map();

  constructor() {
    this.initializeDefaultBreakers();
  }

  private initializeDefaultBreakers(): void {
    this.registerBreaker('blog-execution', { threshold: 5, timeout: 60000 });

    // Blog pipeline nodes
    this.registerBreaker('fetch', { threshold: 3, timeout: 60000 });
    this.registerBreaker('topics', { threshold: 4, timeout: 60000 });
    this.registerBreaker('filter', { threshold: 4, timeout: 30000 });
    this.registerBreaker('image', { threshold: 3, timeout: 120000 });
    this.registerBreaker('research', { threshold: 4, timeout: 60000 });
    this.registerBreaker('content', { threshold: 4, timeout: 60000 });
    this.registerBreaker('render', { threshold: 5, timeout: 30000 });
    this.registerBreaker('publish', { threshold: 3, timeout: 120000 });
  }

  registerBreaker(name: string, config: { threshold: number; timeout: number }): void {
    this.breakers.set(name, {
      name,
      isOpen: false,
      openAt: null,
      lastError: null,
      errorCount: 0,
      successCount: 0,
      threshold: config.threshold,
      timeout: config.timeout,
    });

    logger.debug(
      `[CircuitBreaker] Registered breaker: ${name} (threshold: ${config.threshold}, timeout: ${config.timeout}ms)`
    );
  }

  /**
   * Execute a function with circuit breaker protection
   */
  async execute<T>(
    breakerName: string,
    fn: () => Promise<T>,
    fallback?: () => T | Promise<T>
  ): Promise<T> {
    const breaker = this.breakers.get(breakerName);

    if (!breaker) {
      logger.warn(`[CircuitBreaker] Unknown breaker: ${breakerName}, executing without protection`);
      return fn();
    }

    if (breaker.isOpen) {
      if (this.isBlocking(breakerName)) {
        logger.warn(`[CircuitBreaker] ${breakerName} is OPEN, blocking execution`);

        if (fallback) {
          return fallback();
        }

        throw new Error(`Circuit breaker ${breakerName} is OPEN`);
      }

      // Half-open
      logger.info(`[CircuitBreaker] ${breakerName} attempting recovery`);
    }

    try {
      const result = await fn();
      this.onSuccess(breakerName);
      return result;
    } catch (error) {
      this.onError(breakerName, error);

      if (fallback) {
        logger.warn(`[CircuitBreaker] ${breakerName} failed, using fallback`);
        return fallback();
      }

      throw error;
    }
  }

  private onSuccess(breakerName: string): void {
    const breaker = this.breakers.get(breakerName);
    if (!breaker) return;

    breaker.successCount++;

    if (!breaker.isOpen) {
      // Threshold counts consecutive failures
      breaker.errorCount = 0;
      return;
    }

    if (breaker.successCount >= 3) {
      breaker.isOpen = false;
      breaker.openAt = null;
      breaker.errorCount = 0;
      breaker.successCount = 0;
      logger.info(`[CircuitBreaker] ${breakerName} circuit CLOSED after successful recovery`);
    }
  }

  private onError(breakerName: string, error: unknown): void {
    const breaker = this.breakers.get(breakerName);
    if (!breaker) return;

    breaker.errorCount++;
    breaker.lastError = new Date();

    const errorMsg = error instanceof Error ? error.message : String(error);

    if (breaker.errorCount >= breaker.threshold && !breaker.isOpen) {
      breaker.isOpen = true;
      breaker.openAt = new Date();
      breaker.successCount = 0;

      logger.error(
        `[CircuitBreaker] ${breakerName} circuit OPENED after ${breaker.errorCount} errors: ${errorMsg}`
      );
    } else if (breaker.isOpen) {
      // Failed half-open attempt restarts the timeout
      breaker.openAt = new Date();
      breaker.successCount = 0;
    }
  }

  getBreakerStatus(name: string): CircuitBreakerState | undefined {
    return this.breakers.get(name);
  }

  /**
   * True while the breaker is open and its timeout has not elapsed. After the
   * timeout the next call is a half-open trial.
   */
  isBlocking(name: string): boolean {
    const breaker = this.breakers.get(name);
    if (!breaker?.isOpen) return false;
    const timeSinceOpen = breaker.openAt ? Date.now() - breaker.openAt.getTime() : 0;
    return timeSinceOpen < breaker.timeout;
  }

  resetBreaker(name: string): boolean {
    const breaker = this.breakers.get(name);
    if (!breaker) return false;

    breaker.isOpen = false;
    breaker.openAt = null;
    breaker.errorCount = 0;
    breaker.successCount = 0;

    logger.info(`[CircuitBreaker] Reset breaker: ${name}`);
    return true;
  }

  /**
   * Manually open a circuit breaker (for emergency)
   */
  openBreaker(name: string): boolean {
    const breaker = this.breakers.get(name);
    if (!breaker) return false;

    breaker.isOpen = true;
    breaker.openAt = new Date();

    logger.warn(`[CircuitBreaker] Manually opened breaker: ${name}`);
    return true;
  }
}

// Singleton instance
const circuitBreaker = new CircuitBreakerSystem();

export default circuitBreaker;

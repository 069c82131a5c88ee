import { CircuitOpenError } from '@/errors/collab.errors';
import { Clock } from './clock';
import logger from './pinoLogger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
    name : string;
    failureThreshold : number;
    recoveryMs : number;
    clock : Clock;
}

/**
 * CLOSED until `failureThreshold` consecutive failures, then OPEN. After
 * `recoveryMs` it lets calls through as HALF_OPEN: one success closes it,
 * one failure opens it again.
 */
export class CircuitBreaker {
    readonly name : string;
    #_failureThreshold : number;
    #_recoveryMs : number;
    #_clock : Clock;
    #_state : CircuitState = 'CLOSED';
    #_failureCount = 0;
    #_openedAt = 0;

    constructor(options : CircuitBreakerOptions) {
        this.name = options.name;
        this.#_failureThreshold = options.failureThreshold;
        this.#_recoveryMs = options.recoveryMs;
        this.#_clock = options.clock;
    }

    get state() : CircuitState {
        if (this.#_state === 'OPEN' && this.#_clock.now() - this.#_openedAt >= this.#_recoveryMs) {
            this.transition('HALF_OPEN');
        }
        return this.#_state;
    }

    get failureCount() : number {
        return this.#_failureCount;
    }

    allowRequest() : boolean {
        return this.state !== 'OPEN';
    }

    recordSuccess() : void {
        this.#_failureCount = 0;
        if (this.#_state !== 'CLOSED') this.transition('CLOSED');
    }

    recordFailure() : void {
        this.#_failureCount += 1;
        if (this.#_state === 'HALF_OPEN' || this.#_failureCount >= this.#_failureThreshold) {
            this.#_openedAt = this.#_clock.now();
            if (this.#_state !== 'OPEN') this.transition('OPEN');
        }
    }

    async execute<T>(task : () => Promise<T>) : Promise<T> {
        if (!this.allowRequest()) {
            throw new CircuitOpenError(this.name);
        }
        try {
            const result = await task();
            this.recordSuccess();
            return result;
        } catch (error) {
            this.recordFailure();
            throw error;
        }
    }

    private transition(next : CircuitState) : void {
        logger.info(`Circuit ${this.name}: ${this.#_state} -> ${next}`, { failureCount : this.#_failureCount });
        this.#_state = next;
    }
}

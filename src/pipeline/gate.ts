import { debug } from './log';

/**
 * Best-effort semaphore bounding concurrent calls to a shared external capability
 * across every pipeline of a batch. A limit of 0 (or less) disables the gate.
 */
export class ConcurrencyGate {
    private active = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(readonly limit: number, readonly name = 'gate') {}

    get inFlight(): number {
        return this.active;
    }

    get queued(): number {
        return this.waiters.length;
    }

    async acquire(): Promise<void> {
        if (!this.limit || this.limit <= 0) return;
        if (this.active < this.limit) {
            this.active++;
            debug(`${this.name}.acquire`, { active: this.active, limit: this.limit });
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiters.push(() => {
                this.active++;
                debug(`${this.name}.acquire.waited`, { active: this.active, limit: this.limit });
                resolve();
            });
        });
    }

    release(): void {
        if (!this.limit || this.limit <= 0) return;
        this.active = Math.max(0, this.active - 1);
        const next = this.waiters.shift();
        if (next) next(); else debug(`${this.name}.release`, { active: this.active, limit: this.limit });
    }

    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}

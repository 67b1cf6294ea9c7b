const TAG = '[poller]';

export interface PollerConfig<T> {
    /** Shown in log lines, e.g. "instances" or "queue:work-items". */
    name: string;
    fetch: (batchSize: number) => Promise<T[]>;
    onReceived: (item: T) => Promise<void>;
    batchSize?: number;
    checkBackpressure?: () => boolean;
}

/**
 * Adaptive polling loop: immediately again after a non-empty batch, backing
 * off 100 → 200 → 400 → 500ms while idle. Items are handed off without
 * waiting for them to finish.
 */
export class Poller<T> {
    private interval = 100;
    private readonly minInterval = 100;
    private readonly maxInterval = 500;
    private readonly batchSize: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly name: string;
    private readonly fetch: (batchSize: number) => Promise<T[]>;
    private readonly onReceived: (item: T) => Promise<void>;
    private readonly checkBackpressure?: () => boolean;

    constructor(config: PollerConfig<T>) {
        this.name = config.name;
        this.fetch = config.fetch;
        this.onReceived = config.onReceived;
        this.batchSize = config.batchSize || 10;
        this.checkBackpressure = config.checkBackpressure;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} ${this.name} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} ${this.name} started (batch: ${this.batchSize})`);
        void this.poll();
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} ${this.name} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} ${this.name} backpressure detected, skipping poll`);
            if (this.running) {
                this.currentTimeout = setTimeout(() => void this.poll(), 1000);
            }
            return;
        }

        try {
            const items = await this.fetch(this.batchSize);

            if (items.length > 0) {
                this.interval = this.minInterval;
                for (const item of items) {
                    this.onReceived(item).catch(
                        err => console.error(`${TAG} ${this.name} callback error:`, err),
                    );
                }
            } else {
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
        } catch (err) {
            console.error(`${TAG} ${this.name} fetch error:`, err);
            this.interval = this.maxInterval;
        }

        if (this.running) {
            this.currentTimeout = setTimeout(() => void this.poll(), this.interval);
        }
    }
}

import { monitorEventLoopDelay, IntervalHistogram } from 'perf_hooks';

const TAG = '[backpressure]';

export interface BackpressureOptions {
    maxQueueSize: number;
    maxEventLoopLag: number;
    queueSize: () => number;
    /** Event-loop lag source in ms; defaults to the p99 of a perf_hooks histogram. */
    lag?: () => number;
}

/** Tells the instance poller to stop claiming work when the host is saturated. */
export class Backpressure {
    private readonly histogram: IntervalHistogram | null = null;
    private readonly lag: () => number;

    constructor(private readonly options: BackpressureOptions) {
        if (options.lag) {
            this.lag = options.lag;
        } else {
            const histogram = monitorEventLoopDelay({ resolution: 10 });
            histogram.enable();
            this.histogram = histogram;
            this.lag = () => histogram.percentile(99) / 1_000_000;
        }
    }

    check(): boolean {
        const queueSize = this.options.queueSize();
        if (queueSize >= this.options.maxQueueSize) {
            console.warn(`${TAG} activity queue size ${queueSize} >= ${this.options.maxQueueSize}`);
            return true;
        }

        const lag = this.lag();
        if (lag >= this.options.maxEventLoopLag) {
            console.warn(`${TAG} event loop lag ${lag.toFixed(2)}ms >= ${this.options.maxEventLoopLag}ms`);
            return true;
        }
        return false;
    }

    disable(): void {
        this.histogram?.disable();
    }
}

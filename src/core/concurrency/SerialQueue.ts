import logger from '../../logger';

interface QueuedTask {
    label: string;
    execute: () => Promise<void>;
}

/**
 * Runs enqueued operations one at a time, in submission order.
 */
export class SerialQueue {
    private queue: QueuedTask[] = [];
    private isProcessing = false;

    constructor(private readonly name: string = 'SerialQueue') { }

    get pending(): number {
        return this.queue.length;
    }

    enqueue<T>(label: string, run: () => T | Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.queue.push({
                label,
                execute: async () => {
                    try {
                        resolve(await run());
                    } catch (error) {
                        logger.error(`[${this.name}] Task failed: ${label}`, error);
                        reject(error);
                    }
                }
            });
            void this.processNext();
        });
    }

    private async processNext() {
        if (this.isProcessing || this.queue.length === 0) return;

        this.isProcessing = true;
        const task = this.queue.shift();
        if (!task) {
            this.isProcessing = false;
            return;
        }

        try {
            await task.execute();
        } finally {
            this.isProcessing = false;
            void this.processNext();
        }
    }
}

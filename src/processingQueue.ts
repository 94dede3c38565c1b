import logger from './logger.js';

type Task = (callback: (err: unknown) => void) => void;

/**
 * FIFO of callback-style tasks; a task starts only after the previous one called back.
 */
export class ProcessingQueue {
    private queue: Task[] = [];
    private processing = false;

    push(f: Task = cb => cb(null)): void {
        this.queue.push(f);
        if (!this.processing) {
            this.processing = true;
            this.execute();
        }
    }

    /** Queues an async task and resolves with its result once it has run. */
    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.push(callback => {
                task().then(
                    result => {
                        resolve(result);
                        callback(null);
                    },
                    (error: unknown) => {
                        reject(error);
                        callback(error);
                    }
                );
            });
        });
    }

    get busy(): boolean {
        return this.processing;
    }

    private execute(): void {
        const first = this.queue.shift();
        if (first) {
            first((err: unknown) => {
                if (err) {
                    logger.error('Error in ProcessingQueue task:', err);
                }
                if (this.queue.length > 0) {
                    this.execute();
                } else {
                    this.processing = false;
                }
            });
        } else {
            this.processing = false;
        }
    }
}

export default ProcessingQueue;

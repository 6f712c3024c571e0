export class Semaphore {
    private _available: number;
    private readonly _waiting: Array<() => void> = [];

    constructor(size: number) {
        if (!Number.isInteger(size) || size < 1) {
            throw new RangeError(`semaphore size must be a positive integer, got ${ size }`);
        }

        this._available = size;
    }

    public get available(): number {
        return this._available;
    }

    public get waiting(): number {
        return this._waiting.length;
    }

    public acquire(): Promise<void> {
        if (this._available > 0) {
            this._available--;
            return Promise.resolve();
        }

        return new Promise((resolve) => {
            this._waiting.push(resolve);
        });
    }

    // The slot passes straight to the next waiter, so admission stays FIFO.
    public release(): void {
        const next = this._waiting.shift();

        if (next) next();
        else this._available++;
    }

    public async use<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();

        try {
            return await task();
        } finally {
            this.release();
        }
    }
}

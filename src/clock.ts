/**
 * Monotonic time source consumed by reward accrual.
 * Values are whole units (seconds for the wall clock, heights for a block counter).
 */
export interface Clock {
    now(): number;
}

/**
 * Whole seconds of wall time. Never returns less than a value it already returned,
 * so a system clock stepping backwards cannot produce a negative accrual interval.
 */
export class SystemClock implements Clock {
    private last = 0;

    now(): number {
        const current = Math.floor(Date.now() / 1000);
        if (current > this.last) this.last = current;
        return this.last;
    }

    /** Never return less than `floor`, e.g. the latest checkpoint loaded from storage. */
    raiseFloor(floor: number): void {
        if (floor > this.last) this.last = floor;
    }
}

/**
 * Clock advanced by hand. Used by tests and by replays that feed recorded heights.
 */
export class ManualClock implements Clock {
    constructor(private current = 0) {}

    now(): number {
        return this.current;
    }

    set(value: number): void {
        if (value < this.current) {
            throw new Error(`Clock cannot move backwards from ${this.current} to ${value}`);
        }
        this.current = value;
    }

    advance(delta: number): void {
        this.set(this.current + delta);
    }
}

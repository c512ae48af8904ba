import type { TimeOfDay } from '../utils/time-utils';

/** Discrete simulated time. One tick moves a vehicle by one distance sub-unit. */
export class Clock {
    private current: TimeOfDay;

    constructor(
        readonly startTime: TimeOfDay,
        readonly tickSeconds: number,
    ) {
        this.current = startTime;
    }

    now(): TimeOfDay {
        return this.current;
    }

    advance(): void {
        this.current += this.tickSeconds;
    }

    /** Time after `ticks` further ticks, without moving the clock */
    project(ticks: number): TimeOfDay {
        return this.current + ticks * this.tickSeconds;
    }
}

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should advance by one increment per tick', () => {
        const clock = new Clock(28800, 20);
        clock.advance();
        clock.advance();
        expect(clock.now()).toBe(28840);
    });

    test('should project without mutating', () => {
        const clock = new Clock(28800, 20);
        expect(clock.project(45)).toBe(29700);
        expect(clock.now()).toBe(28800);
    });
}

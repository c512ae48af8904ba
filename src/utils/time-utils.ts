import { SIMULATION_ERRORS, SimulationError } from '../errors';

/** Seconds since midnight of the simulated day */
export type TimeOfDay = number;

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

const MERIDIEM_PATTERN = /^(\d{1,2}):(\d{2})\s*(AM|PM)$/i;
const TWENTY_FOUR_HOUR_PATTERN = /^(\d{1,2}):(\d{2})$/;

export class TimeUtils {
    static fromHoursMinutes(hours: number, minutes: number, seconds: number = 0): TimeOfDay {
        return hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds;
    }

    /** Parse `H:MM AM` / `HH:MM PM` */
    static parseMeridiem(text: string): TimeOfDay {
        const match = MERIDIEM_PATTERN.exec(text.trim());
        if (!match) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_TIME, `Invalid time "${text}", expected H:MM AM/PM`);
        }

        let hours = Number.parseInt(match[1]);
        const minutes = Number.parseInt(match[2]);
        const meridiem = match[3].toUpperCase();

        if (hours < 1 || hours > 12 || minutes > 59) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_TIME, `Invalid time "${text}"`);
        }

        if (hours !== 12 && meridiem === 'PM') {
            hours += 12;
        }
        if (hours === 12 && meridiem === 'AM') {
            hours = 0;
        }

        return this.fromHoursMinutes(hours, minutes);
    }

    /** Parse 24-hour `HH:MM` */
    static parse24Hour(text: string): TimeOfDay {
        const match = TWENTY_FOUR_HOUR_PATTERN.exec(text.trim());
        if (!match) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_TIME, `Invalid time "${text}", expected HH:MM`);
        }

        const hours = Number.parseInt(match[1]);
        const minutes = Number.parseInt(match[2]);

        if (hours > 23 || minutes > 59) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_TIME, `Invalid time "${text}"`);
        }

        return this.fromHoursMinutes(hours, minutes);
    }

    /** Format as `HH:MM:SS` */
    static format(time: TimeOfDay): string {
        const normalized = ((time % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
        const hours = Math.floor(normalized / SECONDS_PER_HOUR);
        const minutes = Math.floor((normalized % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
        const seconds = normalized % SECONDS_PER_MINUTE;

        return [hours, minutes, seconds].map(part => part.toString().padStart(2, '0')).join(':');
    }
}

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('TimeUtils.parseMeridiem', () => {
        test('should parse morning and afternoon times', () => {
            expect(TimeUtils.parseMeridiem('9:05 AM')).toBe(32700);
            expect(TimeUtils.parseMeridiem('10:30 am')).toBe(37800);
            expect(TimeUtils.parseMeridiem('5:00 PM')).toBe(61200);
        });

        test('should treat 12 AM as midnight and 12 PM as noon', () => {
            expect(TimeUtils.parseMeridiem('12:00 AM')).toBe(0);
            expect(TimeUtils.parseMeridiem('12:30 PM')).toBe(45000);
        });

        test('should reject malformed text', () => {
            expect(() => TimeUtils.parseMeridiem('9.05 AM')).toThrowError(SimulationError);
            expect(() => TimeUtils.parseMeridiem('13:00 PM')).toThrowError(SimulationError);
            expect(() => TimeUtils.parseMeridiem('9:75 AM')).toThrowError(SimulationError);
            expect(() => TimeUtils.parseMeridiem('')).toThrowError(SimulationError);
        });
    });

    describe('TimeUtils.parse24Hour', () => {
        test('should parse valid times', () => {
            expect(TimeUtils.parse24Hour('08:00')).toBe(28800);
            expect(TimeUtils.parse24Hour('23:59')).toBe(86340);
        });

        test('should reject out-of-range values', () => {
            expect(() => TimeUtils.parse24Hour('24:00')).toThrowError(SimulationError);
            expect(() => TimeUtils.parse24Hour('8')).toThrowError(SimulationError);
        });
    });

    describe('TimeUtils.format', () => {
        test('should zero-pad every component', () => {
            expect(TimeUtils.format(32700)).toBe('09:05:00');
            expect(TimeUtils.format(TimeUtils.fromHoursMinutes(14, 7, 20))).toBe('14:07:20');
        });
    });
}

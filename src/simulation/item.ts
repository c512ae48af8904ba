import { SIMULATION_ERRORS, SimulationError, isSimulationError } from '../errors';
import type { ItemRecord } from '../types/records';
import type { Deadline, Item, ItemStatus } from '../types/simulation';
import { TimeUtils, type TimeOfDay } from '../utils/time-utils';

const END_OF_DAY_LABEL = 'EOD';
const RESTRICTION_PATTERN = /^truck\s+(\d+)\s+only$/i;

export const parseDeadline = (text: string, endOfDay: TimeOfDay): Deadline => {
    const label = text.trim();

    if (label.toUpperCase() === END_OF_DAY_LABEL) {
        return { time: endOfDay, label: END_OF_DAY_LABEL, endOfDay: true };
    }

    try {
        return { time: TimeUtils.parseMeridiem(label), label, endOfDay: false };
    } catch (error) {
        if (isSimulationError(error, SIMULATION_ERRORS.INVALID_TIME)) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_DEADLINE, `Invalid deadline "${text}"`, {
                cause: error,
            });
        }
        throw error;
    }
};

export const parseStatus = (text: string): ItemStatus => {
    switch (text.trim().toLowerCase()) {
        case '':
        case 'at hub':
        case 'at package hub':
            return { type: 'at-hub' };
        case 'delayed':
            return { type: 'delayed' };
        case 'undeliverable':
            return { type: 'undeliverable' };
        default:
            throw new SimulationError(SIMULATION_ERRORS.INVALID_STATUS, `Unknown item status "${text}"`);
    }
};

/** `""` → no restriction, `"Truck N Only"` → vehicle N */
export const parseRestriction = (text: string): number | null => {
    const trimmed = text.trim();
    if (trimmed === '') {
        return null;
    }

    const match = RESTRICTION_PATTERN.exec(trimmed);
    if (!match) {
        throw new SimulationError(SIMULATION_ERRORS.INVALID_RESTRICTION, `Unknown vehicle restriction "${text}"`);
    }
    return Number.parseInt(match[1]);
};

export const createItem = (record: ItemRecord, locationId: number, endOfDay: TimeOfDay): Item => {
    try {
        return {
            id: record.id,
            locationId,
            weight: record.weight,
            deadline: parseDeadline(record.deadline, endOfDay),
            status: parseStatus(record.status),
            requiredVehicleId: parseRestriction(record.restriction),
            deliverWith: [...record.deliverWith],
        };
    } catch (error) {
        if (error instanceof SimulationError) {
            throw new SimulationError(error.code, `Item ${record.id}: ${error.message}`, { cause: error });
        }
        throw error;
    }
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    const EOD = TimeUtils.fromHoursMinutes(17, 0);

    describe('parseDeadline', () => {
        test('should normalize EOD to the end of the day', () => {
            expect(parseDeadline('EOD', EOD)).toEqual({ time: 61200, label: 'EOD', endOfDay: true });
        });

        test('should parse wall-clock deadlines', () => {
            expect(parseDeadline('10:30 AM', EOD)).toEqual({ time: 37800, label: '10:30 AM', endOfDay: false });
        });

        test('should surface malformed text as INVALID_DEADLINE', () => {
            expect(() => parseDeadline('noon', EOD)).toThrowError(/Invalid deadline "noon"/);
        });
    });

    describe('parseRestriction', () => {
        test('should read the vehicle number', () => {
            expect(parseRestriction('Truck 2 Only')).toBe(2);
            expect(parseRestriction('')).toBeNull();
        });

        test('should reject unknown text', () => {
            expect(() => parseRestriction('Fragile')).toThrowError(SimulationError);
        });
    });
}

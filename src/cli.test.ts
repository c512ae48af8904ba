import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';

import { parseCliArgs, parseUntilFlag, runUntil } from './cli';
import { loadConfig, resolveConfig } from './config';
import { SIMULATION_ERRORS, isSimulationError } from './errors';
import { createSimulation } from './simulation/setup';
import { silentLogger } from './types/simulation';
import { DataLoader } from './utils/data-loader';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SAMPLE_DIR = path.resolve(__dirname, '..', 'data');

const failureOf = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (error) {
        return isSimulationError(error) ? { code: error.code, message: error.message } : error;
    }
    return undefined;
};

describe('usage errors', () => {
    const operatingDay = { startTime: 28800 };

    it('should accept a stop time inside the day', () => {
        expect(parseUntilFlag('12:00', operatingDay)).toBe(43200);
    });

    it('should report a bad --until value as a usage error', () => {
        expect(failureOf(() => parseUntilFlag('07:30', operatingDay))).toEqual({
            code: SIMULATION_ERRORS.INVALID_USAGE,
            message: '--until: Stop time must be between 08:00 and 23:59',
        });
        expect(failureOf(() => parseUntilFlag('noon', operatingDay))).toEqual({
            code: SIMULATION_ERRORS.INVALID_USAGE,
            message: '--until: Invalid time "noon", expected HH:MM',
        });
    });

    it('should report an unknown flag as a usage error', () => {
        expect(failureOf(() => parseCliArgs(['--fast']))).toMatchObject({ code: SIMULATION_ERRORS.INVALID_USAGE });
    });
});

describe('runUntil', () => {
    const data = {
        locations: [
            { address: 'Hub Yard', city: 'Testville', zip: '00000', distances: [0] },
            { address: 'Pond Street', city: 'Testville', zip: '00000', distances: [0.5, 0] },
        ],
        items: [
            {
                id: 3,
                address: 'Pond Street',
                city: 'Testville',
                zip: '00000',
                deadline: 'EOD',
                weight: 4,
                status: '',
                restriction: '',
                deliverWith: [],
            },
        ],
    };
    const config = resolveConfig({ vehicleCount: 1, initialDispatch: 1, events: { delayedArrival: null } });

    it('should append the finish time once the day is done', () => {
        const lines = runUntil(data, config, config.endOfDay, silentLogger);

        // 5 sub-units each way at 20 s each
        expect(lines[1]).toBe('Current time: 08:03:20');
        expect(lines.at(-1)).toBe('Finished at 08:03:20');
    });

    it('should end with the mileage when stopped early', () => {
        const lines = runUntil(data, config, 28860, silentLogger);

        expect(lines[1]).toBe('Current time: 08:01:00');
        expect(lines.at(-1)).toBe('Total miles driven: 0.3');
    });

    it('should run each request from the start of the day', () => {
        runUntil(data, config, config.endOfDay, silentLogger);

        expect(runUntil(data, config, 28860, silentLogger)[1]).toBe('Current time: 08:01:00');
    });
});

describe('sample day', () => {
    it('should deliver every sample item by the end of the day', async () => {
        const config = await loadConfig(path.join(SAMPLE_DIR, 'simulation.json'));
        const data = await new DataLoader().loadFromDirectory(SAMPLE_DIR);
        const simulation = createSimulation(data, config);

        const result = simulation.run(config.endOfDay);

        expect(result.finished).toBe(true);
        expect(data.items).toHaveLength(40);
        expect(simulation.items().filter(({ status }) => status.type !== 'delivered')).toEqual([]);
        expect(simulation.items().find(({ id }) => id === 9)?.locationId).toBe(3);
        expect(simulation.vehicles[2].subUnitsDriven).toBe(0);
    });
});

import { parseArgs } from 'util';

import type { SimulationConfig } from './config';
import { SIMULATION_ERRORS, SimulationError, isSimulationError } from './errors';
import { createSimulation, parseStopTime } from './simulation/setup';
import type { SimulationData } from './types/records';
import type { Logger } from './types/simulation';
import { formatStatusReport } from './utils/status-report';
import { TimeUtils, type TimeOfDay } from './utils/time-utils';

export interface CliOptions {
    until?: string;
    dataDir?: string;
    configFile?: string;
    verbose: boolean;
}

export const USAGE = 'Usage: tsx src/index.ts [--until HH:MM] [--data <dir>] [--config <file>] [--verbose]';

const parseFlags = (args: string[]) => {
    try {
        return parseArgs({
            args,
            options: {
                until: { type: 'string' },
                data: { type: 'string' },
                config: { type: 'string' },
                verbose: { type: 'boolean', short: 'v', default: false },
            },
            strict: true,
        });
    } catch (error) {
        throw new SimulationError(SIMULATION_ERRORS.INVALID_USAGE, error instanceof Error ? error.message : String(error), {
            cause: error,
        });
    }
};

export const parseCliArgs = (args: string[]): CliOptions => {
    const { values } = parseFlags(args);

    return {
        until: values.until,
        dataDir: values.data,
        configFile: values.config,
        verbose: values.verbose ?? false,
    };
};

/** The `--until` stop time; a bad value is a usage error rather than a failed run */
export const parseUntilFlag = (until: string, config: Pick<SimulationConfig, 'startTime'>): TimeOfDay => {
    try {
        return parseStopTime(until, config);
    } catch (error) {
        if (!isSimulationError(error, SIMULATION_ERRORS.INVALID_TIME)) {
            throw error;
        }
        throw new SimulationError(SIMULATION_ERRORS.INVALID_USAGE, `--until: ${error.message}`, { cause: error });
    }
};

/** Runs a fresh simulation up to `stopAt` and returns the printable report */
export const runUntil = (
    data: SimulationData,
    config: SimulationConfig,
    stopAt: TimeOfDay,
    logger: Logger,
): string[] => {
    const simulation = createSimulation(data, config, logger);
    const result = simulation.run(stopAt);

    const lines = formatStatusReport(simulation);
    if (result.finished) {
        lines.push(`Finished at ${TimeUtils.format(result.endedAt)}`);
    }
    return lines;
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('parseCliArgs', () => {
        test('should read every flag', () => {
            expect(parseCliArgs(['--until', '10:30', '--data', 'fixtures', '--config', 'day.json', '-v'])).toEqual({
                until: '10:30',
                dataDir: 'fixtures',
                configFile: 'day.json',
                verbose: true,
            });
        });

        test('should leave unset flags undefined', () => {
            expect(parseCliArgs([])).toEqual({
                until: undefined,
                dataDir: undefined,
                configFile: undefined,
                verbose: false,
            });
        });

        test('should report unknown flags as usage errors', () => {
            expect(() => parseCliArgs(['--fast'])).toThrowError(SimulationError);
        });
    });
}

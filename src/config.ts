import { readFile } from 'fs/promises';
import cloneDeep from 'lodash/cloneDeep';
import merge from 'lodash/merge';
import z from 'zod';

import { SIMULATION_ERRORS, SimulationError, formatIssues } from './errors';
import { TimeUtils } from './utils/time-utils';

const SECONDS_PER_HOUR = 3600;

const meridiemTimeSchema = z.string().transform((text, ctx) => {
    try {
        return TimeUtils.parseMeridiem(text);
    } catch (error) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error instanceof Error ? error.message : `Invalid time "${text}"`,
        });
        return z.NEVER;
    }
});

export const simulationConfigSchema = z
    .object({
        startTime: meridiemTimeSchema,
        endOfDay: meridiemTimeSchema,
        speed: z.number().positive(), // distance units per hour
        subUnitScale: z.number().int().positive(), // sub-units per distance unit
        vehicleCount: z.number().int().positive(),
        vehicleCapacity: z.number().int().positive(),
        initialDispatch: z.number().int().nonnegative(), // vehicles with a driver at the start of the day
        events: z.object({
            delayedArrival: meridiemTimeSchema.nullable(),
            addressCorrection: z
                .object({
                    at: meridiemTimeSchema,
                    itemId: z.number().int().positive(),
                    address: z.string().min(1),
                })
                .nullable(),
        }),
    })
    .refine(config => Number.isInteger(SECONDS_PER_HOUR / (config.speed * config.subUnitScale)), {
        message: 'speed × subUnitScale must divide an hour into whole seconds',
        path: ['speed'],
    })
    .refine(config => config.initialDispatch <= config.vehicleCount, {
        message: 'initialDispatch cannot exceed vehicleCount',
        path: ['initialDispatch'],
    })
    .transform(config => ({
        ...config,
        tickSeconds: SECONDS_PER_HOUR / (config.speed * config.subUnitScale),
    }));

export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;
export type SimulationConfig = z.output<typeof simulationConfigSchema>;

export type SimulationConfigOverrides = Partial<Omit<SimulationConfigInput, 'events'>> & {
    events?: Partial<SimulationConfigInput['events']>;
};

export const DEFAULT_CONFIG: SimulationConfigInput = {
    startTime: '8:00 AM',
    endOfDay: '5:00 PM',
    speed: 18,
    subUnitScale: 10,
    vehicleCount: 3,
    vehicleCapacity: 16,
    initialDispatch: 2,
    events: {
        delayedArrival: '9:05 AM',
        addressCorrection: null,
    },
};

const mergeAndValidate = (overrides: object, source: string): SimulationConfig => {
    const result = simulationConfigSchema.safeParse(merge(cloneDeep(DEFAULT_CONFIG), overrides));
    if (!result.success) {
        throw new SimulationError(
            SIMULATION_ERRORS.INVALID_CONFIG,
            `Invalid simulation configuration${source}: ${formatIssues(result.error)}`,
        );
    }
    return result.data;
};

/** Merge overrides over the defaults and validate */
export const resolveConfig = (overrides: SimulationConfigOverrides = {}): SimulationConfig =>
    mergeAndValidate(overrides, '');

export const loadConfig = async (filePath?: string): Promise<SimulationConfig> => {
    if (!filePath) {
        return resolveConfig();
    }

    const content = await readFile(filePath, 'utf-8');

    let overrides: unknown;
    try {
        overrides = JSON.parse(content);
    } catch (error) {
        throw new SimulationError(SIMULATION_ERRORS.INVALID_CONFIG, `Invalid JSON in ${filePath}`, { cause: error });
    }

    if (typeof overrides !== 'object' || overrides === null || Array.isArray(overrides)) {
        throw new SimulationError(SIMULATION_ERRORS.INVALID_CONFIG, `${filePath} must contain a JSON object`);
    }

    return mergeAndValidate(overrides, ` in ${filePath}`);
};

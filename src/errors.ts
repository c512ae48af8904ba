import type { ZodError } from 'zod';

export const SIMULATION_ERRORS = {
    KEY_NOT_FOUND: 'KEY_NOT_FOUND',
    INVALID_KEY: 'INVALID_KEY',
    INVALID_TIME: 'INVALID_TIME',
    INVALID_DEADLINE: 'INVALID_DEADLINE',
    INVALID_STATUS: 'INVALID_STATUS',
    INVALID_RESTRICTION: 'INVALID_RESTRICTION',
    UNKNOWN_LOCATION: 'UNKNOWN_LOCATION',
    UNKNOWN_ITEM: 'UNKNOWN_ITEM',
    INVALID_DISTANCE_TABLE: 'INVALID_DISTANCE_TABLE',
    INVALID_CONFIG: 'INVALID_CONFIG',
    INVALID_DATA: 'INVALID_DATA',
    INVALID_USAGE: 'INVALID_USAGE',
} as const;

export type SimulationErrorCode = (typeof SIMULATION_ERRORS)[keyof typeof SIMULATION_ERRORS];

export class SimulationError extends Error {
    readonly code: SimulationErrorCode;

    constructor(code: SimulationErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SimulationError';
        this.code = code;
    }
}

export const isSimulationError = (error: unknown, code?: SimulationErrorCode): error is SimulationError =>
    error instanceof SimulationError && (code === undefined || error.code === code);

/** One line per issue: `path: message; path: message` */
export const formatIssues = (error: ZodError): string =>
    error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

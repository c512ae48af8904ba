import type { Item, Logger, SimulationLogEntry } from '../types/simulation';
import type { HashTable } from '../utils/hash-table';
import { TimeUtils } from '../utils/time-utils';
import type { Clock } from './clock';
import type { Hub } from './hub';
import type { LocationGraph } from './location-graph';

/** Everything one simulation run owns. Built once by setup and passed explicitly. */
export interface SimulationContext {
    readonly clock: Clock;
    readonly graph: LocationGraph;
    readonly hub: Hub;
    readonly items: HashTable<Item>;
    readonly log: ReadonlyArray<SimulationLogEntry>;
    record(entry: Omit<SimulationLogEntry, 'time'>): void;
}

export const createContext = (
    parts: Pick<SimulationContext, 'clock' | 'graph' | 'hub' | 'items'>,
    logger: Logger,
): SimulationContext => {
    const log: SimulationLogEntry[] = [];

    return {
        ...parts,
        log,
        record(entry) {
            const time = parts.clock.now();
            log.push({ time, ...entry });
            logger.log(`[${TimeUtils.format(time)}] ${entry.message}`);
        },
    };
};

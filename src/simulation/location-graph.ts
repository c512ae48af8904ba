import { SIMULATION_ERRORS, SimulationError } from '../errors';
import type { LocationRecord } from '../types/records';
import type { DistanceCalculator, Location } from '../types/simulation';

export const HUB_LOCATION_ID = 0;

/**
 * Locations with a symmetric distance table stored once per unordered pair.
 * Row `i` holds the distances to locations `0..i`, quantized to integer sub-units so that
 * mileage and travel time accumulate without floating-point drift.
 */
export class LocationGraph {
    private readonly locations: Location[];
    private readonly rows: number[][];

    constructor(
        records: ReadonlyArray<LocationRecord>,
        readonly subUnitScale: number,
    ) {
        if (records.length === 0) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_DISTANCE_TABLE, 'At least one location (the hub) is required');
        }

        this.locations = records.map(({ address, city, zip }, id): Location => ({
            id,
            kind: id === HUB_LOCATION_ID ? 'hub' : 'stop',
            address,
            city,
            zip,
        }));

        this.rows = records.map(({ address, distances }, id) => {
            if (distances.length !== id + 1) {
                throw new SimulationError(
                    SIMULATION_ERRORS.INVALID_DISTANCE_TABLE,
                    `Location ${id} (${address}) must list ${id + 1} distances, got ${distances.length}`,
                );
            }
            return distances.map(distance => Math.round(distance * subUnitScale));
        });
    }

    get hub(): Location {
        return this.locations[HUB_LOCATION_ID];
    }

    get size(): number {
        return this.locations.length;
    }

    all(): ReadonlyArray<Location> {
        return this.locations;
    }

    get(id: number): Location {
        const location = this.locations[id];
        if (!location) {
            throw new SimulationError(SIMULATION_ERRORS.UNKNOWN_LOCATION, `Unknown location id ${id}`);
        }
        return location;
    }

    /** Exact street address match, narrowed by zip code when one is given */
    findByAddress(address: string, zip?: string): Location | undefined {
        return this.locations.find(
            location => location.address === address && (zip === undefined || location.zip === zip),
        );
    }

    /** Distance in sub-units */
    distance(from: number, to: number): number {
        this.get(from);
        this.get(to);
        return this.rows[Math.max(from, to)][Math.min(from, to)];
    }

    readonly distanceCalc: DistanceCalculator = (from, to) => this.distance(from, to);
}

import type { DistanceCalculator, Item } from '../../types/simulation';
import { HashTable } from '../../utils/hash-table';
import { greedyRoute } from './greedyRoute';

/** Distinct delivery locations of the given items, keyed by location id */
export const itemLocations = (items: Iterable<Item>): HashTable<number> => {
    const locations = new HashTable<number>();
    for (const item of items) {
        locations.put(item.locationId, item.locationId);
    }
    return locations;
};

/**
 * Orders items by the greedy route over their distinct locations. Items sharing a location
 * keep their relative input order.
 */
export const sortByLocation = (
    items: ReadonlyArray<Item>,
    startId: number,
    distanceCalc: DistanceCalculator,
): Item[] => {
    const route = greedyRoute([...itemLocations(items).keys()], startId, distanceCalc);
    return route.flatMap(locationId => items.filter(item => item.locationId === locationId));
};

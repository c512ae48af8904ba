/**
 * @module greedy-route
 * @description
 * Nearest-neighbour visiting order over a set of distinct locations.
 *
 * From the starting location, repeatedly moves to the closest unvisited location. Ties go to
 * the location that appears first in the input. Earlier choices are never revisited, so the
 * tour is feasible but not necessarily the shortest Hamiltonian path.
 *
 * Complexity:
 * O(L^2) where L is the number of distinct locations.
 */

import type { DistanceCalculator } from '../../types/simulation';

export const greedyRoute = (
    locationIds: ReadonlyArray<number>,
    startId: number,
    distanceCalc: DistanceCalculator,
): number[] => {
    const unvisited = [...locationIds];
    const route: number[] = [];
    let last = startId;

    while (unvisited.length > 0) {
        let nearestIndex = 0;
        let nearestDistance = Infinity;

        for (let i = 0; i < unvisited.length; ++i) {
            const distance = distanceCalc(last, unvisited[i]);
            if (distance < nearestDistance) {
                nearestDistance = distance;
                nearestIndex = i;
            }
        }

        last = unvisited.splice(nearestIndex, 1)[0];
        route.push(last);
    }

    return route;
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    // Points on a line: location id N sits at coordinate POSITIONS[N]
    const POSITIONS = [0, 5, 2, 9, 2];
    const lineDistance: DistanceCalculator = (from, to) => Math.abs(POSITIONS[from] - POSITIONS[to]);

    describe('greedyRoute', () => {
        test('should return an empty route for no locations', () => {
            expect(greedyRoute([], 0, lineDistance)).toEqual([]);
        });

        test('should always move to the nearest unvisited location', () => {
            expect(greedyRoute([3, 1, 2], 0, lineDistance)).toEqual([2, 1, 3]);
        });

        test('should break ties by input order', () => {
            expect(greedyRoute([4, 2], 0, lineDistance)).toEqual([4, 2]);
            expect(greedyRoute([2, 4], 0, lineDistance)).toEqual([2, 4]);
        });

        test('should measure each step from the last visited location', () => {
            // from 1 (at 5): 3 is 4 away, 2 is 3 away → 2, then 3
            expect(greedyRoute([3, 2], 1, lineDistance)).toEqual([2, 3]);
        });

        test('should not mutate the input', () => {
            const input = [3, 1];
            greedyRoute(input, 0, lineDistance);
            expect(input).toEqual([3, 1]);
        });
    });
}

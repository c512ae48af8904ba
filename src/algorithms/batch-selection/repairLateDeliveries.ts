/**
 * @module late-delivery-repair
 * @description
 * Post-selection pass that keeps strict-deadline items ahead of the clustering order.
 *
 * 1. Routes the batch greedily from the hub and walks it, accumulating integer sub-units.
 * 2. If every projected arrival meets its deadline, the routed order is used as is.
 * 3. Otherwise the selection order is kept up to and including the last item with a
 *    wall-clock deadline, and only the items after it are re-routed, starting from that
 *    item's location.
 */

import type { Clock } from '../../simulation/clock';
import type { DistanceCalculator, Item } from '../../types/simulation';
import { sortByLocation } from './utils';

export const hasLateDelivery = (
    route: ReadonlyArray<Item>,
    startId: number,
    distanceCalc: DistanceCalculator,
    clock: Clock,
): boolean => {
    let subUnits = 0;
    let last = startId;

    for (const item of route) {
        subUnits += distanceCalc(last, item.locationId);
        last = item.locationId;

        if (clock.project(subUnits) > item.deadline.time) {
            return true;
        }
    }

    return false;
};

export const repairLateDeliveries = (
    batch: ReadonlyArray<Item>,
    hubId: number,
    distanceCalc: DistanceCalculator,
    clock: Clock,
): Item[] => {
    const routed = sortByLocation(batch, hubId, distanceCalc);
    if (!hasLateDelivery(routed, hubId, distanceCalc, clock)) {
        return routed;
    }

    let lastPriorityIndex = 0;
    batch.forEach((item, index) => {
        if (!item.deadline.endOfDay) {
            lastPriorityIndex = index;
        }
    });

    const prefix = batch.slice(0, lastPriorityIndex + 1);
    const suffix = batch.slice(lastPriorityIndex + 1);

    return [...prefix, ...sortByLocation(suffix, batch[lastPriorityIndex].locationId, distanceCalc)];
};

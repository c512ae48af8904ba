/**
 * @module batch-selection
 * @description
 * Chooses the items a vehicle loads on one hub visit.
 *
 * Algorithm:
 * 1. Orders eligible items by ascending deadline, and within each deadline by the greedy route
 *    from the last location of the previous deadline group (the hub for the first group).
 * 2. Walks that order, adding each item's whole co-delivery group only if every member is
 *    eligible and the group fits in the remaining capacity.
 * 3. After a group is accepted, pulls in other items bound for the same locations, applying
 *    the same group-or-reject rule depth-first.
 * 4. Stops at capacity and runs the late-delivery repair pass over the result.
 *
 * Complexity:
 * O(N^3) in the worst case: an O(N^2) ordering, then up to N group closures of O(N^2) each.
 * Large groups fill the vehicle sooner, so fewer closures run in practice.
 */

import type { Clock } from '../../simulation/clock';
import type { DistanceCalculator, Item } from '../../types/simulation';
import type { TimeOfDay } from '../../utils/time-utils';
import { collectGroup } from './groupClosure';
import { repairLateDeliveries } from './repairLateDeliveries';
import { itemLocations, sortByLocation } from './utils';

export interface VehicleSlot {
    readonly id: number;
    readonly capacity: number;
}

/** Read and load access to the hub's selection indices */
export interface SelectionIndex {
    readonly hubLocationId: number;
    deadlines(): ReadonlyArray<TimeOfDay>;
    itemsDueAt(deadline: TimeOfDay): ReadonlyArray<Item>;
    itemsAt(locationId: number): ReadonlyArray<Item>;
    partnersOf(item: Item): ReadonlyArray<Item>;
    isEligible(item: Item, vehicleId: number): boolean;
    /** Removes the item from the remaining and priority indices */
    markLoaded(item: Item): void;
}

export class BatchSelector {
    constructor(
        private readonly index: SelectionIndex,
        private readonly distanceCalc: DistanceCalculator,
        private readonly clock: Clock,
    ) {}

    nextBatch(vehicle: VehicleSlot): Item[] {
        const batch: Item[] = [];

        for (const item of this.prioritizedItems(vehicle.id)) {
            this.addGroup(item, batch, vehicle);
            if (batch.length >= vehicle.capacity) {
                break;
            }
        }

        return repairLateDeliveries(batch, this.index.hubLocationId, this.distanceCalc, this.clock);
    }

    /** Eligible items by ascending deadline, routed greedily within each deadline */
    prioritizedItems(vehicleId: number): Item[] {
        const ordered: Item[] = [];
        let lastLocation = this.index.hubLocationId;

        for (const deadline of this.index.deadlines()) {
            const due = this.index.itemsDueAt(deadline).filter(item => this.index.isEligible(item, vehicleId));

            for (const item of sortByLocation(due, lastLocation, this.distanceCalc)) {
                ordered.push(item);
                lastLocation = item.locationId;
            }
        }

        return ordered;
    }

    private addGroup(first: Item, batch: Item[], vehicle: VehicleSlot): void {
        const group = collectGroup(
            first,
            item => this.index.partnersOf(item),
            item => this.index.isEligible(item, vehicle.id),
        );

        if (group === null || group.length + batch.length > vehicle.capacity) {
            return;
        }

        for (const item of group.values()) {
            this.addToBatch(item, batch, vehicle);
        }

        for (const locationId of itemLocations(group.values()).keys()) {
            if (batch.length >= vehicle.capacity) {
                break;
            }
            for (const item of this.index.itemsAt(locationId)) {
                if (batch.length >= vehicle.capacity) {
                    break;
                }
                this.addGroup(item, batch, vehicle);
            }
        }
    }

    private addToBatch(item: Item, batch: Item[], vehicle: VehicleSlot): void {
        if (batch.length < vehicle.capacity && this.index.isEligible(item, vehicle.id)) {
            batch.push(item);
            this.index.markLoaded(item);
        }
    }
}

import sortedIndex from 'lodash/sortedIndex';

import { BatchSelector, type SelectionIndex, type VehicleSlot } from '../algorithms/batch-selection';
import { SIMULATION_ERRORS, SimulationError } from '../errors';
import type { Item } from '../types/simulation';
import { HashTable } from '../utils/hash-table';
import type { TimeOfDay } from '../utils/time-utils';
import type { Clock } from './clock';
import type { LocationGraph } from './location-graph';
import type { Vehicle } from './vehicle';

const NO_ITEMS: ReadonlyArray<Item> = [];

/**
 * The depot. Owns the selection indices over all items and hands out batches to vehicles
 * that arrive here.
 *
 * An item stays in `remaining` until it is loaded. While it waits it is in exactly one of
 * `delayed`, `undeliverable` or neither (eligible).
 */
export class Hub implements SelectionIndex {
    readonly remaining = new HashTable<Item>();
    readonly priority = new HashTable<Item>();
    readonly delayed = new HashTable<Item>();
    readonly undeliverable = new HashTable<Item>();
    readonly restricted = new HashTable<Item>();

    private readonly deliverWith = new HashTable<Item[]>();
    private readonly byLocation = new HashTable<Item[]>();
    private readonly byDeadline = new HashTable<Item[]>();
    private readonly deadlineTimes: TimeOfDay[] = [];

    private readonly selector: BatchSelector;
    private indexed = false;

    constructor(
        private readonly items: HashTable<Item>,
        private readonly graph: LocationGraph,
        clock: Clock,
    ) {
        this.selector = new BatchSelector(this, graph.distanceCalc, clock);
    }

    get hubLocationId(): number {
        return this.graph.hub.id;
    }

    /** Builds every index from the item registry. Runs once; later calls are no-ops. */
    indexItems(): void {
        if (this.indexed) {
            return;
        }

        for (const item of this.items.values()) {
            this.remaining.put(item.id, item);

            if (!item.deadline.endOfDay) {
                this.priority.put(item.id, item);
            }
            if (item.status.type === 'delayed') {
                this.delayed.put(item.id, item);
            }
            if (item.status.type === 'undeliverable') {
                this.undeliverable.put(item.id, item);
            }
            if (item.requiredVehicleId !== null) {
                this.restricted.put(item.id, item);
            }

            // Both directions, so loading either side of a pair pulls in the other
            this.listAt(this.deliverWith, item.id);
            for (const partnerId of item.deliverWith) {
                const partner = this.items.find(partnerId);
                if (partner === undefined) {
                    throw new SimulationError(
                        SIMULATION_ERRORS.UNKNOWN_ITEM,
                        `Item ${item.id} must ship with unknown item ${partnerId}`,
                    );
                }
                this.listAt(this.deliverWith, partnerId).push(item);
                this.listAt(this.deliverWith, item.id).push(partner);
            }

            this.listAt(this.byLocation, item.locationId).push(item);

            if (!this.byDeadline.contains(item.deadline.time)) {
                this.deadlineTimes.splice(sortedIndex(this.deadlineTimes, item.deadline.time), 0, item.deadline.time);
            }
            this.listAt(this.byDeadline, item.deadline.time).push(item);
        }

        this.indexed = true;
    }

    isEligible(item: Item, vehicleId: number): boolean {
        return (
            this.remaining.contains(item.id) &&
            !this.undeliverable.contains(item.id) &&
            !this.delayed.contains(item.id) &&
            (!this.restricted.contains(item.id) || item.requiredVehicleId === vehicleId)
        );
    }

    deadlines(): ReadonlyArray<TimeOfDay> {
        return this.deadlineTimes;
    }

    itemsDueAt(deadline: TimeOfDay): ReadonlyArray<Item> {
        return this.byDeadline.find(deadline) ?? NO_ITEMS;
    }

    itemsAt(locationId: number): ReadonlyArray<Item> {
        return this.byLocation.find(locationId) ?? NO_ITEMS;
    }

    partnersOf(item: Item): ReadonlyArray<Item> {
        return this.deliverWith.find(item.id) ?? NO_ITEMS;
    }

    markLoaded(item: Item): void {
        this.remaining.remove(item.id);
        this.priority.remove(item.id);
    }

    nextBatch(vehicle: VehicleSlot): Item[] {
        return this.selector.nextBatch(vehicle);
    }

    /** Arrival handler: reload the vehicle, or park it until something becomes eligible */
    receive(vehicle: Vehicle): void {
        const batch = this.nextBatch(vehicle);
        if (batch.length === 0) {
            vehicle.waitAtHub();
            return;
        }
        vehicle.loadBatch(batch);
    }

    /** Delayed items arrive: all of them become eligible and the delayed index empties */
    releaseDelayed(): Item[] {
        const released = [...this.delayed.values()];
        for (const item of released) {
            item.status = { type: 'at-hub' };
        }
        this.delayed.clear();
        return released;
    }

    /**
     * Re-addresses an item that has not shipped yet and makes it eligible.
     * Returns `false` when the item already left the hub.
     */
    correctAddress(itemId: number, locationId: number): boolean {
        const item = this.items.get(itemId);
        this.graph.get(locationId);

        if (!this.remaining.contains(itemId)) {
            return false;
        }

        const previous = this.itemsAt(item.locationId).filter(other => other.id !== itemId);
        this.byLocation.put(item.locationId, previous);

        item.locationId = locationId;
        item.status = { type: 'at-hub' };
        this.listAt(this.byLocation, locationId).push(item);
        this.undeliverable.remove(itemId);

        return true;
    }

    private listAt(table: HashTable<Item[]>, key: number): Item[] {
        let list = table.find(key);
        if (list === undefined) {
            list = [];
            table.put(key, list);
        }
        return list;
    }
}

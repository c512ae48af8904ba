import type { Item } from '../types/simulation';
import type { SimulationContext } from './context';

export type VehicleState = 'parked' | 'waiting' | 'en-route';

/**
 * A delivery vehicle moving one distance sub-unit per tick.
 *
 * Travel is tracked in integer sub-units: `subUnitsToDestination` counts down while driving
 * and `subUnitsDriven` only ever counts up, so reported mileage is exact.
 */
export class Vehicle {
    locationId: number;
    destinationId: number | null = null;
    subUnitsToDestination = 0;
    subUnitsDriven = 0;
    waiting = false;

    private carried: Item[] = [];

    constructor(
        readonly id: number,
        readonly capacity: number,
        private readonly context: SimulationContext,
    ) {
        this.locationId = context.graph.hub.id;
    }

    get items(): ReadonlyArray<Item> {
        return this.carried;
    }

    get state(): VehicleState {
        if (this.waiting) {
            return 'waiting';
        }
        return this.destinationId === null ? 'parked' : 'en-route';
    }

    /** Loads one item if there is room. The first item into an empty vehicle sets its destination. */
    load(item: Item): boolean {
        if (this.carried.length >= this.capacity) {
            return false;
        }

        this.carried.push(item);
        item.status = { type: 'on-vehicle', vehicleId: this.id };

        if (this.carried.length === 1) {
            this.setDestination();
            this.waiting = false;
        }
        return true;
    }

    loadBatch(batch: ReadonlyArray<Item>): void {
        const loaded = batch.filter(item => this.load(item));
        this.context.record({
            message: `Truck ${this.id} loaded ${loaded.length} item(s) at the hub`,
            vehicleId: this.id,
            itemIds: loaded.map(({ id }) => id),
        });
    }

    waitAtHub(): void {
        if (!this.waiting) {
            this.context.record({ message: `Truck ${this.id} is waiting at the hub`, vehicleId: this.id });
        }
        this.waiting = true;
        this.destinationId = null;
        this.subUnitsToDestination = 0;
    }

    advance(): void {
        if (this.waiting) {
            this.context.hub.receive(this);
            return;
        }
        if (this.destinationId === null) {
            return;
        }

        if (this.subUnitsToDestination > 0) {
            --this.subUnitsToDestination;
            ++this.subUnitsDriven;
        }

        if (this.subUnitsToDestination === 0) {
            this.locationId = this.destinationId;
            this.arrive();
        }
    }

    distanceDriven(): number {
        return this.subUnitsDriven / this.context.graph.subUnitScale;
    }

    private arrive(): void {
        const location = this.context.graph.get(this.locationId);

        switch (location.kind) {
            case 'stop':
                this.deliver();
                break;
            case 'hub':
                if (this.carried.length > 0) {
                    this.deliver();
                } else {
                    this.context.hub.receive(this);
                }
                break;
        }
    }

    private deliver(): void {
        const now = this.context.clock.now();
        const delivered: Item[] = [];
        const remaining: Item[] = [];

        for (const item of this.carried) {
            if (item.locationId === this.locationId) {
                item.status = { type: 'delivered', time: now, onTime: now <= item.deadline.time };
                delivered.push(item);
            } else {
                remaining.push(item);
            }
        }

        this.carried = remaining;

        if (delivered.length > 0) {
            const late = delivered.filter(({ status }) => status.type === 'delivered' && !status.onTime);
            this.context.record({
                message:
                    `Truck ${this.id} delivered ${delivered.length} item(s) at ${this.context.graph.get(this.locationId).address}` +
                    (late.length > 0 ? `, ${late.length} late` : ''),
                vehicleId: this.id,
                itemIds: delivered.map(({ id }) => id),
            });
        }

        this.setDestination();
    }

    private setDestination(): void {
        this.destinationId = this.carried.length === 0 ? this.context.graph.hub.id : this.carried[0].locationId;
        this.subUnitsToDestination = this.context.graph.distance(this.locationId, this.destinationId);
    }
}

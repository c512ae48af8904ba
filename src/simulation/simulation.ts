import type { Item, ScheduledEvent, SimulationLogEntry, SimulationResult } from '../types/simulation';
import { TimeUtils, type TimeOfDay } from '../utils/time-utils';
import type { SimulationContext } from './context';
import { Vehicle } from './vehicle';

export interface SimulationOptions {
    vehicleCount: number;
    vehicleCapacity: number;
    /** How many vehicles receive a batch at the start of the day; the rest stay parked */
    initialDispatch: number;
    events: ReadonlyArray<ScheduledEvent>;
}

/**
 * Drives one simulated day. Each tick advances the clock, then fires the events due at the
 * new time, then moves every vehicle, so an event at time T is visible to arrivals at T.
 */
export class Simulation {
    readonly vehicles: ReadonlyArray<Vehicle>;

    private readonly pendingEvents: ScheduledEvent[];
    private started = false;

    constructor(
        readonly context: SimulationContext,
        private readonly options: SimulationOptions,
    ) {
        this.vehicles = Array.from(
            { length: options.vehicleCount },
            (_, index) => new Vehicle(index + 1, options.vehicleCapacity, context),
        );
        this.pendingEvents = [...options.events];
    }

    get log(): ReadonlyArray<SimulationLogEntry> {
        return this.context.log;
    }

    now(): TimeOfDay {
        return this.context.clock.now();
    }

    /** All items in id order */
    items(): ReadonlyArray<Readonly<Item>> {
        return [...this.context.items.values()].sort((a, b) => a.id - b.id);
    }

    totalSubUnits(): number {
        return this.vehicles.reduce((sum, vehicle) => sum + vehicle.subUnitsDriven, 0);
    }

    /** Indexes the items and loads the first vehicles. Only the first call has an effect. */
    start(): void {
        if (this.started) {
            return;
        }
        this.started = true;

        this.context.hub.indexItems();
        for (const vehicle of this.vehicles.slice(0, this.options.initialDispatch)) {
            this.context.hub.receive(vehicle);
        }
    }

    tick(): void {
        this.start();
        this.context.clock.advance();
        this.fireDueEvents();
        for (const vehicle of this.vehicles) {
            vehicle.advance();
        }
    }

    /** Every item delivered and every vehicle back at the hub */
    isFinished(): boolean {
        return (
            this.context.hub.remaining.length === 0 &&
            this.vehicles.every(vehicle => vehicle.items.length === 0 && vehicle.state !== 'en-route')
        );
    }

    run(stopAt: TimeOfDay): SimulationResult {
        this.start();

        while (!this.isFinished() && this.now() < stopAt) {
            this.tick();
        }

        const finished = this.isFinished();
        if (finished) {
            this.context.record({ message: `All items delivered, vehicles back at the hub at ${TimeUtils.format(this.now())}` });
        }

        return { finished, endedAt: this.now(), totalSubUnits: this.totalSubUnits() };
    }

    private fireDueEvents(): void {
        const now = this.now();
        const due = this.pendingEvents.filter(event => event.at === now);
        if (due.length === 0) {
            return;
        }

        this.pendingEvents.splice(0, this.pendingEvents.length, ...this.pendingEvents.filter(event => event.at !== now));
        for (const event of due) {
            this.fire(event);
        }
    }

    private fire(event: ScheduledEvent): void {
        const { hub } = this.context;

        switch (event.type) {
            case 'delayed-arrival': {
                const released = hub.releaseDelayed();
                this.context.record({
                    message: `${released.length} delayed item(s) arrived at the hub`,
                    itemIds: released.map(({ id }) => id),
                });
                break;
            }
            case 'address-correction': {
                const applied = hub.correctAddress(event.itemId, event.locationId);
                const address = this.context.graph.get(event.locationId).address;
                this.context.record({
                    message: applied
                        ? `Item ${event.itemId} re-addressed to ${address}`
                        : `Item ${event.itemId} already left the hub, correction to ${address} skipped`,
                    itemIds: [event.itemId],
                });
                break;
            }
        }
    }
}

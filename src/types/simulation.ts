import type { TimeOfDay } from '../utils/time-utils';

export type LocationKind = 'hub' | 'stop';

export interface Location {
    readonly id: number;
    readonly kind: LocationKind;
    readonly address: string;
    readonly city: string;
    readonly zip: string;
}

export interface Deadline {
    readonly time: TimeOfDay;
    readonly label: string;
    readonly endOfDay: boolean;
}

export type ItemStatus =
    | { readonly type: 'at-hub' }
    | { readonly type: 'delayed' }
    | { readonly type: 'undeliverable' }
    | { readonly type: 'on-vehicle'; readonly vehicleId: number }
    | { readonly type: 'delivered'; readonly time: TimeOfDay; readonly onTime: boolean };

export interface Item {
    readonly id: number;
    locationId: number;
    readonly weight: number;
    readonly deadline: Deadline;
    status: ItemStatus;
    readonly requiredVehicleId: number | null;
    readonly deliverWith: ReadonlyArray<number>;
}

/** Distance between two location ids, in integer sub-units */
export type DistanceCalculator = (from: number, to: number) => number;

export type ScheduledEvent =
    | { readonly type: 'delayed-arrival'; readonly at: TimeOfDay }
    | {
          readonly type: 'address-correction';
          readonly at: TimeOfDay;
          readonly itemId: number;
          readonly locationId: number;
      };

export interface SimulationLogEntry {
    time: TimeOfDay;
    message: string;
    vehicleId?: number;
    itemIds?: number[];
}

export type Logger = Pick<Console, 'log'>;

export const silentLogger: Logger = {
    log: () => {},
};

export interface SimulationResult {
    finished: boolean;
    endedAt: TimeOfDay;
    totalSubUnits: number;
}

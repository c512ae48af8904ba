import type { Simulation } from '../simulation/simulation';
import type { ItemStatus, Location } from '../types/simulation';
import { TimeUtils } from './time-utils';

const LOCATION_HEADER = 'Delivery Location';
const ID_WIDTH = 'Item ID'.length;
const WEIGHT_WIDTH = 'Weight'.length;
const DEADLINE_WIDTH = 'Deadline'.length;

export const describeStatus = (status: ItemStatus): string => {
    switch (status.type) {
        case 'at-hub':
            return 'At Hub';
        case 'delayed':
            return 'Delayed';
        case 'undeliverable':
            return 'Undeliverable';
        case 'on-vehicle':
            return `On Truck ${status.vehicleId}`;
        case 'delivered':
            return `Delivered at ${TimeUtils.format(status.time)} (${status.onTime ? 'On time' : 'Late'})`;
    }
};

export const describeLocation = ({ address, city, zip }: Location): string => `${address}, ${city} ${zip}`;

/** Distance with one decimal, from integer sub-units */
export const formatDistance = (subUnits: number, subUnitScale: number): string => (subUnits / subUnitScale).toFixed(1);

/** Item table followed by per-vehicle and total mileage */
export const formatStatusReport = (simulation: Simulation): string[] => {
    const { graph } = simulation.context;
    const items = simulation.items();

    const locations = items.map(item => describeLocation(graph.get(item.locationId)));
    const locationWidth = Math.max(LOCATION_HEADER.length, ...locations.map(location => location.length));

    const lines = [
        '',
        `Current time: ${TimeUtils.format(simulation.now())}`,
        `Item ID | ${LOCATION_HEADER.padEnd(locationWidth)} | Weight | Deadline | Status`,
    ];

    items.forEach((item, index) => {
        lines.push(
            [
                item.id.toString().padStart(ID_WIDTH),
                locations[index].padEnd(locationWidth),
                `${item.weight} kg`.padStart(WEIGHT_WIDTH),
                item.deadline.label.padEnd(DEADLINE_WIDTH),
                describeStatus(item.status),
            ].join(' | '),
        );
    });

    lines.push('');
    for (const vehicle of simulation.vehicles) {
        lines.push(
            `Truck ${vehicle.id} has driven ${formatDistance(vehicle.subUnitsDriven, graph.subUnitScale)} miles`,
        );
    }
    lines.push(`Total miles driven: ${formatDistance(simulation.totalSubUnits(), graph.subUnitScale)}`);

    return lines;
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('describeStatus', () => {
        test('should name the vehicle carrying the item', () => {
            expect(describeStatus({ type: 'on-vehicle', vehicleId: 2 })).toBe('On Truck 2');
        });

        test('should stamp delivery time and punctuality', () => {
            expect(describeStatus({ type: 'delivered', time: 37800, onTime: true })).toBe(
                'Delivered at 10:30:00 (On time)',
            );
            expect(describeStatus({ type: 'delivered', time: 37820, onTime: false })).toBe(
                'Delivered at 10:30:20 (Late)',
            );
        });
    });

    test('formatDistance should keep one decimal', () => {
        expect(formatDistance(123, 10)).toBe('12.3');
        expect(formatDistance(0, 10)).toBe('0.0');
    });
}

import { describe, it, expect } from 'vitest';

import { Clock } from '../../simulation/clock';
import { Hub } from '../../simulation/hub';
import { parseDeadline } from '../../simulation/item';
import { LocationGraph } from '../../simulation/location-graph';
import type { LocationRecord } from '../../types/records';
import type { Item } from '../../types/simulation';
import { HashTable } from '../../utils/hash-table';
import { TimeUtils } from '../../utils/time-utils';
import { collectGroup } from './groupClosure';
import { hasLateDelivery, repairLateDeliveries } from './repairLateDeliveries';

const START = TimeUtils.fromHoursMinutes(8, 0);
const END_OF_DAY = TimeUtils.fromHoursMinutes(17, 0);
const TICK_SECONDS = 20;
const SCALE = 10;

// Location N sits at coordinate positions[N] on a straight road; location 0 is the hub
const lineLocations = (positions: number[]): LocationRecord[] =>
    positions.map((position, id) => ({
        address: `${id} Test Road`,
        city: 'Testville',
        zip: '00000',
        distances: positions.slice(0, id + 1).map(other => Math.abs(position - other)),
    }));

const makeItem = (
    id: number,
    locationId: number,
    options: Partial<Pick<Item, 'deadline' | 'status' | 'requiredVehicleId' | 'deliverWith'>> = {},
): Item => ({
    id,
    locationId,
    weight: 1,
    deadline: parseDeadline('EOD', END_OF_DAY),
    status: { type: 'at-hub' },
    requiredVehicleId: null,
    deliverWith: [],
    ...options,
});

const due = (text: string) => parseDeadline(text, END_OF_DAY);

const makeHub = (positions: number[], items: Item[]) => {
    const graph = new LocationGraph(lineLocations(positions), SCALE);
    const clock = new Clock(START, TICK_SECONDS);
    const table = HashTable.from(items.map((item): [number, Item] => [item.id, item]));
    const hub = new Hub(table, graph, clock);
    hub.indexItems();
    return { hub, graph, clock };
};

const ids = (items: ReadonlyArray<Item>) => items.map(({ id }) => id);

describe('BatchSelector', () => {
    it('should order by deadline, then by greedy route within each deadline', () => {
        const { hub } = makeHub(
            [0, 1, 2, 3],
            [makeItem(1, 3), makeItem(2, 2, { deadline: due('10:30 AM') }), makeItem(3, 1, { deadline: due('10:30 AM') })],
        );

        expect([...hub.priority.keys()]).toEqual([2, 3]);
        expect(ids(hub.nextBatch({ id: 1, capacity: 16 }))).toEqual([3, 2, 1]);
        expect(hub.remaining.length).toBe(0);
        expect(hub.priority.length).toBe(0);
    });

    it('should never exceed the vehicle capacity', () => {
        const { hub } = makeHub([0, 4], [1, 2, 3, 4, 5].map(id => makeItem(id, 1)));

        const batch = hub.nextBatch({ id: 1, capacity: 3 });

        expect(ids(batch)).toEqual([1, 2, 3]);
        expect([...hub.remaining.keys()]).toEqual([4, 5]);
    });

    it('should reject a co-delivery group while any member is delayed', () => {
        const { hub } = makeHub(
            [0, 1, 2, 3],
            [makeItem(1, 1, { deliverWith: [2] }), makeItem(2, 2, { status: { type: 'delayed' } }), makeItem(3, 3)],
        );

        expect(ids(hub.nextBatch({ id: 1, capacity: 16 }))).toEqual([3]);
        expect([...hub.remaining.keys()]).toEqual([1, 2]);

        hub.releaseDelayed();
        expect(ids(hub.nextBatch({ id: 1, capacity: 16 }))).toEqual([1, 2]);
    });

    it('should keep the timed members of a rejected group in the priority index', () => {
        const { hub } = makeHub(
            [0, 1, 2],
            [
                makeItem(1, 1, { deadline: due('10:30 AM'), deliverWith: [2] }),
                makeItem(2, 2, { status: { type: 'delayed' } }),
            ],
        );

        expect(ids(hub.nextBatch({ id: 1, capacity: 16 }))).toEqual([]);
        expect([...hub.priority.keys()]).toEqual([1]);
        expect([...hub.remaining.keys()]).toEqual([1, 2]);
    });

    it('should skip a group that does not fit in the remaining capacity', () => {
        const { hub } = makeHub(
            [0, 1, 2],
            [makeItem(1, 1), makeItem(2, 2, { deliverWith: [3] }), makeItem(3, 2)],
        );

        expect(ids(hub.nextBatch({ id: 1, capacity: 2 }))).toEqual([1]);
        expect([...hub.remaining.keys()]).toEqual([2, 3]);
    });

    it('should keep restricted items off other vehicles', () => {
        const { hub } = makeHub([0, 1, 2], [makeItem(1, 1, { requiredVehicleId: 2 }), makeItem(2, 2)]);
        expect([...hub.restricted.keys()]).toEqual([1]);

        expect(ids(hub.nextBatch({ id: 1, capacity: 16 }))).toEqual([2]);
        expect(ids(hub.nextBatch({ id: 3, capacity: 16 }))).toEqual([]);
        expect(ids(hub.nextBatch({ id: 2, capacity: 16 }))).toEqual([1]);
    });

    it('should pull in later items bound for a location already in the batch', () => {
        const { hub } = makeHub(
            [0, 1, 2, 3],
            [makeItem(1, 3, { deadline: due('9:00 AM') }), makeItem(2, 1, { deadline: due('10:30 AM') }), makeItem(3, 3)],
        );

        expect(ids(hub.nextBatch({ id: 1, capacity: 2 }))).toEqual([1, 3]);
        expect([...hub.remaining.keys()]).toEqual([2]);
        expect([...hub.priority.keys()]).toEqual([2]);
    });

    it('should leave undeliverable items at the hub', () => {
        const { hub } = makeHub([0, 1], [makeItem(1, 1, { status: { type: 'undeliverable' } }), makeItem(2, 1)]);

        expect(ids(hub.nextBatch({ id: 1, capacity: 16 }))).toEqual([2]);
        expect(hub.remaining.contains(1)).toBe(true);
    });
});

describe('collectGroup', () => {
    it('should follow partner chains and stop at cycles', () => {
        const a = makeItem(1, 1);
        const b = makeItem(2, 1);
        const c = makeItem(3, 1);
        const partners = new HashTable<Item[]>();
        partners.put(1, [b]);
        partners.put(2, [c, a]);
        partners.put(3, [a]);

        const group = collectGroup(a, item => partners.find(item.id) ?? [], () => true);

        expect(group === null ? null : [...group.keys()]).toEqual([1, 2, 3]);
    });

    it('should fail the whole group when one member is ineligible', () => {
        const a = makeItem(1, 1);
        const b = makeItem(2, 1);

        expect(collectGroup(a, item => (item.id === 1 ? [b] : [a]), item => item.id !== 2)).toBeNull();
    });
});

describe('late delivery repair', () => {
    // Hub at 0, an end-of-day stop 5 miles one way and an 8:30 stop 6 miles the other way.
    // Nearest-neighbour visits the end-of-day stop first and reaches the 8:30 stop at 16 miles.
    const positions = [0, 5, -6];
    const strict = () => makeItem(1, 2, { deadline: due('8:30 AM') });
    const relaxed = () => makeItem(2, 1);

    it('should detect a projected late arrival', () => {
        const { graph, clock } = makeHub(positions, []);

        expect(hasLateDelivery([relaxed(), strict()], 0, graph.distanceCalc, clock)).toBe(true);
        expect(hasLateDelivery([strict(), relaxed()], 0, graph.distanceCalc, clock)).toBe(false);
    });

    it('should keep the selection order through the last strict-deadline item', () => {
        const { graph, clock } = makeHub(positions, []);
        const batch = [strict(), relaxed()];

        expect(ids(repairLateDeliveries(batch, 0, graph.distanceCalc, clock))).toEqual([1, 2]);
    });

    it('should use the greedy route when nothing would be late', () => {
        const { graph, clock } = makeHub(positions, []);
        const batch = [makeItem(1, 2, { deadline: due('10:30 AM') }), relaxed()];

        expect(ids(repairLateDeliveries(batch, 0, graph.distanceCalc, clock))).toEqual([2, 1]);
    });

    it('should put the strict item first in a batch from the hub', () => {
        const { hub } = makeHub(positions, [strict(), relaxed()]);

        expect(ids(hub.nextBatch({ id: 1, capacity: 16 }))).toEqual([1, 2]);
    });
});

import type { SimulationConfig } from '../config';
import { SIMULATION_ERRORS, SimulationError } from '../errors';
import type { SimulationData } from '../types/records';
import { type Item, type Logger, type ScheduledEvent, silentLogger } from '../types/simulation';
import { HashTable } from '../utils/hash-table';
import { TimeUtils, type TimeOfDay } from '../utils/time-utils';
import { Clock } from './clock';
import { createContext } from './context';
import { Hub } from './hub';
import { createItem } from './item';
import { LocationGraph } from './location-graph';
import { Simulation } from './simulation';

const buildItems = (data: SimulationData, graph: LocationGraph, config: SimulationConfig): HashTable<Item> => {
    const items = new HashTable<Item>();

    for (const record of data.items) {
        if (items.contains(record.id)) {
            throw new SimulationError(SIMULATION_ERRORS.INVALID_DATA, `Duplicate item id ${record.id}`);
        }

        const location = graph.findByAddress(record.address, record.zip);
        if (location === undefined) {
            throw new SimulationError(
                SIMULATION_ERRORS.UNKNOWN_LOCATION,
                `Item ${record.id}: no location at ${record.address} ${record.zip}`,
            );
        }

        const item = createItem(record, location.id, config.endOfDay);
        if (item.requiredVehicleId !== null && item.requiredVehicleId > config.vehicleCount) {
            throw new SimulationError(
                SIMULATION_ERRORS.INVALID_RESTRICTION,
                `Item ${item.id}: restricted to truck ${item.requiredVehicleId} but only ${config.vehicleCount} exist`,
            );
        }

        items.put(item.id, item);
    }

    for (const item of items.values()) {
        for (const partnerId of item.deliverWith) {
            if (!items.contains(partnerId)) {
                throw new SimulationError(
                    SIMULATION_ERRORS.UNKNOWN_ITEM,
                    `Item ${item.id} must ship with unknown item ${partnerId}`,
                );
            }
        }
    }

    return items;
};

const checkEventTime = (name: string, at: TimeOfDay, config: SimulationConfig): void => {
    if (at <= config.startTime || (at - config.startTime) % config.tickSeconds !== 0) {
        throw new SimulationError(
            SIMULATION_ERRORS.INVALID_CONFIG,
            `${name} at ${TimeUtils.format(at)} must fall on a tick after ${TimeUtils.format(config.startTime)}`,
        );
    }
};

const buildEvents = (config: SimulationConfig, graph: LocationGraph, items: HashTable<Item>): ScheduledEvent[] => {
    const events: ScheduledEvent[] = [];
    const { delayedArrival, addressCorrection } = config.events;

    if (delayedArrival !== null) {
        checkEventTime('events.delayedArrival', delayedArrival, config);
        events.push({ type: 'delayed-arrival', at: delayedArrival });
    }

    if (addressCorrection !== null) {
        checkEventTime('events.addressCorrection', addressCorrection.at, config);

        if (!items.contains(addressCorrection.itemId)) {
            throw new SimulationError(
                SIMULATION_ERRORS.UNKNOWN_ITEM,
                `Address correction names unknown item ${addressCorrection.itemId}`,
            );
        }

        const location = graph.findByAddress(addressCorrection.address);
        if (location === undefined) {
            throw new SimulationError(
                SIMULATION_ERRORS.UNKNOWN_LOCATION,
                `Address correction names unknown address ${addressCorrection.address}`,
            );
        }

        events.push({
            type: 'address-correction',
            at: addressCorrection.at,
            itemId: addressCorrection.itemId,
            locationId: location.id,
        });
    }

    return events;
};

/** Validates the loaded records and wires one simulation run. Every data problem is fatal here. */
export const createSimulation = (
    data: SimulationData,
    config: SimulationConfig,
    logger: Logger = silentLogger,
): Simulation => {
    const graph = new LocationGraph(data.locations, config.subUnitScale);
    const items = buildItems(data, graph, config);
    const events = buildEvents(config, graph, items);

    const clock = new Clock(config.startTime, config.tickSeconds);
    const hub = new Hub(items, graph, clock);
    const context = createContext({ clock, graph, hub, items }, logger);

    return new Simulation(context, {
        vehicleCount: config.vehicleCount,
        vehicleCapacity: config.vehicleCapacity,
        initialDispatch: config.initialDispatch,
        events,
    });
};

/** Parses a 24-hour stop time that lies between the start time and 23:59 */
export const parseStopTime = (text: string, config: Pick<SimulationConfig, 'startTime'>): TimeOfDay => {
    const stopAt = TimeUtils.parse24Hour(text);

    if (stopAt < config.startTime) {
        throw new SimulationError(
            SIMULATION_ERRORS.INVALID_TIME,
            `Stop time must be between ${TimeUtils.format(config.startTime).slice(0, 5)} and 23:59`,
        );
    }
    return stopAt;
};

import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';

import { SIMULATION_ERRORS, isSimulationError } from '../errors';
import { DataLoader } from './data-loader';

const LOCATIONS_CSV = ['Hub Yard,Testville,00000,0', '"5 Oak Street, Unit B",Testville,00001,2.5,0,,'].join('\n');

const ITEMS_CSV = [
    '1,"5 Oak Street, Unit B",Testville,00001,10:30 AM,3,,,',
    '2,Hub Yard,Testville,00000,EOD,2.5,Delayed,Truck 2 Only,1',
].join('\n');

const rejectionOf = async (promise: Promise<unknown>): Promise<unknown> => {
    try {
        await promise;
    } catch (error) {
        return isSimulationError(error) ? { code: error.code, message: error.message } : error;
    }
    return undefined;
};

describe('DataLoader', () => {
    const loader = new DataLoader();
    let directory: string;

    const fixture = async (name: string, content: string) => {
        const file = path.join(directory, name);
        await writeFile(file, content);
        return file;
    };

    beforeAll(async () => {
        directory = await mkdtemp(path.join(os.tmpdir(), 'delivery-data-'));
        await fixture('locations.csv', LOCATIONS_CSV);
        await fixture('items.csv', ITEMS_CSV);
    });

    afterAll(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('should read locations with their distance rows', async () => {
        expect(await loader.loadLocations(path.join(directory, 'locations.csv'))).toEqual([
            { address: 'Hub Yard', city: 'Testville', zip: '00000', distances: [0] },
            { address: '5 Oak Street, Unit B', city: 'Testville', zip: '00001', distances: [2.5, 0] },
        ]);
    });

    it('should read items with empty optional columns and co-delivery ids', async () => {
        expect(await loader.loadItems(path.join(directory, 'items.csv'))).toEqual([
            {
                id: 1,
                address: '5 Oak Street, Unit B',
                city: 'Testville',
                zip: '00001',
                deadline: '10:30 AM',
                weight: 3,
                status: '',
                restriction: '',
                deliverWith: [],
            },
            {
                id: 2,
                address: 'Hub Yard',
                city: 'Testville',
                zip: '00000',
                deadline: 'EOD',
                weight: 2.5,
                status: 'Delayed',
                restriction: 'Truck 2 Only',
                deliverWith: [1],
            },
        ]);
    });

    it('should load both files from a directory', async () => {
        const data = await loader.loadFromDirectory(directory);

        expect(data.locations).toHaveLength(2);
        expect(data.items.map(({ id }) => id)).toEqual([1, 2]);
    });

    it('should name the file and row of a malformed distance', async () => {
        const file = await fixture('bad-locations.csv', 'Hub Yard,Testville,00000,0\nMill Lane,Testville,00001,far,0');

        expect(await rejectionOf(loader.loadLocations(file))).toEqual({
            code: SIMULATION_ERRORS.INVALID_DATA,
            message: 'bad-locations.csv row 2: 3: Expected number, received nan',
        });
    });

    it('should reject a negative weight', async () => {
        const file = await fixture('negative.csv', '7,Hub Yard,Testville,00000,EOD,-1,,');

        expect(await rejectionOf(loader.loadItems(file))).toEqual({
            code: SIMULATION_ERRORS.INVALID_DATA,
            message: 'negative.csv row 1: weight: Number must be greater than or equal to 0',
        });
    });

    it('should reject a row without a weight', async () => {
        const file = await fixture('short.csv', '8,Hub Yard,Testville,00000,EOD');

        expect(await rejectionOf(loader.loadItems(file))).toEqual({
            code: SIMULATION_ERRORS.INVALID_DATA,
            message: 'short.csv row 1: 5: Expected a number',
        });
    });

    it('should fail on a missing file', async () => {
        await expect(loader.loadItems(path.join(directory, 'missing.csv'))).rejects.toThrowError(/ENOENT/);
    });
});

import csv from 'csv-parser';
import fs from 'fs';
import path from 'path';
import z from 'zod';

import { SIMULATION_ERRORS, SimulationError, formatIssues } from '../errors';
import {
    type ItemRecord,
    type LocationRecord,
    type SimulationData,
    itemRecordSchema,
    locationRecordSchema,
} from '../types/records';

export const LOCATIONS_FILE = 'locations.csv';
export const ITEMS_FILE = 'items.csv';

const ITEM_FIXED_COLUMNS = 8; // id, address, city, zip, deadline, weight, status, restriction

const textCell = z.string().trim();
const numberCell = z.string().trim().min(1, 'Expected a number').pipe(z.coerce.number());

// address, city, zip, then the distances to locations 0..i
const locationRowSchema = z
    .tuple([textCell, textCell, textCell])
    .rest(numberCell)
    .transform(([address, city, zip, ...distances]) => ({ address, city, zip, distances }))
    .pipe(locationRecordSchema);

// id, address, city, zip, deadline, weight, status, restriction, then co-delivery item ids
const itemRowSchema = z
    .tuple([numberCell, textCell, textCell, textCell, textCell, numberCell, textCell, textCell])
    .rest(numberCell)
    .transform(([id, address, city, zip, deadline, weight, status, restriction, ...deliverWith]) => ({
        id,
        address,
        city,
        zip,
        deadline,
        weight,
        status,
        restriction,
        deliverWith,
    }))
    .pipe(itemRecordSchema);

const withoutTrailingEmpty = (cells: string[]): string[] => {
    let end = cells.length;
    while (end > 0 && cells[end - 1].trim() === '') {
        --end;
    }
    return cells.slice(0, end);
};

const padTo = (cells: string[], length: number): string[] =>
    cells.length >= length ? cells : [...cells, ...new Array<string>(length - cells.length).fill('')];

const rawRowSchema = z.record(z.string());

/** Rows as cell arrays. Keys of a header-less csv-parser row are the column indices. */
const readRows = (filePath: string): Promise<string[][]> =>
    new Promise((resolve, reject) => {
        const rows: string[][] = [];

        fs.createReadStream(filePath)
            .on('error', reject)
            .pipe(csv({ headers: false }))
            .on('data', (row: unknown) => {
                const result = rawRowSchema.safeParse(row);
                if (result.success) {
                    rows.push(Object.values(result.data));
                } else {
                    reject(new SimulationError(SIMULATION_ERRORS.INVALID_DATA, `${filePath}: unreadable row`));
                }
            })
            .on('end', () => resolve(rows))
            .on('error', reject);
    });

export class DataLoader {
    async loadFromDirectory(directoryPath: string): Promise<SimulationData> {
        const locations = await this.loadLocations(path.join(directoryPath, LOCATIONS_FILE));
        const items = await this.loadItems(path.join(directoryPath, ITEMS_FILE));

        console.log(`Loaded ${locations.length} locations and ${items.length} items from "${directoryPath}"`);

        return { locations, items };
    }

    async loadLocations(filePath: string): Promise<LocationRecord[]> {
        return this.loadFromFile(filePath, locationRowSchema, cells => cells);
    }

    async loadItems(filePath: string): Promise<ItemRecord[]> {
        return this.loadFromFile(filePath, itemRowSchema, cells => padTo(cells, ITEM_FIXED_COLUMNS));
    }

    /** Blank rows are skipped. Row numbers in errors count every row of the file from 1. */
    private async loadFromFile<S extends z.ZodTypeAny>(
        filePath: string,
        schema: S,
        normalize: (cells: string[]) => string[],
    ): Promise<z.output<S>[]> {
        const rows = await readRows(filePath);
        const records: z.output<S>[] = [];

        rows.forEach((row, index) => {
            const cells = withoutTrailingEmpty(row);
            if (cells.length === 0) {
                return;
            }

            const result = schema.safeParse(normalize(cells));
            if (!result.success) {
                throw new SimulationError(
                    SIMULATION_ERRORS.INVALID_DATA,
                    `${path.basename(filePath)} row ${index + 1}: ${formatIssues(result.error)}`,
                );
            }
            records.push(result.data);
        });

        return records;
    }
}

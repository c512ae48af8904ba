import z from 'zod';

export const locationRecordSchema = z.object({
    address: z.string().min(1),
    city: z.string(),
    zip: z.string(),
    distances: z.number().nonnegative().array(), // lower-triangular row, ends with the 0 self-distance
});

export type LocationRecord = z.infer<typeof locationRecordSchema>;

export const itemRecordSchema = z.object({
    id: z.number().int().positive(),
    address: z.string().min(1),
    city: z.string(),
    zip: z.string(),
    deadline: z.string().min(1), // "H:MM AM/PM" or "EOD"
    weight: z.number().nonnegative(),
    status: z.string(),
    restriction: z.string(), // "" or "Truck N Only"
    deliverWith: z.number().int().positive().array(),
});

export type ItemRecord = z.infer<typeof itemRecordSchema>;

export interface SimulationData {
    locations: LocationRecord[];
    items: ItemRecord[];
}

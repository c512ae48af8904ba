import type { Item } from '../../types/simulation';
import { HashTable } from '../../utils/hash-table';

/**
 * Collects the co-delivery closure anchored at `first` with an explicit stack and visited set.
 * Returns `null` as soon as any member fails `isEligible`, since the group ships whole or not
 * at all. Cyclic partner references terminate because visited items are never expanded twice.
 */
export const collectGroup = (
    first: Item,
    partnersOf: (item: Item) => ReadonlyArray<Item>,
    isEligible: (item: Item) => boolean,
): HashTable<Item> | null => {
    const group = new HashTable<Item>();
    const stack: Item[] = [first];

    while (stack.length > 0) {
        const item = stack.pop();
        if (item === undefined || group.contains(item.id)) {
            continue;
        }
        if (!isEligible(item)) {
            return null;
        }

        group.put(item.id, item);

        const partners = partnersOf(item);
        for (let i = partners.length - 1; i >= 0; --i) {
            if (!group.contains(partners[i].id)) {
                stack.push(partners[i]);
            }
        }
    }

    return group;
};

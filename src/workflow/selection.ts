import type { CatalogItem } from './catalog';

export interface SelectableItem extends CatalogItem {
    selected: boolean;
}

export interface DeliverableSelection {
    items: SelectableItem[];
    total_estimated: number;
    /** budget - total_estimated, or 0 when the budget is uncapped */
    remaining: number;
}

/**
 * Greedy pass over the catalog in its own order: a recommended item is taken
 * when it still fits. With no budget (<= 0) every item is taken.
 *
 * This is not an optimal knapsack. When the recommendation does not fit,
 * catalog order decides what gets dropped.
 */
export function selectDeliverables(
    catalog: readonly CatalogItem[],
    budget: number,
    recommendedKeys: readonly string[]
): DeliverableSelection {
    const recommended = new Set(recommendedKeys);
    let runningTotal = 0;

    const items = catalog.map((item): SelectableItem => {
        const fits = runningTotal + item.cost <= budget;
        if (budget <= 0 || (recommended.has(item.key) && fits)) {
            runningTotal += item.cost;
            return { ...item, selected: true };
        }
        return { ...item, selected: false };
    });

    return {
        items,
        total_estimated: runningTotal,
        remaining: budget > 0 ? budget - runningTotal : 0,
    };
}

/**
 * First-fit selection used when no recommendation is available: take each
 * item whose cost fits the budget still left, in catalog order.
 */
export function fallbackSelection(catalog: readonly CatalogItem[], budget: number): string[] {
    const selected: string[] = [];
    let remaining = Number.isFinite(budget) ? budget : 0;

    for (const item of catalog) {
        const cost = Number.isFinite(item.cost) ? item.cost : 0;
        if (cost <= remaining) {
            selected.push(item.key);
            remaining -= cost;
        }
    }
    return selected;
}

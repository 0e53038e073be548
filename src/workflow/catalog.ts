import * as fs from 'fs';
import { z } from 'zod';
import { ValidationError } from '../errors';
import defaultCatalog from './catalog.json';

export interface CatalogItem {
    key: string;
    title: string;
    cost: number;
    phase: string;
    time_est: string;
    justification: string;
}

const catalogSchema = z
    .array(
        z.object({
            key: z.string().min(1),
            title: z.string().min(1),
            cost: z.number().nonnegative(),
            phase: z.string().default(''),
            time_est: z.string().default('-'),
            justification: z.string().default(''),
        })
    )
    .min(1)
    .refine(items => new Set(items.map(item => item.key)).size === items.length, {
        message: 'catalog keys must be unique',
    });

export function parseCatalog(raw: unknown, source: string = 'catalog'): CatalogItem[] {
    const result = catalogSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ValidationError(`Invalid deliverable ${source}: ${issue?.path.join('.') || 'root'} ${issue?.message ?? ''}`.trim());
    }
    return result.data;
}

/**
 * The deliverable price list. Reads `filePath` when given, otherwise the bundled catalog.
 */
export function loadCatalog(filePath: string | null = null): CatalogItem[] {
    if (!filePath) {
        return parseCatalog(defaultCatalog);
    }
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new ValidationError(`Could not read deliverable catalog at ${filePath}`, { cause: error });
    }
    return parseCatalog(raw, `catalog at ${filePath}`);
}

export function catalogTotal(catalog: readonly CatalogItem[]): number {
    return catalog.reduce((sum, item) => sum + item.cost, 0);
}

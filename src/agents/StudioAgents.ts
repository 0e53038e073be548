import { z } from 'zod';
import type { LlmClient } from '../llm';
import {
    CHIEF_STRATEGY_PROMPT,
    DELIVERABLES_SCHEMA,
    DIRECTIONS_SCHEMA,
    DIRECTOR_PROMPT,
    DOCUMENT_BRIEFS,
    type DocumentKind,
    RESEARCH_WRITER_PROMPT,
    STRATEGIST_PROMPT,
    STRATEGY_SCHEMA,
} from '../prompts';
import type { CatalogItem } from '../workflow/catalog';
import { fallbackSelection } from '../workflow/selection';
import { errorDocument, templateDocument } from './templates';

export interface StrategicDirection {
    key: string;
    title: string;
    description: string;
}

export interface Strategy {
    positioning: string;
    pillars: string[];
    tensions: string[];
    principles: string[];
}

/**
 * The content generators the workflow engine calls. None of these throw:
 * every failure turns into fallback content.
 */
export interface ContentGenerators {
    generateDirections(name: string, brief: string): Promise<StrategicDirection[]>;
    expandStrategy(name: string, brief: string, direction: StrategicDirection): Promise<Strategy>;
    generateDocument(kind: DocumentKind, name: string, brief: string, context: string): Promise<string>;
    recommendDeliverables(name: string, brief: string, budget: number, catalog: readonly CatalogItem[]): Promise<string[]>;
}

const directionsSchema = z.object({
    directions: z
        .array(z.object({
            key: z.string().min(1),
            title: z.string().min(1),
            description: z.string(),
        }))
        .length(3),
});

const strategySchema = z.object({
    positioning: z.string().min(1),
    pillars: z.array(z.string()),
    tensions: z.array(z.string()),
    principles: z.array(z.string()),
});

const deliverablesSchema = z.object({
    selected_keys: z.array(z.string()),
});

export function fallbackDirections(name: string): StrategicDirection[] {
    return [
        { key: 'A', title: 'Market Leader', description: `Position ${name} as the premium authority in the space.` },
        { key: 'B', title: 'Disruptor', description: `Challenge the status quo with a bold, unexpected approach for ${name}.` },
        { key: 'C', title: 'Community-First', description: `Build ${name} around deep connection and shared values.` },
    ];
}

export function fallbackStrategy(name: string): Strategy {
    return {
        positioning: `${name} is the definitive choice for the modern era.`,
        pillars: ['Quality First', 'Customer Obsession', 'Sustainable Core'],
        tensions: ['Global vs Local', 'Premium vs Accessible', 'Timeless vs Modern'],
        principles: ['Simplicity', 'Clarity', 'Warmth'],
    };
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Strategist, Chief Strategy Officer, researcher and Director, backed by an
 * optional model. With `llm` null every call returns its fallback.
 */
export class StudioAgents implements ContentGenerators {
    constructor(private llm: LlmClient | null, private debug: boolean = false) {}

    private log(...args: unknown[]): void {
        if (this.debug) {
            console.log('[StudioAgents]', ...args);
        }
    }

    async generateDirections(name: string, brief: string): Promise<StrategicDirection[]> {
        if (!this.llm) {
            return fallbackDirections(name);
        }
        try {
            const raw = await this.llm.completeJson(
                { system: STRATEGIST_PROMPT, prompt: `Project Name: ${name}\nClient Brief: ${brief}` },
                DIRECTIONS_SCHEMA
            );
            const directions = directionsSchema.parse(raw).directions;
            this.log('Directions:', directions.map(d => d.title).join(', '));
            return directions;
        } catch (error) {
            console.error('[StudioAgents] Directions failed, using fallback:', describe(error));
            return fallbackDirections(name);
        }
    }

    async expandStrategy(name: string, brief: string, direction: StrategicDirection): Promise<Strategy> {
        if (!this.llm) {
            return fallbackStrategy(name);
        }
        try {
            const raw = await this.llm.completeJson(
                {
                    system: CHIEF_STRATEGY_PROMPT,
                    prompt: `Project: ${name}\nBrief: ${brief}\nChosen Strategic Direction: "${direction.title}" - ${direction.description}`,
                },
                STRATEGY_SCHEMA
            );
            return strategySchema.parse(raw);
        } catch (error) {
            console.error('[StudioAgents] Strategy expansion failed, using fallback:', describe(error));
            return fallbackStrategy(name);
        }
    }

    async generateDocument(kind: DocumentKind, name: string, brief: string, context: string): Promise<string> {
        if (!this.llm) {
            return templateDocument(kind, name, brief, context);
        }
        try {
            const html = await this.llm.completeText({
                system: RESEARCH_WRITER_PROMPT,
                prompt: `${DOCUMENT_BRIEFS[kind](name, brief, context)}\nReturn ONLY clean HTML tags.`,
            });
            if (!html.trim()) {
                return errorDocument('empty response');
            }
            return html;
        } catch (error) {
            console.error(`[StudioAgents] Document ${kind} failed:`, describe(error));
            return errorDocument(describe(error));
        }
    }

    async recommendDeliverables(name: string, brief: string, budget: number, catalog: readonly CatalogItem[]): Promise<string[]> {
        if (!this.llm) {
            return fallbackSelection(catalog, budget);
        }
        const catalogJson = JSON.stringify(catalog.map(item => ({ key: item.key, name: item.title, cost: item.cost })));
        try {
            const raw = await this.llm.completeJson(
                {
                    system: DIRECTOR_PROMPT,
                    prompt: `Project: ${name}\nBrief: ${brief}\nBudget: $${budget}\n\nAvailable Catalog:\n${catalogJson}`,
                },
                DELIVERABLES_SCHEMA
            );
            const known = new Set(catalog.map(item => item.key));
            return deliverablesSchema.parse(raw).selected_keys.filter(key => known.has(key));
        } catch (error) {
            console.error('[StudioAgents] Deliverable recommendation failed, using fallback:', describe(error));
            return fallbackSelection(catalog, budget);
        }
    }
}

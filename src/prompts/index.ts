/**
 * Centralized LLM Prompts
 *
 * All prompts the studio agents send to the model are defined here for easy review and maintenance.
 */

// =============================================================================
// JSON SCHEMAS
// =============================================================================

/**
 * Schema for the three strategic directions offered after a brief is submitted
 */
export const DIRECTIONS_SCHEMA = {
    type: 'object',
    properties: {
        directions: {
            type: 'array',
            minItems: 3,
            maxItems: 3,
            items: {
                type: 'object',
                properties: {
                    key: { type: 'string', enum: ['A', 'B', 'C'] },
                    title: { type: 'string' },
                    description: { type: 'string' }
                },
                required: ['key', 'title', 'description']
            }
        }
    },
    required: ['directions']
};

/**
 * Schema for a direction expanded into a working strategy
 */
export const STRATEGY_SCHEMA = {
    type: 'object',
    properties: {
        positioning: { type: 'string' },
        pillars: { type: 'array', items: { type: 'string' } },
        tensions: { type: 'array', items: { type: 'string' } },
        principles: { type: 'array', items: { type: 'string' } }
    },
    required: ['positioning', 'pillars', 'tensions', 'principles']
};

/**
 * Schema for the Director's pick from the deliverable catalog
 */
export const DELIVERABLES_SCHEMA = {
    type: 'object',
    properties: {
        selected_keys: { type: 'array', items: { type: 'string' } }
    },
    required: ['selected_keys']
};

// =============================================================================
// AGENT SYSTEM PROMPTS
// =============================================================================

export const STRATEGIST_PROMPT = `You are a world-class Brand Strategist.

Analyze the client brief and identify 3 distinct strategic directions for the brand.
Each direction takes the brand somewhere fundamentally different (for example heritage, innovation, community).

Rules:
- Use keys "A", "B" and "C", in that order
- "title" is short and evocative (2-4 words)
- "description" is 2-3 sentences covering the focus and the vibe
- Respond with JSON matching the schema provided`;

export const CHIEF_STRATEGY_PROMPT = `You are a Chief Strategy Officer.

Expand the chosen strategic direction into a concrete brand strategy.

Rules:
- "positioning" is a single, powerful positioning statement
- "pillars": 3 short brand pillars (e.g. "Radical Transparency")
- "tensions": 3 strategic tensions (e.g. "Heritage vs. Innovation")
- "principles": 3 design principles (e.g. "Bold but Quiet")
- Respond with JSON matching the schema provided`;

export const DIRECTOR_PROMPT = `You are a Creative Director scoping a studio engagement.

Select the set of deliverables from the catalog that best serves the brief within the budget.
Prioritize the core assets this type of project cannot launch without.

Rules:
- Only use keys that appear in the catalog
- The summed cost of your selection must not exceed the budget
- Respond with JSON matching the schema provided`;

export const RESEARCH_WRITER_PROMPT = `You are a senior researcher at a brand strategy studio.

Write the requested document as semantic HTML body content only: <h2>, <h3>, <p>, <ul>, <table>.
No <html>, <head> or <body> tags, no Markdown, no commentary before or after.
Keep it professional, insightful and concise.`;

// =============================================================================
// DOCUMENT BRIEFS
// =============================================================================

export type DocumentKind =
    | 'market_landscape'
    | 'competitor_analysis'
    | 'brand_positioning'
    | 'target_audience'
    | 'brand_strategy_doc'
    | 'visual_direction_brief';

/**
 * Per-document instructions sent as the user prompt to RESEARCH_WRITER_PROMPT
 */
export const DOCUMENT_BRIEFS: Record<DocumentKind, (name: string, brief: string, context: string) => string> = {
    market_landscape: (name, brief) =>
        `Analyze the market landscape for ${name} (${brief}).
Cover: Industry Trends, Market Shifts, and Opportunities.`,

    competitor_analysis: (name, brief) =>
        `Analyze potential competitors for ${name} (${brief}).
Identify 3 archetypal competitors (Direct, Indirect, Aspirational) and the gaps they leave open.`,

    target_audience: (name, _brief, context) =>
        `Create a Target Audience Profile for ${name}.
Context: ${context}
Cover: Demographics, Psychographics, Pain Points, and "A Day in the Life".`,

    brand_positioning: (name, _brief, context) =>
        `Draft a Brand Positioning Report for ${name}.
Strategy: ${context}
Cover: The "Why", The "How", and The "What".`,

    brand_strategy_doc: (name, brief, context) =>
        `Write the Brand Strategy Document for ${name}.
Brief: ${brief}
Approved strategy: ${context}
Cover: Executive Summary, Strategic Framework, Go-to-Market Phases, Risks, and Year 1 Success Metrics.`,

    visual_direction_brief: (name, _brief, context) =>
        `Write a Visual Direction Brief for ${name} that translates the approved strategy into design language.
Approved strategy: ${context}
Cover: Design Philosophy, Color System, Typography, Photography & Art Direction, and Logo Direction.`,
};

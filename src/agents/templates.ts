import { escapeHtml } from '../export/html';
import type { DocumentKind } from '../prompts';

interface TemplateSection {
    heading: string;
    /** `{name}` is replaced with the escaped project name */
    points: string[];
}

interface DocumentTemplate {
    lead: string;
    sections: TemplateSection[];
}

const TEMPLATES: Record<DocumentKind, DocumentTemplate> = {
    market_landscape: {
        lead: 'Brief',
        sections: [
            { heading: 'Industry Trends', points: ['Where the category is heading and which shifts {name} can ride.', 'Signals from adjacent markets worth tracking.'] },
            { heading: 'Market Shifts', points: ['Changes in how customers discover, compare and buy.', 'Pressure on pricing and on differentiation.'] },
            { heading: 'Opportunities', points: ['Gaps incumbents leave open.', 'Positions {name} can own early.'] },
        ],
    },
    competitor_analysis: {
        lead: 'Brief',
        sections: [
            { heading: 'Direct Competitor', points: ['Offers the same thing to the same audience.', 'Compare on price, quality and reach.'] },
            { heading: 'Indirect Competitor', points: ['Solves the same need a different way.', 'Watch for audience overlap with {name}.'] },
            { heading: 'Aspirational Competitor', points: ['The brand {name} wants to be mentioned alongside.', 'Borrow its standards, not its look.'] },
        ],
    },
    target_audience: {
        lead: 'Strategy',
        sections: [
            { heading: 'Demographics', points: ['Age, location and income bands to validate.'] },
            { heading: 'Psychographics', points: ['Values and habits that make {name} relevant to them.'] },
            { heading: 'Pain Points', points: ['What frustrates them about current options.'] },
            { heading: 'A Day in the Life', points: ['Where {name} fits into an ordinary day.'] },
        ],
    },
    brand_positioning: {
        lead: 'Strategy',
        sections: [
            { heading: 'The Why', points: ['The belief {name} exists to prove.'] },
            { heading: 'The How', points: ['The way {name} delivers on that belief differently.'] },
            { heading: 'The What', points: ['The products and experiences customers actually touch.'] },
        ],
    },
    brand_strategy_doc: {
        lead: 'Approved Strategy',
        sections: [
            { heading: 'Strategic Framework', points: ['Market entry, revenue model and growth strategy for {name}.'] },
            { heading: 'Go-to-Market Phases', points: ['Foundation: identity, site and founding audience.', 'Establishment: public launch and steady cadence.', 'Expansion: new markets and partnerships.'] },
            { heading: 'Success Metrics', points: ['Year 1 targets agreed with the founder.'] },
        ],
    },
    visual_direction_brief: {
        lead: 'Approved Strategy',
        sections: [
            { heading: 'Design Philosophy', points: ['How the strategy should feel when {name} is seen, not read.'] },
            { heading: 'Color & Typography', points: ['A restrained palette with one signature accent.', 'An editorial display face paired with a humanist sans.'] },
            { heading: 'Logo Direction', points: ['Works as wordmark and symbol, legible at favicon size.'] },
        ],
    },
};

/**
 * Deterministic document body used when no model is configured.
 */
export function templateDocument(kind: DocumentKind, name: string, brief: string, context: string): string {
    const template = TEMPLATES[kind];
    const safeName = escapeHtml(name);
    const leadText = template.lead === 'Brief' ? brief : context || brief;

    const sections = template.sections.map(section => {
        const items = section.points
            .map(point => `  <li>${escapeHtml(point).replace(/\{name\}/g, safeName)}</li>`)
            .join('\n');
        return `<h2>${escapeHtml(section.heading)}</h2>\n<ul>\n${items}\n</ul>`;
    });

    return [
        `<div class="highlight"><p><strong>${template.lead}:</strong> ${escapeHtml(leadText)}</p></div>`,
        ...sections,
        '<hr>',
        `<p>This document is template-generated and should be validated for ${safeName}.</p>`,
    ].join('\n');
}

export function errorDocument(message: string): string {
    return `<p>Error generating content: ${escapeHtml(message)}</p>`;
}

import { describe, it, expect } from 'vitest';
import type { CatalogItem } from './catalog';
import {
    budgetAllocationBody,
    deliverableSelectionBody,
    money,
    parseChosenKeys,
    withRevisionNotes,
} from './transitions';

describe('transitions helpers', () => {
    describe('money', () => {
        it('should format whole dollars with separators', () => {
            expect(money(9200)).toBe('$9,200');
            expect(money(1234.6)).toBe('$1,235');
            expect(money(0)).toBe('$0');
        });
    });

    describe('withRevisionNotes', () => {
        it('should put the notes ahead of the brief', () => {
            expect(withRevisionNotes('A ceramics studio', ' Make it playful ')).toBe(
                'Revision notes:\nMake it playful\n---\n\nA ceramics studio'
            );
        });

        it('should return only the notes when there is no brief', () => {
            expect(withRevisionNotes('  ', 'Bolder')).toBe('Revision notes:\nBolder\n---');
        });
    });

    describe('parseChosenKeys', () => {
        it('should read a JSON array', () => {
            expect(parseChosenKeys('["website", " logo_system ", ""]')).toEqual(['website', 'logo_system']);
        });

        it('should read a comma-separated list', () => {
            expect(parseChosenKeys('website, logo_system,,social_kit')).toEqual(['website', 'logo_system', 'social_kit']);
        });

        it('should fall back to splitting a broken array', () => {
            expect(parseChosenKeys('[website')).toEqual(['[website']);
        });

        it('should stringify non-string array entries', () => {
            expect(parseChosenKeys('[1, 2]')).toEqual(['1', '2']);
        });
    });

    describe('deliverableSelectionBody', () => {
        const items: (CatalogItem & { selected: boolean })[] = [
            { key: 'logo', title: 'Logo', cost: 1500, phase: 'Design', time_est: '2 weeks', justification: 'Recognition.', selected: true },
            { key: 'site', title: 'Website', cost: 2500, phase: 'Production', time_est: '3 weeks', justification: 'Storefront.', selected: false },
        ];

        it('should show the budget and list only selected items', () => {
            const body = deliverableSelectionBody(2000, items, 1500, 500);
            const lines = body.split('\n');

            expect(lines).toContain('**Budget:** $2,000 · **Estimated scope cost:** $1,500 · **Remaining:** $500');
            expect(lines).toContain('| **Logo** | $1,500 | 2 weeks | Recognition. |');
            expect(lines.some(line => line.includes('Website'))).toBe(false);
            expect(lines).toContain('Scope fits your budget. Review and adjust as needed.');
        });

        it('should suggest adding scope when more than $500 is left', () => {
            const body = deliverableSelectionBody(5000, items, 1500, 3500);

            expect(body.split('\n')).toContain('Budget has room. You could add custom deliverables or increase scope.');
        });

        it('should explain an unset budget', () => {
            const body = deliverableSelectionBody(0, items, 4000, 0);

            expect(body.split('\n')).toContain('**Budget:** Not set. Showing full recommended scope.');
        });
    });

    describe('budgetAllocationBody', () => {
        it('should approve scope within budget', () => {
            const body = budgetAllocationBody(['Logo ($1,500)', 'Launch party (custom)'], 1500, 2000);

            expect(body).toBe([
                '**Deliverables Confirmed**: 2 items locked in.',
                '',
                '- Logo ($1,500)',
                '- Launch party (custom)',
                '',
                '---',
                '',
                '**Total estimated cost:** $1,500',
                '**Project budget:** $2,000',
                '**Remaining budget:** $500',
                '**Projected margin:** 25%',
                '',
                'Budget allocation approved. Design phase begins.',
            ].join('\n'));
        });

        it('should flag scope over budget', () => {
            const body = budgetAllocationBody(['Website ($2,500)'], 2500, 2000);

            expect(body.split('\n')).toContain('**Projected margin:** -25%');
            expect(body.endsWith('Scope exceeds budget by $500. Consider adjusting scope or increasing budget.')).toBe(true);
        });

        it('should report N/A without a budget', () => {
            const lines = budgetAllocationBody([], 0, 0).split('\n');

            expect(lines).toContain('**Project budget:** Not set');
            expect(lines).toContain('**Remaining budget:** N/A');
            expect(lines).toContain('**Projected margin:** N/A');
        });
    });
});

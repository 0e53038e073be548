import { describe, it, expect } from 'vitest';
import type { Document, Project, Risk, Task } from '../db/types';
import { escapeHtml, renderPage } from './html';
import { formatExportDate, renderStrategyExport } from './strategyExport';

function makeProject(overrides: Partial<Project> = {}): Project {
    return {
        id: 'p1',
        name: 'Kiln & Co',
        category: 'Brand Identity',
        client: null,
        stage: 'Strategy',
        status: 'Strategy',
        review_status: 'PENDING',
        budget_cap: 12500,
        invoiced_total: 0,
        internal_cost: 0,
        client_brief: '',
        executive_summary: null,
        strategic_tensions: '["Craft vs Scale"]',
        design_principles: '[]',
        created_at: '2025-01-01T00:00:00.000Z',
        updated_at: '2025-01-01T00:00:00.000Z',
        ...overrides,
    };
}

const EXPORTED_AT = new Date('2025-03-14T12:00:00.000Z');

describe('escapeHtml', () => {
    it('should escape markup and quotes', () => {
        expect(escapeHtml(`<a href="x">Tom's</a> & co`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom&#39;s&lt;/a&gt; &amp; co');
    });
});

describe('renderPage', () => {
    it('should escape the title but keep the body markup', () => {
        const page = renderPage('R&D <Plan>', 'Strategy · version 2', '<h2>Body</h2>');

        expect(page).toContain('<title>R&amp;D &lt;Plan&gt;</title>');
        expect(page).toContain('<div class="meta">Strategy · version 2</div>\n<h2>Body</h2>\n</body>');
    });
});

describe('renderStrategyExport', () => {
    it('should format the export date in UTC', () => {
        expect(formatExportDate(EXPORTED_AT)).toBe('March 14, 2025');
    });

    it('should show placeholders for an empty project', () => {
        const html = renderStrategyExport({ project: makeProject(), documents: [], tasks: [], risks: [], exportedAt: EXPORTED_AT });
        const lines = html.split('\n');

        expect(lines).toContain('<h1>Kiln &amp; Co</h1>');
        expect(lines).toContain('  <strong>Client:</strong> N/A &nbsp;|&nbsp;');
        expect(lines).toContain('  <strong>Budget:</strong> $12,500');
        expect(lines).toContain('<p>Awaiting strategy generation…</p>');
        expect(lines).toContain('<h2>Strategic Tensions</h2>');
        expect(lines).toContain('<ul><li>Craft vs Scale</li></ul>');
        expect(lines).not.toContain('<h2>Design Principles</h2>');
        expect(lines).toContain('<p class="empty">No documents generated yet.</p>');
        expect(lines).toContain('<p class="empty">No tasks assigned yet.</p>');
        expect(lines).toContain('  Exported from Founder Studio &middot; March 14, 2025');
    });

    it('should embed documents, tasks and active risks', () => {
        const documents: Document[] = [{
            id: 'd1', project_id: 'p1', name: 'Positioning <v2>', category: 'Strategy', doc_type: 'html',
            content: '<h2>Why</h2>', version: 2, updated_at: '2025-03-01T00:00:00.000Z',
        }];
        const tasks: Task[] = [
            { id: 't1', project_id: 'p1', title: 'Approve pillars', priority: 'High', status: 'Done', phase: 'strategy', due_date: null, created_at: '' },
            { id: 't2', project_id: 'p1', title: 'Book shoot', priority: 'Normal', status: 'Todo', phase: null, due_date: null, created_at: '' },
        ];
        const risks: Risk[] = [
            { id: 'r1', project_id: 'p1', description: 'Kiln delays', severity: 'High', category: 'Timeline', status: 'Active' },
            { id: 'r2', project_id: 'p1', description: 'Old issue', severity: 'Low', category: 'General', status: 'Mitigated' },
        ];

        const html = renderStrategyExport({
            project: makeProject({ executive_summary: 'Disruptor: bold' }),
            documents,
            tasks,
            risks,
            exportedAt: EXPORTED_AT,
        });
        const lines = html.split('\n');

        expect(lines).toContain('<p>Disruptor: bold</p>');
        expect(lines).toContain('<div class="doc-section"><h3>Positioning &lt;v2&gt;</h3><p class="doc-cat">Strategy</p><div><h2>Why</h2></div></div>');
        expect(lines).toContain('<tr><td>✓</td><td>Approve pillars</td><td>High</td></tr>');
        expect(lines).toContain('<tr><td>○</td><td>Book shoot</td><td>Normal</td></tr>');
        expect(lines).toContain('<ul><li>Kiln delays (High)</li></ul>');
    });
});

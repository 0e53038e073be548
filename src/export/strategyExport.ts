import type { Document, Project, Risk, Task } from '../db/types';
import { parseStringList } from '../db/values';
import { escapeHtml } from './html';

export interface StrategyExportInput {
    project: Project;
    documents: Document[];
    tasks: Task[];
    risks: Risk[];
    exportedAt?: Date;
}

const EXPORT_STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, sans-serif; max-width: 800px; margin: 40px auto; padding: 0 24px; color: #1d1d1f; line-height: 1.6; }
  h1 { font-size: 2rem; font-weight: 700; border-bottom: 2px solid #0071e3; padding-bottom: 8px; }
  h2 { font-size: 1.25rem; color: #6e6e73; margin-top: 32px; }
  h3 { font-size: 1rem; margin-top: 20px; }
  .meta { color: #86868b; font-size: 0.875rem; margin-bottom: 32px; }
  .doc-section { background: #f5f5f7; padding: 16px 20px; border-radius: 8px; margin: 12px 0; }
  .doc-cat { font-size: 0.75rem; color: #86868b; margin: 2px 0 8px; }
  .empty { color: #86868b; }
  table { width: 100%; border-collapse: collapse; margin: 12px 0; }
  th, td { text-align: left; padding: 8px 12px; border-bottom: 1px solid rgba(0,0,0,0.08); font-size: 0.875rem; }
  .footer { margin-top: 48px; padding-top: 16px; border-top: 1px solid rgba(0,0,0,0.08); font-size: 0.75rem; color: #aeaeb2; }
  @media print { body { margin: 0; } }
`;

function listSection(title: string, items: string[]): string {
    if (items.length === 0) return '';
    return `<h2>${title}</h2>\n<ul>${items.map(item => `<li>${escapeHtml(item)}</li>`).join('')}</ul>`;
}

export function formatExportDate(date: Date): string {
    return date.toLocaleDateString('en-US', { month: 'long', day: 'numeric', year: 'numeric', timeZone: 'UTC' });
}

/**
 * Printable one-page summary of a project's strategy. Document bodies are
 * stored HTML and are embedded as is; every other value is escaped.
 */
export function renderStrategyExport({ project, documents, tasks, risks, exportedAt = new Date() }: StrategyExportInput): string {
    const budget = `$${project.budget_cap.toLocaleString('en-US', { maximumFractionDigits: 0 })}`;

    const docSections = documents
        .map(doc => `<div class="doc-section"><h3>${escapeHtml(doc.name)}</h3><p class="doc-cat">${escapeHtml(doc.category)}</p><div>${doc.content ?? ''}</div></div>`)
        .join('\n');

    const taskRows = tasks
        .map(task => `<tr><td>${task.status === 'Done' ? '✓' : '○'}</td><td>${escapeHtml(task.title)}</td><td>${task.priority}</td></tr>`)
        .join('\n');

    const activeRisks = risks
        .filter(risk => risk.status === 'Active')
        .map(risk => `${risk.description} (${risk.severity})`);

    return `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>${escapeHtml(project.name)} | Strategy Export</title>
<style>${EXPORT_STYLES}</style></head><body>
<h1>${escapeHtml(project.name)}</h1>
<div class="meta">
  <strong>Client:</strong> ${escapeHtml(project.client || 'N/A')} &nbsp;|&nbsp;
  <strong>Category:</strong> ${escapeHtml(project.category || 'N/A')} &nbsp;|&nbsp;
  <strong>Stage:</strong> ${project.stage} &nbsp;|&nbsp;
  <strong>Budget:</strong> ${budget}
</div>

<h2>Executive Summary</h2>
<p>${escapeHtml(project.executive_summary || 'Awaiting strategy generation…')}</p>

${listSection('Strategic Tensions', parseStringList(project.strategic_tensions))}
${listSection('Design Principles', parseStringList(project.design_principles))}
${listSection('Active Risks', activeRisks)}

<h2>Documents</h2>
${docSections || '<p class="empty">No documents generated yet.</p>'}

<h2>Task List</h2>
${taskRows ? `<table><tr><th></th><th>Task</th><th>Priority</th></tr>\n${taskRows}\n</table>` : '<p class="empty">No tasks assigned yet.</p>'}

<div class="footer">
  Exported from Founder Studio &middot; ${formatExportDate(exportedAt)}
</div>
</body></html>
`;
}

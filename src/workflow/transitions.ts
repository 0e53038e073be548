import type { ContentGenerators, StrategicDirection } from '../agents/StudioAgents';
import { fallbackDirections } from '../agents/StudioAgents';
import type { LogSeverity, Project, ProjectPatch, StepOption, TaskPriority, WorkflowStep } from '../db/types';
import type { DocumentKind } from '../prompts';
import type { CatalogItem } from './catalog';
import { selectDeliverables } from './selection';
import type { StateId } from './states';

export const RESOLVE_ACTIONS = ['input', 'choose', 'approve', 'reject'] as const;
export type ResolveAction = typeof RESOLVE_ACTIONS[number];

export interface StepDraft {
    state: StateId;
    body: string;
    options?: StepOption[];
    /** Milestones are created already resolved */
    resolved?: boolean;
}

export interface DocumentDraft {
    name: string;
    category: string;
    content: string;
}

export interface TaskDraft {
    title: string;
    priority: TaskPriority;
    phase: string;
    dueInDays: number;
}

export interface DeliverableDraft {
    title: string;
    owner: string;
    cost: number;
}

export interface LogDraft {
    agent: string;
    message: string;
    severity?: LogSeverity;
}

/**
 * Everything one resolution changes. Built before any write happens and
 * applied by the engine as a single unit.
 */
export interface TransitionResult {
    readonly projectPatch: Readonly<ProjectPatch>;
    readonly steps: readonly StepDraft[];
    readonly documents: readonly DocumentDraft[];
    readonly tasks: readonly TaskDraft[];
    readonly deliverables: readonly DeliverableDraft[];
    readonly logs: readonly LogDraft[];
}

export interface TransitionContext {
    project: Project;
    step: WorkflowStep;
    action: ResolveAction;
    chosenOption: string | null;
    inputText: string | null;
    agents: ContentGenerators;
    catalog: readonly CatalogItem[];
    /** Titles of tasks the project already has */
    existingTaskTitles: ReadonlySet<string>;
}

export type Transition = (context: TransitionContext) => Promise<TransitionResult>;

function result(partial: Partial<TransitionResult>): TransitionResult {
    return Object.freeze({
        projectPatch: Object.freeze({ ...partial.projectPatch }),
        steps: Object.freeze([...(partial.steps ?? [])]),
        documents: Object.freeze([...(partial.documents ?? [])]),
        tasks: Object.freeze([...(partial.tasks ?? [])]),
        deliverables: Object.freeze([...(partial.deliverables ?? [])]),
        logs: Object.freeze([...(partial.logs ?? [])]),
    });
}

export function money(amount: number): string {
    return `$${amount.toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

function bullets(items: readonly string[]): string {
    return items.map(item => `- ${item}`).join('\n');
}

/**
 * Puts the founder's revision notes ahead of the brief they revise.
 */
export function withRevisionNotes(brief: string, feedback: string): string {
    const notes = `Revision notes:\n${feedback.trim()}\n---`;
    if (!brief.trim()) {
        return notes;
    }
    return `${notes}\n\n${brief.trim()}`;
}

function isDirection(option: StepOption): option is StepOption & StrategicDirection {
    return typeof option.key === 'string' && typeof option.title === 'string' && typeof option.description === 'string';
}

function directionOptions(directions: readonly StrategicDirection[]): StepOption[] {
    return directions.map(d => ({ key: d.key, title: d.title, description: d.description }));
}

function onceTasks(titles: readonly string[], existing: ReadonlySet<string>, priority: TaskPriority, phase: string, dueInDays: number): TaskDraft[] {
    return titles
        .filter(title => !existing.has(title))
        .map(title => ({ title, priority, phase, dueInDays }));
}

async function generateDocuments(
    agents: ContentGenerators,
    project: Project,
    brief: string,
    context: string,
    docs: { kind: DocumentKind; name: string; category: string }[]
): Promise<DocumentDraft[]> {
    const drafts: DocumentDraft[] = [];
    for (const doc of docs) {
        const content = await agents.generateDocument(doc.kind, project.name, brief, context);
        drafts.push({ name: doc.name, category: doc.category, content });
    }
    return drafts;
}

function directionStepBody(project: Project, brief: string): string {
    return `Based on the brief "${brief}", I've analyzed the market positioning, audience signals, and competitive landscape for **${project.name}**. Here are 3 distinct strategic directions, each leading to a different brand architecture and visual language. Choose the one that resonates most with your vision.`;
}

// =============================================================================
// STRATEGY PHASE
// =============================================================================

const submitBrief: Transition = async ({ project, inputText, agents, existingTaskTitles }) => {
    const input = inputText?.trim() || null;
    const brief = input || project.client_brief || project.name;

    const directions = await agents.generateDirections(project.name, brief);
    const documents = await generateDocuments(agents, project, brief, '', [
        { kind: 'market_landscape', name: 'Market Landscape Analysis', category: 'Strategy' },
        { kind: 'competitor_analysis', name: 'Competitive Analysis', category: 'Strategy' },
    ]);

    return result({
        projectPatch: {
            ...(input ? { client_brief: input } : {}),
            review_status: 'PENDING',
            stage: 'Strategy',
        },
        steps: [{ state: 'strategic_direction', body: directionStepBody(project, brief), options: directionOptions(directions) }],
        documents,
        tasks: onceTasks(
            ['Phase 1: Review Market Analysis', 'Phase 1: Select Strategic Direction'],
            existingTaskTitles, 'High', 'strategy', 2
        ),
        logs: [{ agent: 'Strategist', message: `Generated ${directions.length} strategic directions for ${project.name}` }],
    });
};

const chooseDirection: Transition = async ({ project, step, chosenOption, agents, existingTaskTitles }) => {
    const chosenKey = chosenOption?.trim() || 'A';
    const options = step.options.filter(isDirection);
    const direction: StrategicDirection =
        options.find(option => option.key === chosenKey) ?? options[0] ?? fallbackDirections(project.name)[0];

    const brief = project.client_brief || project.name;
    const strategy = await agents.expandStrategy(project.name, brief, direction);
    const summary = `${strategy.positioning} | Pillars: ${strategy.pillars.join(', ')}`;

    const body = `## ${direction.title}: Expanded Strategy for ${project.name}

**Positioning**: ${strategy.positioning}

**Brand Pillars**:
${bullets(strategy.pillars)}

**Strategic Tensions**:
${bullets(strategy.tensions)}

**Design Principles**:
${bullets(strategy.principles)}`;

    const documents = await generateDocuments(agents, project, brief, summary, [
        { kind: 'brand_positioning', name: 'Brand Positioning Report', category: 'Strategy' },
        { kind: 'target_audience', name: 'Target Audience Profile', category: 'Strategy' },
    ]);

    return result({
        projectPatch: {
            executive_summary: `${direction.title}: ${direction.description}`,
            strategic_tensions: JSON.stringify(strategy.tensions),
            design_principles: JSON.stringify(strategy.principles),
        },
        steps: [{
            state: 'strategy_review',
            body,
            options: [
                { key: 'approve', title: 'Approve & proceed to planning' },
                { key: 'revise', title: 'Request revisions' },
            ],
        }],
        documents,
        tasks: onceTasks(
            ['Phase 2: Review Full Strategy', 'Phase 2: Approve Brand Pillars'],
            existingTaskTitles, 'High', 'strategy', 3
        ),
        logs: [{ agent: 'Strategist', message: `Expanded direction "${direction.title}" into a full strategy` }],
    });
};

export function deliverableSelectionBody(budget: number, items: readonly (CatalogItem & { selected: boolean })[], total: number, remaining: number): string {
    let budgetLine: string;
    let budgetNote: string;
    if (budget > 0) {
        budgetLine = `**Budget:** ${money(budget)} · **Estimated scope cost:** ${money(total)} · **Remaining:** ${money(remaining)}`;
        if (remaining > 500) {
            budgetNote = 'Budget has room. You could add custom deliverables or increase scope.';
        } else {
            budgetNote = 'Scope fits your budget. Review and adjust as needed.';
        }
    } else {
        budgetLine = '**Budget:** Not set. Showing full recommended scope.';
        budgetNote = 'No budget set. All deliverables are included. Set a budget in project settings to enable cost tracking.';
    }

    const rows = items
        .filter(item => item.selected)
        .map(item => `| **${item.title}** | ${money(item.cost)} | ${item.time_est} | ${item.justification} |`);
    const auditTable = ['| Item | Cost | Time | Rationale |', '| :--- | :--- | :--- | :--- |', ...rows].join('\n');

    return `Based on the approved strategy and a budget analysis, here is the justified scope breakdown:

${budgetLine}

### Recommended Scope Audit
${auditTable}

${budgetNote}

Review the full selection below to approve or adjust.`;
}

const reviewStrategy: Transition = async ({ project, action, chosenOption, agents, catalog }) => {
    const approved = action === 'approve' || chosenOption === 'approve';

    if (!approved) {
        return result({
            projectPatch: { review_status: 'REJECTED' },
            steps: [{
                state: 'strategy_revisions',
                body: 'What would you like me to change about the strategic direction? Please describe what feels off or what you\'d like to emphasize differently.',
            }],
            logs: [{ agent: 'Strategist', message: `Strategy for ${project.name} sent back for revisions`, severity: 'WARN' }],
        });
    }

    const brief = project.client_brief;
    const documents = await generateDocuments(agents, project, brief, project.executive_summary ?? '', [
        { kind: 'brand_strategy_doc', name: 'Brand Strategy Document', category: 'Strategy' },
        { kind: 'visual_direction_brief', name: 'Visual Direction Brief', category: 'Design' },
    ]);

    const budget = project.budget_cap;
    const recommended = await agents.recommendDeliverables(project.name, brief, budget, catalog);
    const selection = selectDeliverables(catalog, budget, recommended);

    const options: StepOption[] = selection.items.map(item => ({
        key: item.key,
        title: item.title,
        cost: item.cost,
        phase: item.phase,
        time_est: item.time_est,
        justification: item.justification,
        selected: item.selected,
    }));

    return result({
        projectPatch: { review_status: 'PENDING' },
        steps: [
            { state: 'strategy_complete', body: '✓ Strategic direction approved. Moving to production planning.', resolved: true },
            {
                state: 'deliverable_selection',
                body: deliverableSelectionBody(budget, selection.items, selection.total_estimated, selection.remaining),
                options,
            },
        ],
        documents,
        logs: [{
            agent: 'Director',
            message: `Proposed ${selection.items.filter(item => item.selected).length} deliverables (${money(selection.total_estimated)}) for ${project.name}`,
        }],
    });
};

const reviseStrategy: Transition = async ({ project, inputText, agents }) => {
    const feedback = inputText?.trim() ?? '';
    const baseBrief = project.client_brief || project.name;
    const brief = feedback ? withRevisionNotes(baseBrief, feedback) : baseBrief;

    const directions = await agents.generateDirections(project.name, brief);

    return result({
        steps: [{ state: 'strategic_direction', body: directionStepBody(project, baseBrief), options: directionOptions(directions) }],
        logs: [{ agent: 'Strategist', message: `Generated revised strategic directions for ${project.name}` }],
    });
};

// =============================================================================
// DESIGN PHASE
// =============================================================================

/**
 * Accepts a JSON array of keys or a comma-separated list.
 */
export function parseChosenKeys(raw: string): string[] {
    const trimmed = raw.trim();
    const splitList = (): string[] => trimmed.split(',').map(key => key.trim()).filter(key => key.length > 0);
    if (!trimmed.startsWith('[')) {
        return splitList();
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(trimmed);
    } catch {
        return splitList();
    }
    if (!Array.isArray(parsed)) {
        return splitList();
    }
    return parsed.map(key => String(key).trim()).filter(key => key.length > 0);
}

function catalogOption(option: StepOption): { key: string; title: string; cost: number; selected: boolean } | null {
    if (typeof option.key !== 'string' || typeof option.title !== 'string') {
        return null;
    }
    const cost = typeof option.cost === 'number' && Number.isFinite(option.cost) ? option.cost : 0;
    return { key: option.key, title: option.title, cost, selected: option.selected === true };
}

export function budgetAllocationBody(lines: readonly string[], totalCost: number, budget: number): string {
    const remaining = budget > 0 ? budget - totalCost : 0;
    const margin = budget > 0 ? Math.round(((budget - totalCost) / budget) * 100) : 0;
    const verdict = remaining >= 0
        ? 'Budget allocation approved. Design phase begins.'
        : `Scope exceeds budget by ${money(Math.abs(remaining))}. Consider adjusting scope or increasing budget.`;

    return `**Deliverables Confirmed**: ${lines.length} items locked in.

${bullets(lines)}

---

**Total estimated cost:** ${money(totalCost)}
**Project budget:** ${budget > 0 ? money(budget) : 'Not set'}
**Remaining budget:** ${budget > 0 ? money(remaining) : 'N/A'}
**Projected margin:** ${budget > 0 ? `${margin}%` : 'N/A'}

${verdict}`;
}

const confirmDeliverables: Transition = async ({ project, step, chosenOption, inputText }) => {
    const catalog = step.options.map(catalogOption).filter((item): item is NonNullable<typeof item> => item !== null);
    const chosenKeys = chosenOption?.trim()
        ? new Set(parseChosenKeys(chosenOption))
        : new Set(catalog.filter(item => item.selected).map(item => item.key));

    const deliverables: DeliverableDraft[] = [];
    const lines: string[] = [];
    let totalCost = 0;

    for (const item of catalog) {
        if (!chosenKeys.has(item.key)) continue;
        deliverables.push({ title: item.title, owner: 'Agent', cost: item.cost });
        totalCost += item.cost;
        lines.push(`${item.title} (${money(item.cost)})`);
    }

    const custom = (inputText ?? '').split(',').map(title => title.trim()).filter(title => title.length > 0);
    for (const title of custom) {
        deliverables.push({ title, owner: 'Founder', cost: 0 });
        lines.push(`${title} (custom)`);
    }

    return result({
        projectPatch: { stage: 'Design', status: 'Design', review_status: 'APPROVED' },
        steps: [
            { state: 'deliverables_confirmed', body: `✓ ${lines.length} deliverables created. Moving to Design phase.`, resolved: true },
            { state: 'budget_allocation', body: budgetAllocationBody(lines, totalCost, project.budget_cap) },
        ],
        deliverables,
        logs: [{ agent: 'CFO', message: `Locked ${lines.length} deliverables at ${money(totalCost)} for ${project.name}` }],
    });
};

/**
 * Transitions by the state being resolved. States without an entry
 * (milestones, Budget Allocation) advance nothing.
 */
export const TRANSITIONS: Partial<Record<StateId, Transition>> = {
    project_brief: submitBrief,
    strategic_direction: chooseDirection,
    strategy_review: reviewStrategy,
    strategy_revisions: reviseStrategy,
    deliverable_selection: confirmDeliverables,
};

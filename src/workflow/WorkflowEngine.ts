import type { ContentGenerators } from '../agents/StudioAgents';
import { withTransaction } from '../db/database';
import {
    ActivityLogRepo,
    DeliverableRepo,
    DocumentRepo,
    ProjectRepo,
    TaskRepo,
    WorkflowStepRepo,
} from '../db/repositories';
import type { Project, WorkflowStep } from '../db/types';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import type { CatalogItem } from './catalog';
import { getStateDefinition, stateOf } from './states';
import { RESOLVE_ACTIONS, type ResolveAction, TRANSITIONS, type TransitionResult } from './transitions';

export interface ResolveRequest {
    step_id: string;
    action: string;
    chosen_option?: string | null;
    input_text?: string | null;
}

export interface ResolveResult {
    status: 'resolved';
    step_id: string;
    next_steps_created: number;
    /** 'none' when the resolved state has no outgoing transition */
    transition: 'applied' | 'none';
    steps: WorkflowStep[];
}

export type SeedResult =
    | { status: 'seeded'; step_id: string }
    | { status: 'exists'; message: string };

const DAY_MS = 24 * 60 * 60 * 1000;

function isResolveAction(value: string): value is ResolveAction {
    return RESOLVE_ACTIONS.some(action => action === value);
}

function briefPrompt(project: Project): string {
    return `Welcome to ${project.name}. Before I can begin strategic analysis, I need to understand what we're building.

Describe the project in your own words: the vision, the audience, what makes it different. Don't worry about being polished; raw intent is more useful than corporate language.`;
}

/**
 * Advances a project's workflow one founder decision at a time.
 */
export class WorkflowEngine {
    constructor(
        private agents: ContentGenerators,
        private catalog: readonly CatalogItem[],
        private debug: boolean = false
    ) {}

    private log(...args: unknown[]): void {
        if (this.debug) {
            console.log('[WorkflowEngine]', ...args);
        }
    }

    private requireProject(projectId: string): Project {
        const project = ProjectRepo.get(projectId);
        if (!project) {
            throw new NotFoundError(`Project ${projectId} not found`);
        }
        return project;
    }

    /**
     * Steps in display order, oldest first
     */
    getWorkflow(projectId: string): WorkflowStep[] {
        this.requireProject(projectId);
        return WorkflowStepRepo.listByProject(projectId);
    }

    /**
     * Creates the opening "Project Brief" step. A project that already has
     * steps is left alone.
     */
    seed(projectId: string): SeedResult {
        const project = this.requireProject(projectId);

        if (WorkflowStepRepo.countByProject(projectId) > 0) {
            return { status: 'exists', message: 'Workflow already initialized' };
        }

        const def = getStateDefinition('project_brief');
        const step = WorkflowStepRepo.create({
            project_id: projectId,
            state_id: def.id,
            step_type: def.stepType,
            agent: def.agent,
            title: def.title,
            body: briefPrompt(project),
            phase: def.phase,
            sort_order: 0,
        });
        this.log('Seeded workflow for', project.name);
        return { status: 'seeded', step_id: step.id };
    }

    /**
     * Resolves the active step and applies whatever its state produces.
     * Content is generated first; every write then happens in one transaction.
     */
    async resolve(projectId: string, request: ResolveRequest): Promise<ResolveResult> {
        const action = request.action.trim();
        if (!isResolveAction(action)) {
            throw new ValidationError(`Unknown action "${request.action}". Expected one of: ${RESOLVE_ACTIONS.join(', ')}`);
        }

        const step = WorkflowStepRepo.get(request.step_id);
        if (!step || step.project_id !== projectId) {
            throw new NotFoundError('Step not found');
        }
        const project = this.requireProject(projectId);
        if (step.status !== 'active') {
            throw new ConflictError(`Step "${step.title}" is already resolved`);
        }

        const chosenOption = request.chosen_option?.trim() || null;
        const inputText = request.input_text?.trim() || null;

        const state = stateOf(step);
        const transition = state ? TRANSITIONS[state] : undefined;
        let outcome: TransitionResult | null = null;

        if (transition) {
            const existingTaskTitles = new Set(TaskRepo.list({ project_id: projectId }).map(task => task.title));
            outcome = await transition({
                project,
                step,
                action,
                chosenOption,
                inputText,
                agents: this.agents,
                catalog: this.catalog,
                existingTaskTitles,
            });
        } else {
            console.warn(`[WorkflowEngine] No transition for step "${step.title}" (${step.step_type}); nothing to advance`);
        }

        const created = withTransaction(() => {
            const current = WorkflowStepRepo.get(step.id);
            if (!current || current.status !== 'active') {
                throw new ConflictError(`Step "${step.title}" was resolved while content was being generated`);
            }

            const now = new Date();
            WorkflowStepRepo.resolve(step.id, chosenOption || inputText || action, now.toISOString());

            return outcome ? this.apply(project, step, outcome, now) : [];
        });

        this.log(`Resolved "${step.title}" with ${action}; created ${created.length} step(s)`);

        return {
            status: 'resolved',
            step_id: step.id,
            next_steps_created: created.length,
            transition: outcome ? 'applied' : 'none',
            steps: created,
        };
    }

    private apply(project: Project, step: WorkflowStep, outcome: TransitionResult, now: Date): WorkflowStep[] {
        if (Object.keys(outcome.projectPatch).length > 0) {
            ProjectRepo.update(project.id, outcome.projectPatch);
        }

        const created = outcome.steps.map((draft, index) => {
            const def = getStateDefinition(draft.state);
            return WorkflowStepRepo.create({
                project_id: project.id,
                state_id: def.id,
                step_type: def.stepType,
                agent: def.agent,
                title: def.title,
                body: draft.body,
                options: draft.options,
                status: draft.resolved ? 'resolved' : 'active',
                phase: def.phase,
                sort_order: step.sort_order + index + 1,
                resolved_at: draft.resolved ? now.toISOString() : null,
            });
        });

        for (const doc of outcome.documents) {
            DocumentRepo.create({
                project_id: project.id,
                name: doc.name,
                category: doc.category,
                doc_type: 'html',
                content: doc.content,
            });
        }

        for (const task of outcome.tasks) {
            TaskRepo.create({
                project_id: project.id,
                title: task.title,
                priority: task.priority,
                phase: task.phase,
                due_date: new Date(now.getTime() + task.dueInDays * DAY_MS).toISOString(),
            });
        }

        for (const deliverable of outcome.deliverables) {
            DeliverableRepo.create({
                project_id: project.id,
                title: deliverable.title,
                owner: deliverable.owner,
                cost: deliverable.cost,
            });
        }

        for (const entry of outcome.logs) {
            ActivityLogRepo.append({
                project_id: project.id,
                agent: entry.agent,
                message: entry.message,
                severity: entry.severity,
            });
        }

        return created;
    }
}

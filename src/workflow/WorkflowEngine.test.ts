import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StudioAgents } from '../agents/StudioAgents';
import {
    ActivityLogRepo,
    closeDatabase,
    DeliverableRepo,
    DocumentRepo,
    initDatabase,
    ProjectRepo,
    TaskRepo,
    WorkflowStepRepo,
} from '../db';
import type { Project, WorkflowStep } from '../db/types';
import type { LlmClient } from '../llm';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { loadCatalog } from './catalog';
import { WorkflowEngine } from './WorkflowEngine';

const BRIEF = 'A ceramics studio for city dwellers';

describe('WorkflowEngine', () => {
    let agents: StudioAgents;
    let engine: WorkflowEngine;
    let project: Project;

    beforeEach(async () => {
        await initDatabase(null);
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        agents = new StudioAgents(null);
        engine = new WorkflowEngine(agents, loadCatalog());
        project = ProjectRepo.create({ name: 'Kiln', budget_cap: 3000 });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        closeDatabase();
    });

    function activeStep(): WorkflowStep {
        const active = WorkflowStepRepo.listActive(project.id);
        expect(active).toHaveLength(1);
        return active[0];
    }

    async function submitBrief(): Promise<WorkflowStep> {
        engine.seed(project.id);
        await engine.resolve(project.id, { step_id: activeStep().id, action: 'input', input_text: BRIEF });
        return activeStep();
    }

    async function reachStrategyReview(): Promise<WorkflowStep> {
        const direction = await submitBrief();
        await engine.resolve(project.id, { step_id: direction.id, action: 'choose', chosen_option: 'B' });
        return activeStep();
    }

    async function reachDeliverableSelection(): Promise<WorkflowStep> {
        const review = await reachStrategyReview();
        await engine.resolve(project.id, { step_id: review.id, action: 'approve' });
        return activeStep();
    }

    describe('seed', () => {
        it('should create the Project Brief step once', () => {
            const first = engine.seed(project.id);
            const second = engine.seed(project.id);

            expect(first.status).toBe('seeded');
            expect(second).toEqual({ status: 'exists', message: 'Workflow already initialized' });

            const steps = engine.getWorkflow(project.id);
            expect(steps).toHaveLength(1);
            expect(steps[0]).toMatchObject({
                state_id: 'project_brief',
                step_type: 'input_needed',
                agent: 'Strategist',
                title: 'Project Brief',
                status: 'active',
                sort_order: 0,
            });
        });

        it('should reject an unknown project', () => {
            expect(() => engine.seed('missing')).toThrow(NotFoundError);
            expect(() => engine.getWorkflow('missing')).toThrow(NotFoundError);
        });
    });

    describe('Project Brief', () => {
        it('should store the brief and offer three directions', async () => {
            engine.seed(project.id);
            const brief = activeStep();

            const result = await engine.resolve(project.id, { step_id: brief.id, action: 'input', input_text: `  ${BRIEF}  ` });

            expect(result).toMatchObject({ status: 'resolved', step_id: brief.id, next_steps_created: 1, transition: 'applied' });
            expect(result.steps[0]).toMatchObject({ state_id: 'strategic_direction', step_type: 'decision_gate', sort_order: 1 });
            expect(result.steps[0].options.map(o => o.key)).toEqual(['A', 'B', 'C']);

            expect(WorkflowStepRepo.get(brief.id)).toMatchObject({ status: 'resolved', chosen_option: BRIEF });
            expect(ProjectRepo.get(project.id)).toMatchObject({ client_brief: BRIEF, stage: 'Strategy', review_status: 'PENDING' });
            expect(DocumentRepo.listByProject(project.id).map(d => [d.name, d.category, d.doc_type])).toEqual([
                ['Market Landscape Analysis', 'Strategy', 'html'],
                ['Competitive Analysis', 'Strategy', 'html'],
            ]);
            expect(TaskRepo.list({ project_id: project.id }).map(t => [t.title, t.priority, t.phase])).toEqual([
                ['Phase 1: Review Market Analysis', 'High', 'strategy'],
                ['Phase 1: Select Strategic Direction', 'High', 'strategy'],
            ]);
            expect(ActivityLogRepo.recent(1, project.id)[0]).toMatchObject({
                agent: 'Strategist',
                message: 'Generated 3 strategic directions for Kiln',
            });
        });

        it('should keep the stored brief when no input is given', async () => {
            ProjectRepo.update(project.id, { client_brief: 'Existing brief' });
            engine.seed(project.id);

            await engine.resolve(project.id, { step_id: activeStep().id, action: 'input' });

            expect(ProjectRepo.get(project.id)?.client_brief).toBe('Existing brief');
        });
    });

    describe('Strategic Direction', () => {
        it('should expand the chosen direction and ask for review', async () => {
            const direction = await submitBrief();

            const result = await engine.resolve(project.id, { step_id: direction.id, action: 'choose', chosen_option: 'B' });

            const review = result.steps[0];
            expect(review).toMatchObject({ state_id: 'strategy_review', step_type: 'approval_gate', sort_order: 2 });
            expect(review.options.map(o => o.key)).toEqual(['approve', 'revise']);
            expect(review.body.split('\n')[0]).toBe('## Disruptor: Expanded Strategy for Kiln');

            const updated = ProjectRepo.get(project.id);
            expect(updated?.executive_summary).toBe('Disruptor: Challenge the status quo with a bold, unexpected approach for Kiln.');
            expect(JSON.parse(updated?.design_principles ?? '[]')).toEqual(['Simplicity', 'Clarity', 'Warmth']);
            expect(DocumentRepo.listByProject(project.id).map(d => d.name).slice(2)).toEqual([
                'Brand Positioning Report',
                'Target Audience Profile',
            ]);
        });

        it('should fall back to the first option for an unknown key', async () => {
            const direction = await submitBrief();

            await engine.resolve(project.id, { step_id: direction.id, action: 'choose', chosen_option: 'Z' });

            expect(ProjectRepo.get(project.id)?.executive_summary).toBe('Market Leader: Position Kiln as the premium authority in the space.');
            expect(WorkflowStepRepo.get(direction.id)?.chosen_option).toBe('Z');
        });
    });

    describe('Strategy Review', () => {
        it('should propose a scope that fits the budget when approved', async () => {
            const selection = await reachDeliverableSelection();

            const steps = engine.getWorkflow(project.id);
            const milestone = steps.find(s => s.state_id === 'strategy_complete');
            expect(milestone).toMatchObject({ status: 'resolved', step_type: 'milestone', sort_order: 3 });
            expect(milestone?.resolved_at).not.toBeNull();

            expect(selection).toMatchObject({ state_id: 'deliverable_selection', agent: 'Director', phase: 'design', sort_order: 4 });
            expect(selection.options).toHaveLength(9);
            const selected = selection.options.filter(o => o.selected === true);
            expect(selected.map(o => o.key)).toEqual(['brand_strategy', 'visual_brief', 'competitor_audit', 'brand_guidelines']);
            const total = selected.reduce((sum, o) => sum + (typeof o.cost === 'number' ? o.cost : 0), 0);
            expect(total).toBe(2900);
            expect(selection.body.split('\n')).toContain('**Budget:** $3,000 · **Estimated scope cost:** $2,900 · **Remaining:** $100');

            expect(DocumentRepo.listByProject(project.id).map(d => [d.name, d.category]).slice(4)).toEqual([
                ['Brand Strategy Document', 'Strategy'],
                ['Visual Direction Brief', 'Design'],
            ]);
            expect(ProjectRepo.get(project.id)?.review_status).toBe('PENDING');
        });

        it('should treat chosen_option "approve" as approval', async () => {
            const review = await reachStrategyReview();

            await engine.resolve(project.id, { step_id: review.id, action: 'choose', chosen_option: 'approve' });

            expect(activeStep().state_id).toBe('deliverable_selection');
        });

        it('should approve when the action is approve whatever option is chosen', async () => {
            const review = await reachStrategyReview();

            await engine.resolve(project.id, { step_id: review.id, action: 'approve', chosen_option: 'revise' });

            expect(activeStep().state_id).toBe('deliverable_selection');
            expect(ProjectRepo.get(project.id)?.review_status).toBe('PENDING');
        });

        it('should keep the proposed scope within budget when the model is unavailable', async () => {
            vi.spyOn(console, 'error').mockImplementation(() => undefined);
            const offline: LlmClient = {
                completeJson: async () => {
                    throw new Error('offline');
                },
                completeText: async () => {
                    throw new Error('offline');
                },
            };
            engine = new WorkflowEngine(new StudioAgents(offline), loadCatalog());

            const selection = await reachDeliverableSelection();

            expect(selection.state_id).toBe('deliverable_selection');
            const selected = selection.options.filter(o => o.selected === true);
            expect(selected.map(o => o.key)).toEqual(['brand_strategy', 'visual_brief', 'competitor_audit', 'brand_guidelines']);
            const total = selected.reduce((sum, o) => sum + (typeof o.cost === 'number' ? o.cost : 0), 0);
            expect(total).toBeLessThanOrEqual(3000);
            expect(total).toBe(2900);
        });

        it('should loop back through revisions until approved', async () => {
            const generateDirections = vi.spyOn(agents, 'generateDirections');
            const review = await reachStrategyReview();

            const rejected = await engine.resolve(project.id, { step_id: review.id, action: 'reject' });

            expect(rejected.next_steps_created).toBe(1);
            expect(engine.getWorkflow(project.id).some(s => s.state_id === 'strategy_complete')).toBe(false);
            expect(rejected.steps[0]).toMatchObject({ state_id: 'strategy_revisions', step_type: 'input_needed', sort_order: 3 });
            expect(ProjectRepo.get(project.id)?.review_status).toBe('REJECTED');
            expect(ActivityLogRepo.recent(1, project.id)[0].severity).toBe('WARN');

            const revised = await engine.resolve(project.id, {
                step_id: rejected.steps[0].id,
                action: 'input',
                input_text: 'More playful',
            });

            expect(revised.steps[0]).toMatchObject({ state_id: 'strategic_direction', sort_order: 4 });
            expect(generateDirections).toHaveBeenLastCalledWith('Kiln', `Revision notes:\nMore playful\n---\n\n${BRIEF}`);

            await engine.resolve(project.id, { step_id: revised.steps[0].id, action: 'choose', chosen_option: 'C' });
            const secondReview = activeStep();
            expect(secondReview.sort_order).toBe(5);
            await engine.resolve(project.id, { step_id: secondReview.id, action: 'approve' });

            expect(activeStep().state_id).toBe('deliverable_selection');
            expect(TaskRepo.list({ project_id: project.id })).toHaveLength(4);
        });
    });

    describe('Deliverable Selection', () => {
        it('should create the selected deliverables and the budget summary', async () => {
            const selection = await reachDeliverableSelection();

            const result = await engine.resolve(project.id, {
                step_id: selection.id,
                action: 'choose',
                input_text: 'Launch party, ',
            });

            expect(result.next_steps_created).toBe(2);
            const [confirmed, allocation] = result.steps;
            expect(confirmed).toMatchObject({
                state_id: 'deliverables_confirmed',
                status: 'resolved',
                body: '✓ 5 deliverables created. Moving to Design phase.',
                sort_order: 5,
            });
            expect(allocation).toMatchObject({ state_id: 'budget_allocation', agent: 'CFO', status: 'active', sort_order: 6 });
            expect(allocation.body.split('\n')).toEqual(expect.arrayContaining([
                '- Brand Guidelines ($1,000)',
                '- Launch party (custom)',
                '**Total estimated cost:** $2,900',
                '**Remaining budget:** $100',
                '**Projected margin:** 3%',
            ]));

            expect(DeliverableRepo.listByProject(project.id).map(d => [d.title, d.owner, d.cost])).toEqual([
                ['Brand Strategy Document', 'Agent', 800],
                ['Visual Identity Brief', 'Agent', 600],
                ['Competitor Audit Report', 'Agent', 500],
                ['Brand Guidelines', 'Agent', 1000],
                ['Launch party', 'Founder', 0],
            ]);
            expect(ProjectRepo.get(project.id)).toMatchObject({ stage: 'Design', status: 'Design', review_status: 'APPROVED' });
        });

        it('should honour an explicit list of keys', async () => {
            const selection = await reachDeliverableSelection();

            await engine.resolve(project.id, {
                step_id: selection.id,
                action: 'choose',
                chosen_option: '["website", "logo_system"]',
            });

            expect(DeliverableRepo.listByProject(project.id).map(d => d.title)).toEqual([
                'Logo & Identity System',
                'Website Design & Development',
            ]);
            expect(activeStep().body.split('\n')).toContain('**Remaining budget:** $-1,000');
        });
    });

    describe('Budget Allocation', () => {
        it('should resolve without advancing', async () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            const selection = await reachDeliverableSelection();
            await engine.resolve(project.id, { step_id: selection.id, action: 'approve' });
            const allocation = activeStep();

            const result = await engine.resolve(project.id, { step_id: allocation.id, action: 'approve' });

            expect(result).toEqual({
                status: 'resolved',
                step_id: allocation.id,
                next_steps_created: 0,
                transition: 'none',
                steps: [],
            });
            expect(WorkflowStepRepo.listActive(project.id)).toEqual([]);
            expect(WorkflowStepRepo.get(allocation.id)?.chosen_option).toBe('approve');
            expect(warn).toHaveBeenCalledTimes(1);
        });
    });

    describe('Guards', () => {
        it('should reject an unknown action', async () => {
            engine.seed(project.id);

            await expect(engine.resolve(project.id, { step_id: activeStep().id, action: 'skip' })).rejects.toThrow(ValidationError);
            expect(activeStep().status).toBe('active');
        });

        it('should reject a step from another project', async () => {
            const other = ProjectRepo.create({ name: 'Other' });
            engine.seed(other.id);
            const foreign = WorkflowStepRepo.listActive(other.id)[0];

            await expect(engine.resolve(project.id, { step_id: foreign.id, action: 'input' })).rejects.toThrow('Step not found');
        });

        it('should refuse to resolve a step twice', async () => {
            engine.seed(project.id);
            const brief = activeStep();
            await engine.resolve(project.id, { step_id: brief.id, action: 'input', input_text: BRIEF });

            await expect(engine.resolve(project.id, { step_id: brief.id, action: 'input', input_text: 'again' }))
                .rejects.toThrow(ConflictError);
            expect(engine.getWorkflow(project.id)).toHaveLength(2);
        });

        it('should write nothing when the step is resolved while content is generated', async () => {
            engine.seed(project.id);
            const brief = activeStep();
            vi.spyOn(agents, 'generateDirections').mockImplementation(async (name: string) => {
                WorkflowStepRepo.resolve(brief.id, 'elsewhere');
                return [{ key: 'A', title: 'Solo', description: name }];
            });

            await expect(engine.resolve(project.id, { step_id: brief.id, action: 'input', input_text: BRIEF }))
                .rejects.toThrow(ConflictError);

            expect(engine.getWorkflow(project.id)).toHaveLength(1);
            expect(DocumentRepo.listByProject(project.id)).toEqual([]);
            expect(TaskRepo.list({ project_id: project.id })).toEqual([]);
            expect(ProjectRepo.get(project.id)?.client_brief).toBe('');
        });

        it('should keep sort order increasing along the history', async () => {
            const selection = await reachDeliverableSelection();
            await engine.resolve(project.id, { step_id: selection.id, action: 'approve' });

            const orders = engine.getWorkflow(project.id).map(s => s.sort_order);
            expect(orders).toEqual([0, 1, 2, 3, 4, 5, 6]);
        });
    });
});

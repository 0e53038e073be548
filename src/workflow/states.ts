import type { Phase, StepType } from '../db/types';

/**
 * Stable identifiers for workflow states. Transitions dispatch on these,
 * never on the display title.
 */
export type StateId =
    | 'project_brief'
    | 'strategic_direction'
    | 'strategy_review'
    | 'strategy_revisions'
    | 'strategy_complete'
    | 'deliverable_selection'
    | 'deliverables_confirmed'
    | 'budget_allocation';

export interface StateDefinition {
    id: StateId;
    stepType: StepType;
    title: string;
    agent: string;
    phase: Phase;
}

export const STATE_DEFINITIONS: readonly StateDefinition[] = [
    { id: 'project_brief', stepType: 'input_needed', title: 'Project Brief', agent: 'Strategist', phase: 'strategy' },
    { id: 'strategic_direction', stepType: 'decision_gate', title: 'Strategic Direction', agent: 'Strategist', phase: 'strategy' },
    { id: 'strategy_review', stepType: 'approval_gate', title: 'Strategy Review', agent: 'Strategist', phase: 'strategy' },
    { id: 'strategy_revisions', stepType: 'input_needed', title: 'Strategy Revisions', agent: 'Strategist', phase: 'strategy' },
    { id: 'strategy_complete', stepType: 'milestone', title: 'Strategy Phase Complete', agent: 'System', phase: 'strategy' },
    { id: 'deliverable_selection', stepType: 'decision_gate', title: 'Deliverable Selection', agent: 'Director', phase: 'design' },
    { id: 'deliverables_confirmed', stepType: 'milestone', title: 'Deliverables Confirmed', agent: 'System', phase: 'design' },
    { id: 'budget_allocation', stepType: 'agent_output', title: 'Budget Allocation', agent: 'CFO', phase: 'design' },
];

const BY_ID = new Map<string, StateDefinition>(STATE_DEFINITIONS.map(def => [def.id, def]));

export function getStateDefinition(id: StateId): StateDefinition {
    const def = BY_ID.get(id);
    if (!def) {
        throw new Error(`Unknown workflow state: ${id}`);
    }
    return def;
}

export function isStateId(value: string): value is StateId {
    return BY_ID.has(value);
}

/**
 * Resolves the state of a stored step. Rows that predate state ids fall back
 * to their type and title.
 */
export function stateOf(step: { state_id: string | null; step_type: string; title: string }): StateId | null {
    if (step.state_id && isStateId(step.state_id)) {
        return step.state_id;
    }
    const legacy = STATE_DEFINITIONS.find(def => def.stepType === step.step_type && def.title === step.title);
    return legacy ? legacy.id : null;
}

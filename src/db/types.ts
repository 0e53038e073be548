export const PROJECT_STAGES = ['Intake', 'Strategy', 'Design', 'Delivery', 'Closed'] as const;
export const REVIEW_STATUSES = ['PENDING', 'APPROVED', 'REJECTED', 'INCUBATING'] as const;
export const STEP_TYPES = ['input_needed', 'decision_gate', 'approval_gate', 'milestone', 'agent_output'] as const;
export const STEP_STATUSES = ['active', 'resolved'] as const;
export const PHASES = ['strategy', 'design', 'production'] as const;
export const DELIVERABLE_STATUSES = ['Pending', 'In Progress', 'Review', 'Approved'] as const;
export const TASK_PRIORITIES = ['High', 'Normal', 'Low'] as const;
export const TASK_STATUSES = ['Todo', 'Done'] as const;
export const RISK_SEVERITIES = ['Low', 'Medium', 'High', 'Critical'] as const;
export const RISK_STATUSES = ['Active', 'Mitigated', 'Accepted'] as const;
export const INVOICE_STATUSES = ['Draft', 'Sent', 'Overdue', 'Paid'] as const;
export const LOG_SEVERITIES = ['INFO', 'WARN', 'ERROR'] as const;
export const DOC_TYPES = ['html', 'text', 'link'] as const;

export type ProjectStage = typeof PROJECT_STAGES[number];
export type ReviewStatus = typeof REVIEW_STATUSES[number];
export type StepType = typeof STEP_TYPES[number];
export type StepStatus = typeof STEP_STATUSES[number];
export type Phase = typeof PHASES[number];
export type DeliverableStatus = typeof DELIVERABLE_STATUSES[number];
export type TaskPriority = typeof TASK_PRIORITIES[number];
export type TaskStatus = typeof TASK_STATUSES[number];
export type RiskSeverity = typeof RISK_SEVERITIES[number];
export type RiskStatus = typeof RISK_STATUSES[number];
export type InvoiceStatus = typeof INVOICE_STATUSES[number];
export type LogSeverity = typeof LOG_SEVERITIES[number];
export type DocType = typeof DOC_TYPES[number];

export interface Project {
    id: string;
    name: string;
    category: string;
    client: string | null;
    stage: ProjectStage;
    status: string;
    review_status: ReviewStatus;
    budget_cap: number;
    invoiced_total: number;
    internal_cost: number;
    client_brief: string;
    executive_summary: string | null;
    /** JSON-serialized string list */
    strategic_tensions: string;
    /** JSON-serialized string list */
    design_principles: string;
    created_at: string;
    updated_at: string;
}

/** Options are free-form records; the engine reads `key`, `title` and `cost` where present. */
export type StepOption = Record<string, unknown>;

export interface WorkflowStep {
    id: string;
    project_id: string;
    state_id: string | null;
    step_type: StepType;
    agent: string;
    title: string;
    body: string;
    options: StepOption[];
    chosen_option: string | null;
    status: StepStatus;
    phase: Phase;
    sort_order: number;
    created_at: string;
    resolved_at: string | null;
}

export interface Deliverable {
    id: string;
    project_id: string;
    title: string;
    status: DeliverableStatus;
    owner: string;
    cost: number;
    due_date: string | null;
}

export interface Document {
    id: string;
    project_id: string;
    name: string;
    category: string;
    doc_type: DocType;
    content: string | null;
    version: number;
    updated_at: string;
}

export interface Task {
    id: string;
    project_id: string | null;
    title: string;
    priority: TaskPriority;
    status: TaskStatus;
    phase: string | null;
    due_date: string | null;
    created_at: string;
}

export interface Risk {
    id: string;
    project_id: string;
    description: string;
    severity: RiskSeverity;
    category: string;
    status: RiskStatus;
}

export interface Invoice {
    id: string;
    project_id: string;
    amount: number;
    status: InvoiceStatus;
    due_date: string | null;
}

export interface ActivityLog {
    id: string;
    project_id: string | null;
    agent: string;
    message: string;
    severity: LogSeverity;
    created_at: string;
}

export interface NewProject {
    name: string;
    category?: string;
    client?: string | null;
    stage?: ProjectStage;
    status?: string;
    budget_cap?: number;
    client_brief?: string;
    executive_summary?: string | null;
    strategic_tensions?: string;
    design_principles?: string;
}

export type ProjectPatch = Partial<Omit<Project, 'id' | 'created_at' | 'updated_at'>>;

export interface NewWorkflowStep {
    project_id: string;
    state_id: string;
    step_type: StepType;
    agent: string;
    title: string;
    body: string;
    options?: StepOption[];
    status?: StepStatus;
    phase: Phase;
    sort_order: number;
    resolved_at?: string | null;
}

export interface NewDeliverable {
    project_id: string;
    title: string;
    status?: DeliverableStatus;
    owner?: string;
    cost?: number;
    due_date?: string | null;
}

export interface NewDocument {
    project_id: string;
    name: string;
    category?: string;
    doc_type?: DocType;
    content?: string | null;
}

export interface NewTask {
    project_id?: string | null;
    title: string;
    priority?: TaskPriority;
    status?: TaskStatus;
    phase?: string | null;
    due_date?: string | null;
}

export interface NewActivityLog {
    project_id?: string | null;
    agent: string;
    message: string;
    severity?: LogSeverity;
}

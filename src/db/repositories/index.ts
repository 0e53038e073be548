export { ProjectRepo } from './projectRepo';
export { WorkflowStepRepo } from './workflowStepRepo';
export { DeliverableRepo } from './deliverableRepo';
export { DocumentRepo } from './documentRepo';
export { TaskRepo } from './taskRepo';
export { RiskRepo, InvoiceRepo } from './governanceRepo';
export { ActivityLogRepo } from './activityLogRepo';

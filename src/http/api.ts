import * as http from 'http';
import { z } from 'zod';
import { withTransaction } from '../db/database';
import {
    ActivityLogRepo,
    DeliverableRepo,
    DocumentRepo,
    InvoiceRepo,
    ProjectRepo,
    RiskRepo,
    TaskRepo,
} from '../db/repositories';
import {
    DELIVERABLE_STATUSES,
    PROJECT_STAGES,
    TASK_PRIORITIES,
    TASK_STATUSES,
    type Project,
    type ProjectPatch,
} from '../db/types';
import { parseStringList } from '../db/values';
import { NotFoundError, normalizeError, toErrorPayload, ValidationError } from '../errors';
import { renderPage } from '../export/html';
import { renderStrategyExport } from '../export/strategyExport';
import type { WorkflowEngine } from '../workflow/WorkflowEngine';

export const DEFAULT_CATEGORIES = ['Brand Identity', 'Web Design', 'Packaging', 'Product Design'];

/** Route result sent as text/html instead of JSON */
export class HtmlBody {
    constructor(readonly html: string) {}
}

const stringList = z.array(z.string());

const createProjectSchema = z.object({
    name: z.string().trim().min(1),
    category: z.string().trim().min(1).optional(),
    client: z.string().nullable().optional(),
    client_brief: z.string().optional(),
    budget_cap: z.number().nonnegative().optional(),
    stage: z.enum(PROJECT_STAGES).optional(),
    executive_summary: z.string().nullable().optional(),
    strategic_tensions: stringList.optional(),
    design_principles: stringList.optional(),
    deliverables: z
        .array(z.object({
            title: z.string().trim().min(1),
            status: z.enum(DELIVERABLE_STATUSES).optional(),
            owner: z.string().optional(),
            cost: z.number().nonnegative().optional(),
        }))
        .default([]),
    tasks: z
        .array(z.object({
            title: z.string().trim().min(1),
            priority: z.enum(TASK_PRIORITIES).optional(),
        }))
        .default([]),
});

const patchProjectSchema = z.object({
    executive_summary: z.string().nullable().optional(),
    strategic_tensions: stringList.optional(),
    design_principles: stringList.optional(),
    client_brief: z.string().optional(),
    budget_cap: z.number().nonnegative().optional(),
    stage: z.enum(PROJECT_STAGES).optional(),
});

const resolveSchema = z.object({
    step_id: z.string().min(1),
    action: z.string().min(1),
    chosen_option: z.string().nullable().optional(),
    input_text: z.string().nullable().optional(),
});

const documentPatchSchema = z.object({
    name: z.string().trim().min(1).optional(),
    content: z.string().optional(),
});

const createTaskSchema = z.object({
    title: z.string().trim().min(1).default('Untitled Task'),
    priority: z.enum(TASK_PRIORITIES).optional(),
    status: z.enum(TASK_STATUSES).optional(),
    project_id: z.string().nullable().optional(),
    phase: z.string().nullable().optional(),
    due_date: z.string().nullable().optional(),
});

const patchTaskSchema = z.object({
    title: z.string().trim().min(1).optional(),
    priority: z.enum(TASK_PRIORITIES).optional(),
    status: z.enum(TASK_STATUSES).optional(),
    phase: z.string().nullable().optional(),
    due_date: z.string().nullable().optional(),
});

const limitSchema = z.coerce.number().int().min(1).max(500).default(50);

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue?.path.length ? issue.path.join('.') : 'body';
        throw new ValidationError(`Invalid ${where}: ${issue?.message ?? 'invalid value'}`);
    }
    return result.data;
}

export function slugify(name: string): string {
    return name.toLowerCase().replace(/&/g, 'and').replace(/\s+/g, '-');
}

/**
 * Project with its JSON list columns decoded
 */
export function serializeProject(project: Project) {
    return {
        ...project,
        strategic_tensions: parseStringList(project.strategic_tensions),
        design_principles: parseStringList(project.design_principles),
    };
}

function requireProject(id: string): Project {
    const project = ProjectRepo.get(id);
    if (!project) {
        throw new NotFoundError('Project not found');
    }
    return project;
}

/**
 * JSON API over Node's http module
 */
export class StudioApi {
    private server: http.Server | undefined;
    private port: number = 0;

    constructor(private engine: WorkflowEngine, private debug: boolean = false) {}

    private log(...args: unknown[]): void {
        if (this.debug) {
            console.log('[Api]', ...args);
        }
    }

    async start(port: number = 0, host: string = '127.0.0.1'): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = http.createServer((req, res) => {
                this.handleRequest(req, res).catch((err: unknown) => {
                    console.error('[Api] Failed to send response:', err);
                    res.destroy();
                });
            });
            this.server = server;

            server.once('error', reject);
            server.listen(port, host, () => {
                const addr = server.address();
                if (typeof addr === 'object' && addr) {
                    this.port = addr.port;
                    resolve(this.port);
                } else {
                    reject(new Error('Failed to get server address'));
                }
            });
        });
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = undefined;
        await new Promise<void>((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const url = new URL(req.url || '/', `http://127.0.0.1:${this.port}`);
        const pathname = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, '') : url.pathname;
        const method = req.method || 'GET';

        try {
            const body = await this.readBody(req);
            const result = await this.route(method, pathname, body, url.searchParams);
            this.log(method, pathname, '200');
            if (result instanceof HtmlBody) {
                res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
                res.end(result.html);
                return;
            }
            res.writeHead(200, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify(result));
        } catch (err) {
            const error = normalizeError(err);
            if (error.status >= 500) {
                console.error(`[Api] ${method} ${pathname} failed:`, err);
            } else {
                this.log(method, pathname, String(error.status), error.message);
            }
            res.writeHead(error.status, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify(toErrorPayload(error)));
        }
    }

    private async readBody(req: http.IncomingMessage): Promise<unknown> {
        return new Promise((resolve, reject) => {
            let data = '';
            req.on('data', (chunk: Buffer) => data += chunk.toString());
            req.on('error', reject);
            req.on('end', () => {
                if (!data.trim()) {
                    resolve({});
                    return;
                }
                try {
                    resolve(JSON.parse(data));
                } catch {
                    reject(new ValidationError('Request body is not valid JSON'));
                }
            });
        });
    }

    private async route(method: string, pathname: string, body: unknown, searchParams: URLSearchParams): Promise<unknown> {
        // GET /health
        if (method === 'GET' && pathname === '/health') {
            return { ok: true };
        }

        // GET /projects
        if (method === 'GET' && pathname === '/projects') {
            return { projects: ProjectRepo.list().map(serializeProject) };
        }

        // POST /projects - onboarding payload with optional deliverables and tasks
        if (method === 'POST' && pathname === '/projects') {
            return this.createProject(body);
        }

        // GET /projects/:id/workflow
        const workflowMatch = pathname.match(/^\/projects\/([^/]+)\/workflow$/);
        if (method === 'GET' && workflowMatch) {
            return { steps: this.engine.getWorkflow(workflowMatch[1]) };
        }

        // POST /projects/:id/workflow/seed
        const seedMatch = pathname.match(/^\/projects\/([^/]+)\/workflow\/seed$/);
        if (method === 'POST' && seedMatch) {
            return this.engine.seed(seedMatch[1]);
        }

        // POST /projects/:id/workflow/resolve
        const resolveMatch = pathname.match(/^\/projects\/([^/]+)\/workflow\/resolve$/);
        if (method === 'POST' && resolveMatch) {
            return this.engine.resolve(resolveMatch[1], parse(resolveSchema, body));
        }

        // GET /projects/:id/documents/:docId[?format=html]
        const docMatch = pathname.match(/^\/projects\/([^/]+)\/documents\/([^/]+)$/);
        if (method === 'GET' && docMatch) {
            const doc = DocumentRepo.get(docMatch[2]);
            if (!doc || doc.project_id !== docMatch[1]) {
                throw new NotFoundError('Document not found');
            }
            if (searchParams.get('format') === 'html') {
                return new HtmlBody(renderPage(doc.name, `${doc.category} · version ${doc.version}`, doc.content ?? ''));
            }
            return doc;
        }

        // GET /projects/:id/export
        const exportMatch = pathname.match(/^\/projects\/([^/]+)\/export$/);
        if (method === 'GET' && exportMatch) {
            const project = requireProject(exportMatch[1]);
            return new HtmlBody(renderStrategyExport({
                project,
                documents: DocumentRepo.listByProject(project.id),
                tasks: TaskRepo.list({ project_id: project.id }),
                risks: RiskRepo.listByProject(project.id),
            }));
        }

        // GET|PATCH|DELETE /projects/:id
        const projectMatch = pathname.match(/^\/projects\/([^/]+)$/);
        if (projectMatch) {
            const id = projectMatch[1];
            if (method === 'GET') {
                const project = requireProject(id);
                return {
                    project: serializeProject(project),
                    deliverables: DeliverableRepo.listByProject(id),
                    tasks: TaskRepo.list({ project_id: id }),
                    documents: DocumentRepo.listByProject(id),
                    risks: RiskRepo.listByProject(id),
                    invoices: InvoiceRepo.listByProject(id),
                };
            }
            if (method === 'PATCH') {
                requireProject(id);
                const patch = parse(patchProjectSchema, body);
                const update: ProjectPatch = {
                    executive_summary: patch.executive_summary,
                    client_brief: patch.client_brief,
                    budget_cap: patch.budget_cap,
                    stage: patch.stage,
                    strategic_tensions: patch.strategic_tensions ? JSON.stringify(patch.strategic_tensions) : undefined,
                    design_principles: patch.design_principles ? JSON.stringify(patch.design_principles) : undefined,
                };
                const updated = ProjectRepo.update(id, update);
                if (!updated) throw new NotFoundError('Project not found');
                return { status: 'updated', project: serializeProject(updated) };
            }
            if (method === 'DELETE') {
                requireProject(id);
                ProjectRepo.delete(id);
                return { status: 'deleted', project_id: id };
            }
        }

        // PATCH /documents/:id
        const docPatchMatch = pathname.match(/^\/documents\/([^/]+)$/);
        if (method === 'PATCH' && docPatchMatch) {
            const patch = parse(documentPatchSchema, body);
            const doc = DocumentRepo.update(docPatchMatch[1], patch);
            if (!doc) throw new NotFoundError('Document not found');
            return doc;
        }

        // GET /categories
        if (method === 'GET' && pathname === '/categories') {
            return { categories: this.listCategories() };
        }

        // GET /tasks
        if (method === 'GET' && pathname === '/tasks') {
            const projectId = searchParams.get('project_id');
            const status = searchParams.get('status');
            return {
                tasks: TaskRepo.list({
                    project_id: projectId ?? undefined,
                    status: status ? parse(z.enum(TASK_STATUSES), status) : undefined,
                }),
            };
        }

        // POST /tasks
        if (method === 'POST' && pathname === '/tasks') {
            const data = parse(createTaskSchema, body);
            if (data.project_id) requireProject(data.project_id);
            return TaskRepo.create(data);
        }

        // PATCH|DELETE /tasks/:id
        const taskMatch = pathname.match(/^\/tasks\/([^/]+)$/);
        if (taskMatch) {
            const id = taskMatch[1];
            if (method === 'PATCH') {
                if (!TaskRepo.get(id)) throw new NotFoundError('Task not found');
                return TaskRepo.update(id, parse(patchTaskSchema, body));
            }
            if (method === 'DELETE') {
                if (!TaskRepo.get(id)) throw new NotFoundError('Task not found');
                TaskRepo.delete(id);
                return { status: 'deleted', task_id: id };
            }
        }

        // GET /logs?limit=&project_id=
        if (method === 'GET' && pathname === '/logs') {
            const limit = parse(limitSchema, searchParams.get('limit') ?? undefined);
            return { logs: ActivityLogRepo.recent(limit, searchParams.get('project_id') ?? undefined) };
        }

        throw new NotFoundError(`No route for ${method} ${pathname}`);
    }

    private createProject(body: unknown) {
        const data = parse(createProjectSchema, body);

        const project = withTransaction(() => {
            const created = ProjectRepo.create({
                name: data.name,
                category: data.category,
                client: data.client,
                client_brief: data.client_brief,
                budget_cap: data.budget_cap,
                stage: data.stage,
                executive_summary: data.executive_summary,
                strategic_tensions: data.strategic_tensions ? JSON.stringify(data.strategic_tensions) : undefined,
                design_principles: data.design_principles ? JSON.stringify(data.design_principles) : undefined,
            });
            for (const d of data.deliverables) {
                DeliverableRepo.create({ project_id: created.id, title: d.title, status: d.status, owner: d.owner ?? 'Unassigned', cost: d.cost });
            }
            for (const t of data.tasks) {
                TaskRepo.create({ project_id: created.id, title: t.title, priority: t.priority });
            }
            return created;
        });

        ActivityLogRepo.append({ project_id: project.id, agent: 'System', message: `Project "${project.name}" created` });
        return { status: 'created', project_id: project.id, project: serializeProject(project) };
    }

    private listCategories() {
        const byCategory = new Map<string, Project[]>();
        for (const name of DEFAULT_CATEGORIES) {
            byCategory.set(name, []);
        }
        for (const project of ProjectRepo.list()) {
            const bucket = byCategory.get(project.category);
            if (bucket) {
                bucket.push(project);
            } else {
                byCategory.set(project.category, [project]);
            }
        }

        return [...byCategory.entries()]
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([name, projects]) => {
                const stageBreakdown: Record<string, number> = {};
                for (const project of projects) {
                    stageBreakdown[project.stage] = (stageBreakdown[project.stage] ?? 0) + 1;
                }
                return {
                    name,
                    slug: slugify(name),
                    project_count: projects.length,
                    stage_breakdown: stageBreakdown,
                    needs_attention: projects.some(project => project.review_status === 'PENDING'),
                };
            });
    }
}

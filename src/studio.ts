import { StudioAgents } from './agents/StudioAgents';
import type { StudioConfig } from './config';
import { closeDatabase, initDatabase } from './db';
import { StudioApi } from './http/api';
import { createLlmClient } from './llm';
import { loadCatalog } from './workflow/catalog';
import { WorkflowEngine } from './workflow/WorkflowEngine';

export interface RunningStudio {
    api: StudioApi;
    port: number;
    shutdown(): Promise<void>;
}

/**
 * Wires storage, agents, engine and API together and starts listening.
 */
export async function startStudio(config: StudioConfig): Promise<RunningStudio> {
    await initDatabase(config.dbPath);

    const catalog = loadCatalog(config.catalogPath);
    const agents = new StudioAgents(createLlmClient(config), config.debug);
    const engine = new WorkflowEngine(agents, catalog, config.debug);
    const api = new StudioApi(engine, config.debug);

    let port: number;
    try {
        port = await api.start(config.port, config.host);
    } catch (error) {
        closeDatabase();
        throw error;
    }

    console.log(`[Studio] Listening on http://${config.host}:${port} (db: ${config.dbPath ?? 'in-memory'}, llm: ${config.llm})`);

    return {
        api,
        port,
        async shutdown() {
            await api.stop();
            closeDatabase();
        },
    };
}

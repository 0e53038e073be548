#!/usr/bin/env node
import { loadConfig } from './config';
import { startStudio } from './studio';

async function main(): Promise<void> {
    const studio = await startStudio(loadConfig());

    let stopping = false;
    const stop = (signal: string) => {
        if (stopping) return;
        stopping = true;
        console.log(`[Studio] ${signal} received, shutting down`);
        studio.shutdown().then(
            () => process.exit(0),
            (error: unknown) => {
                console.error('[Studio] Shutdown failed:', error);
                process.exit(1);
            }
        );
    };

    process.on('SIGINT', () => stop('SIGINT'));
    process.on('SIGTERM', () => stop('SIGTERM'));
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('[Studio] Failed to start:', error instanceof Error ? error.message : error);
        process.exit(1);
    });
}

import * as fs from 'fs';
import * as path from 'path';
import { execFile } from 'child_process';

function windowsCandidates(env: NodeJS.ProcessEnv): string[] {
    const home = env.USERPROFILE || env.HOME || '';
    const localAppData = env.LOCALAPPDATA || path.join(home, 'AppData', 'Local');
    return [
        path.join(home, '.local', 'bin', 'claude.exe'),
        path.join(localAppData, 'Programs', 'claude-code', 'claude.exe'),
        path.join(env.APPDATA || path.join(home, 'AppData', 'Roaming'), 'npm', 'claude.cmd'),
    ];
}

function whereClaude(): Promise<string | null> {
    return new Promise(resolve => {
        execFile('where', ['claude'], (error, stdout) => {
            const first = stdout.split(/\r?\n/)[0]?.trim();
            resolve(!error && first ? first : null);
        });
    });
}

/**
 * Path of the Claude CLI. `configuredPath` wins when it exists; elsewhere than
 * Windows the bare command is left to PATH lookup.
 */
export async function findClaudeBinary(configuredPath: string | null = null): Promise<string> {
    if (configuredPath?.trim()) {
        if (fs.existsSync(configuredPath)) {
            return configuredPath;
        }
        console.warn('[Claude] Configured path does not exist:', configuredPath);
    }

    if (process.platform !== 'win32') {
        return 'claude';
    }

    // Spawned shells on Windows often miss the user's PATH
    const installed = windowsCandidates(process.env).find(candidate => fs.existsSync(candidate));
    if (installed) {
        return installed;
    }
    const found = await whereClaude();
    if (!found) {
        console.error('[Claude] Claude CLI not found; falling back to "claude"');
    }
    return found ?? 'claude';
}

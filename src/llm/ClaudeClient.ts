import { spawn } from 'child_process';
import { z } from 'zod';
import { ExecutionError } from '../errors';
import { findClaudeBinary } from './claudeBinary';
import { extractJson, stripCodeFence } from './text';

export type JsonSchema = Record<string, unknown>;

export interface LlmRequest {
    system: string;
    prompt: string;
}

/**
 * What the content generators need from a model. Implementations throw on
 * failure; callers decide the fallback.
 */
export interface LlmClient {
    /** Returns the parsed JSON value the model produced for `schema` */
    completeJson(request: LlmRequest, schema: JsonSchema): Promise<unknown>;
    /** Returns the model's text with any surrounding code fence removed */
    completeText(request: LlmRequest): Promise<string>;
}

export interface ClaudeClientOptions {
    /** Explicit CLI path; otherwise looked up the usual way */
    claudePath?: string | null;
    model?: string;
    cwd?: string;
    timeoutMs?: number;
    debug?: boolean;
}

const cliResultSchema = z.object({
    type: z.string().optional(),
    is_error: z.boolean().optional(),
    result: z.string().optional(),
    structured_output: z.unknown().optional(),
});

export type CliResult = z.infer<typeof cliResultSchema>;

/**
 * Parses the wrapper printed by `claude -p --output-format json`:
 * {"type":"result","is_error":false,"result":"...","structured_output":{...}}
 */
export function parseCliResult(stdout: string): CliResult {
    let raw: unknown;
    try {
        raw = JSON.parse(stdout.trim());
    } catch (error) {
        throw new ExecutionError('Claude CLI returned output that is not JSON', { cause: error });
    }
    const parsed = cliResultSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ExecutionError('Claude CLI returned an unexpected result wrapper');
    }
    if (parsed.data.is_error) {
        throw new ExecutionError(`Claude CLI error: ${parsed.data.result || 'unknown error'}`);
    }
    return parsed.data;
}

/**
 * Structured output when the CLI enforced the schema, otherwise the first
 * JSON value in the text result.
 */
export function structuredValue(result: CliResult): unknown {
    if (result.structured_output !== undefined && result.structured_output !== null) {
        return result.structured_output;
    }
    if (!result.result) {
        throw new ExecutionError('Claude CLI returned an empty result');
    }
    return extractJson(result.result);
}

/**
 * Runs one-shot prompts through the Claude CLI in print mode.
 */
export class ClaudeClient implements LlmClient {
    private binary: string | null = null;

    constructor(private options: ClaudeClientOptions = {}) {}

    private log(...args: unknown[]): void {
        if (this.options.debug) {
            console.log('[Claude]', ...args);
        }
    }

    async completeJson(request: LlmRequest, schema: JsonSchema): Promise<unknown> {
        const stdout = await this.run(request, ['--json-schema', JSON.stringify(schema)]);
        return structuredValue(parseCliResult(stdout));
    }

    async completeText(request: LlmRequest): Promise<string> {
        const stdout = await this.run(request, []);
        const result = parseCliResult(stdout);
        if (!result.result) {
            throw new ExecutionError('Claude CLI returned an empty result');
        }
        return stripCodeFence(result.result);
    }

    private async run(request: LlmRequest, extraArgs: string[]): Promise<string> {
        // Drop IDE integration vars inherited from a parent Claude session
        const env = { ...process.env };
        delete env.CLAUDE_CODE_SSE_PORT;
        delete env.ENABLE_IDE_INTEGRATION;

        const args = [
            '-p',
            '--output-format', 'json',
            '--strict-mcp-config',
            '--tools', '',
            '--system-prompt', request.system,
            ...(this.options.model ? ['--model', this.options.model] : []),
            ...extraArgs,
            '-',
        ];

        if (!this.binary) {
            this.binary = await findClaudeBinary(this.options.claudePath ?? null);
            this.log('Using claude binary:', this.binary);
        }
        const binary = this.binary;
        const timeoutMs = this.options.timeoutMs ?? 120000;
        const startTime = Date.now();

        return new Promise<string>((resolve, reject) => {
            const proc = spawn(binary, args, {
                cwd: this.options.cwd,
                env,
                // .cmd shims need a shell on Windows
                shell: process.platform === 'win32',
            });

            let output = '';
            let errorOutput = '';

            const timeout = setTimeout(() => {
                proc.kill();
                reject(new ExecutionError(`Claude timed out after ${timeoutMs}ms`));
            }, timeoutMs);

            proc.stdout.on('data', (data: Buffer) => {
                output += data.toString();
            });

            proc.stderr.on('data', (data: Buffer) => {
                errorOutput += data.toString();
            });

            proc.on('close', (code) => {
                clearTimeout(timeout);
                this.log(`+${Date.now() - startTime}ms - Process closed (code ${code})`);
                if (code === 0) {
                    resolve(output);
                } else if (errorOutput.includes('[ACTION REQUIRED]') && errorOutput.includes('Terms')) {
                    reject(new ExecutionError('Claude CLI requires you to accept updated terms. Run "claude" in a terminal first.'));
                } else {
                    reject(new ExecutionError(errorOutput.trim() || `Claude CLI exited with code ${code}`));
                }
            });

            proc.on('error', (err) => {
                clearTimeout(timeout);
                reject(new ExecutionError(`Could not start Claude CLI: ${err.message}`, { cause: err }));
            });

            // The CLI may exit before reading its input; 'close' settles the promise then
            proc.stdin.on('error', (err) => {
                this.log('stdin closed early:', err.message);
            });

            proc.stdin.write(request.prompt);
            proc.stdin.end();
        });
    }
}

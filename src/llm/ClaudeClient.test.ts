import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs';
import { fallbackDirections, StudioAgents } from '../agents/StudioAgents';
import { ExecutionError } from '../errors';
import { ClaudeClient, parseCliResult, structuredValue } from './ClaudeClient';
import { extractJson, stripCodeFence } from './text';
import { createLlmClient } from './index';

describe('ClaudeClient', () => {
    describe('Response Parsing', () => {
        it('should read structured output from the result wrapper', () => {
            const stdout = JSON.stringify({
                type: 'result',
                is_error: false,
                result: '',
                structured_output: { selected_keys: ['website', 'social_kit'] },
            });

            const value = structuredValue(parseCliResult(stdout));

            expect(value).toEqual({ selected_keys: ['website', 'social_kit'] });
        });

        it('should fall back to JSON embedded in the text result', () => {
            const stdout = JSON.stringify({
                type: 'result',
                is_error: false,
                result: 'Here you go:\n```json\n{"directions": []}\n```',
            });

            expect(structuredValue(parseCliResult(stdout))).toEqual({ directions: [] });
        });

        it('should raise the CLI error message when is_error is set', () => {
            const stdout = JSON.stringify({ type: 'result', is_error: true, result: 'rate limited' });

            expect(() => parseCliResult(stdout)).toThrow('Claude CLI error: rate limited');
        });

        it('should reject output that is not JSON', () => {
            expect(() => parseCliResult('Claude is thinking...')).toThrow(ExecutionError);
            expect(() => parseCliResult('Claude is thinking...')).toThrow('Claude CLI returned output that is not JSON');
        });

        it('should reject a wrapper with the wrong shape', () => {
            expect(() => parseCliResult('{"is_error": "no"}')).toThrow('Claude CLI returned an unexpected result wrapper');
        });

        it('should reject an empty result without structured output', () => {
            const result = parseCliResult(JSON.stringify({ type: 'result', is_error: false, result: '' }));

            expect(() => structuredValue(result)).toThrow('Claude CLI returned an empty result');
        });
    });

    describe('Text Helpers', () => {
        it('should strip a language-tagged fence', () => {
            expect(stripCodeFence('```html\n<h2>Trends</h2>\n```')).toBe('<h2>Trends</h2>');
        });

        it('should leave unfenced text alone apart from trimming', () => {
            expect(stripCodeFence('  <p>plain</p>\n')).toBe('<p>plain</p>');
        });

        it('should find the outermost object in chatty output', () => {
            expect(extractJson('Sure! {"positioning": "Bold"} Hope that helps.')).toEqual({ positioning: 'Bold' });
        });

        it('should find a bare array', () => {
            expect(extractJson('keys: ["a", "b"]')).toEqual(['a', 'b']);
        });

        it('should throw when there is no JSON at all', () => {
            expect(() => extractJson('no structure here')).toThrow('No JSON value found in model output');
        });
    });

    describe('Process Failures', () => {
        // Exits at once with status 1 without reading stdin
        const exitsEarly = '/bin/false';
        const canRun = process.platform !== 'win32' && fs.existsSync(exitsEarly);

        afterEach(() => {
            vi.restoreAllMocks();
        });

        it.skipIf(!canRun)('should reject when the CLI exits before reading a large prompt', async () => {
            const client = new ClaudeClient({ claudePath: exitsEarly });

            await expect(client.completeText({ system: 'sys', prompt: 'x'.repeat(4_000_000) }))
                .rejects.toThrow('Claude CLI exited with code 1');
        });

        it.skipIf(!canRun)('should let the agents fall back when the CLI dies mid-write', async () => {
            vi.spyOn(console, 'error').mockImplementation(() => undefined);
            const agents = new StudioAgents(new ClaudeClient({ claudePath: exitsEarly }));

            const directions = await agents.generateDirections('Kiln', 'x'.repeat(4_000_000));

            expect(directions).toEqual(fallbackDirections('Kiln'));
        });
    });

    describe('createLlmClient', () => {
        it('should return null when generation is off', () => {
            expect(createLlmClient({ llm: 'off', claudePath: null, debug: false })).toBeNull();
        });

        it('should build a CLI client when enabled', () => {
            expect(createLlmClient({ llm: 'claude', claudePath: '/opt/claude', debug: false })).not.toBeNull();
        });
    });
});

import type { StudioConfig } from '../config';
import { ClaudeClient, type LlmClient } from './ClaudeClient';

export { ClaudeClient, parseCliResult, structuredValue } from './ClaudeClient';
export type { CliResult, JsonSchema, LlmClient, LlmRequest } from './ClaudeClient';
export { extractJson, stripCodeFence } from './text';

/**
 * The configured model client, or null when generation is switched off.
 */
export function createLlmClient(config: Pick<StudioConfig, 'llm' | 'claudePath' | 'debug'>): LlmClient | null {
    if (config.llm === 'off') {
        return null;
    }
    return new ClaudeClient({ claudePath: config.claudePath, debug: config.debug });
}

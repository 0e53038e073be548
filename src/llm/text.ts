/**
 * Strips a surrounding Markdown code fence (```json, ```html or bare ```).
 */
export function stripCodeFence(raw: string): string {
    let text = raw.trim();
    const opening = text.match(/^```[a-zA-Z]*\s*/);
    if (opening) {
        text = text.slice(opening[0].length);
    }
    if (text.endsWith('```')) {
        text = text.slice(0, -3);
    }
    return text.trim();
}

/**
 * Parses the first JSON value found in model output: the whole text, a fenced
 * block, or the outermost object/array.
 */
export function extractJson(raw: string): unknown {
    const candidates = [stripCodeFence(raw)];
    const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
    if (fenced?.[1]) candidates.push(fenced[1].trim());

    for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
        const start = raw.indexOf(open);
        const end = raw.lastIndexOf(close);
        if (start !== -1 && end > start) {
            candidates.push(raw.slice(start, end + 1));
        }
    }

    for (const candidate of candidates) {
        try {
            return JSON.parse(candidate);
        } catch {
            continue;
        }
    }
    throw new SyntaxError('No JSON value found in model output');
}

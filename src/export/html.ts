export function escapeHtml(input: string): string {
    return input
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

const DOC_STYLES = `
  * { margin:0; padding:0; box-sizing:border-box; }
  body { font-family: 'Inter', -apple-system, sans-serif; background:#0d0d0f; color:#e0ddd5; line-height:1.7; padding:48px 64px; max-width:920px; margin:0 auto; }
  h1 { font-size:2rem; font-weight:700; color:#c8a96e; margin-bottom:8px; }
  h2 { font-size:1.3rem; font-weight:600; margin:32px 0 12px; border-bottom:1px solid rgba(200,169,110,0.2); padding-bottom:8px; }
  h3 { font-size:1rem; font-weight:600; color:#c8a96e; margin:20px 0 8px; }
  p, li { font-size:0.92rem; color:#a09b8c; }
  p { margin:0 0 14px; }
  ul, ol { padding-left:20px; margin:8px 0 16px; }
  table { width:100%; border-collapse:collapse; margin:16px 0 24px; }
  th, td { text-align:left; padding:10px 14px; border:1px solid rgba(255,255,255,0.08); font-size:0.85rem; }
  .meta { font-size:0.75rem; color:#706b5e; margin-bottom:32px; }
  .highlight { background:rgba(200,169,110,0.06); border-left:3px solid #c8a96e; padding:16px 20px; border-radius:6px; margin:16px 0; }
  .highlight p { margin:0; color:#e0ddd5; }
  hr { border:none; border-top:1px solid rgba(255,255,255,0.06); margin:32px 0; }
`;

/**
 * Wraps body HTML in a standalone page. `title` and `byline` are escaped; `body` is trusted.
 */
export function renderPage(title: string, byline: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<style>${DOC_STYLES}</style>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
<div class="meta">${escapeHtml(byline)}</div>
${body}
</body>
</html>
`;
}

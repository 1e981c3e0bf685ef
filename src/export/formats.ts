/**
 * Export Formats - Save the report as markdown, HTML or plain text
 */

import { writeFile } from 'fs/promises';
import { marked } from 'marked';

export const EXPORT_FORMATS = ['markdown', 'html', 'txt'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportOptions {
    title?: string;
    format: ExportFormat;
    outputPath: string;
}

export function getExtension(format: ExportFormat): string {
    switch (format) {
        case 'markdown': return '.md';
        case 'html': return '.html';
        case 'txt': return '.txt';
    }
}

/**
 * Guess the format from a file name; markdown when the extension is unknown
 */
export function formatFromPath(outputPath: string): ExportFormat {
    const lower = outputPath.toLowerCase();
    if (lower.endsWith('.html') || lower.endsWith('.htm')) return 'html';
    if (lower.endsWith('.txt')) return 'txt';
    return 'markdown';
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export async function toHtmlDocument(content: string, title?: string): Promise<string> {
    const body = await marked.parse(content);
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title || 'Research Summary')}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Ubuntu, sans-serif;
            max-width: 800px;
            margin: 0 auto;
            padding: 2rem;
            line-height: 1.6;
            color: #333;
        }
        h2, h3 { color: #1a1a1a; margin-top: 2rem; }
        h2 { border-bottom: 1px solid #e2e8f0; padding-bottom: 0.3rem; }
        a { color: #2563eb; }
        ul { padding-left: 1.5rem; }
        li { margin: 0.4rem 0; }
    </style>
</head>
<body>
${body}
</body>
</html>`;
}

/**
 * Strip markdown syntax, keeping the text
 */
export function toPlainText(content: string): string {
    return content
        .replace(/^#{1,6}\s+/gm, '')
        .replace(/\*\*(.+?)\*\*/g, '$1')
        .replace(/__(.+?)__/g, '$1')
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
        .replace(/`([^`]+)`/g, '$1')
        .replace(/^\*\s+/gm, '- ')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export async function exportReport(content: string, options: ExportOptions): Promise<void> {
    const { format, outputPath, title } = options;

    switch (format) {
        case 'markdown':
            await writeFile(outputPath, content, 'utf-8');
            break;
        case 'html':
            await writeFile(outputPath, await toHtmlDocument(content, title), 'utf-8');
            break;
        case 'txt':
            await writeFile(outputPath, `${toPlainText(content)}\n`, 'utf-8');
            break;
    }
}

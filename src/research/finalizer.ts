/**
 * Finalizer - formats the report and hands it to the mailer
 */

import { marked } from 'marked';
import type { Mailer } from '../clients/mailer.js';
import type { SourceDoc } from './types.js';

export interface Reference {
    title: string;
    url: string;
}

/**
 * Unique source URLs in order of first appearance, titled by their first occurrence.
 * Position n (1-based) is the source cited as [n] in the summary.
 */
export function collectReferences(sources: readonly SourceDoc[]): Reference[] {
    const seen = new Set<string>();
    const references: Reference[] = [];
    for (const source of sources) {
        if (seen.has(source.url)) continue;
        seen.add(source.url);
        references.push({ title: source.title, url: source.url });
    }
    return references;
}

export function formatReport(summary: string, sources: readonly SourceDoc[]): string {
    const references = collectReferences(sources);
    const lines = references.length > 0
        ? references.map((ref, i) => `* [${i + 1}] ${ref.title} : ${ref.url}`)
        : ['* (none)'];

    return `## Summary\n\n${summary}\n\n### Sources:\n${lines.join('\n')}`;
}

export function reportSubject(topic: string): string {
    return `Research Summary: ${topic}`;
}

export class Finalizer {
    private mailer: Mailer | null;
    private recipient: string;

    /**
     * @param mailer - null disables delivery; the report is still produced
     */
    constructor(mailer: Mailer | null, recipient: string) {
        this.mailer = mailer;
        this.recipient = recipient;
    }

    get delivers(): boolean {
        return this.mailer !== null;
    }

    get deliversTo(): string {
        return this.recipient;
    }

    /**
     * Send the report as plain text with an HTML alternative.
     * Resolves to the message id, or undefined when delivery is off.
     */
    async deliver(topic: string, report: string): Promise<string | undefined> {
        if (!this.mailer) return undefined;

        const html = await marked.parse(report);
        const { messageId } = await this.mailer.send({
            to: this.recipient,
            subject: reportSubject(topic),
            text: report,
            html,
        });
        return messageId;
    }
}

import type { SearchProvider } from '../config.js';

/**
 * One retrieved document. Frozen by the retriever; never edited or removed.
 */
export interface SourceDoc {
    readonly url: string;
    readonly title: string;
    readonly contentExcerpt: string;
    readonly rawContent?: string;
    /** ISO-8601 timestamp */
    readonly retrievedAt: string;
    readonly provider: SearchProvider;
}

export type StopReason = 'max_loops' | 'sufficient' | 'error';

export type Decision =
    | { kind: 'continue'; query: string }
    | { kind: 'stop'; reason: StopReason };

export interface IterationRecord {
    index: number;
    query: string;
    sourceCount: number;
    decision?: Decision['kind'];
    reason?: string;
    error?: string;
}

export type RunStatus = 'running' | 'completed' | 'partial' | 'failed';

export interface ResearchState {
    topic: string;
    loopCount: number;
    runningSummary: string;
    sources: SourceDoc[];
    lastQuery: string;
    lastReflection: string;
    iterations: IterationRecord[];
    status: RunStatus;
}

export function createResearchState(topic: string): ResearchState {
    return {
        topic,
        loopCount: 0,
        runningSummary: '',
        sources: [],
        lastQuery: '',
        lastReflection: '',
        iterations: [],
        status: 'running',
    };
}

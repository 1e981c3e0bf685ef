/**
 * In-memory registry of research runs started through the server
 */

import { randomUUID } from 'crypto';
import type { SearchProvider } from '../config.js';
import { toError } from '../errors.js';
import type { LoopListener, RunOutcome } from '../research/loop.js';
import { createResearchState, type ResearchState, type RunStatus } from '../research/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('runs');

export interface RunRequest {
    topic: string;
    maxLoops?: number;
    provider?: SearchProvider;
    deliver?: boolean;
}

export type RunExecutor = (
    request: RunRequest,
    options: { signal: AbortSignal; onEvent: LoopListener }
) => Promise<RunOutcome>;

export interface RunSummary {
    run_id: string;
    topic: string;
    status: RunStatus;
    loop_count: number;
    created_at: string;
    updated_at: string;
}

export interface RunSnapshot extends RunSummary {
    state: ResearchState;
    report: string | null;
    error: string | null;
    message_id: string | null;
}

interface RunEntry {
    snapshot: RunSnapshot;
    controller: AbortController;
    done: Promise<void>;
}

export type CancelResult = 'cancelled' | 'not_found' | 'not_running';

function summarize(snapshot: RunSnapshot): RunSummary {
    const { run_id, topic, status, loop_count, created_at, updated_at } = snapshot;
    return { run_id, topic, status, loop_count, created_at, updated_at };
}

export const DEFAULT_MAX_RUNS = 100;

export interface RunRegistryOptions {
    now?: () => Date;
    /** Finished runs beyond this count are forgotten, oldest first */
    maxRuns?: number;
}

export class RunRegistry {
    private runs = new Map<string, RunEntry>();
    private execute: RunExecutor;
    private now: () => Date;
    private maxRuns: number;

    constructor(execute: RunExecutor, options: RunRegistryOptions = {}) {
        this.execute = execute;
        this.now = options.now ?? (() => new Date());
        this.maxRuns = options.maxRuns ?? DEFAULT_MAX_RUNS;
    }

    start(request: RunRequest): RunSnapshot {
        const timestamp = this.now().toISOString();
        const snapshot: RunSnapshot = {
            run_id: randomUUID(),
            topic: request.topic,
            status: 'running',
            loop_count: 0,
            created_at: timestamp,
            updated_at: timestamp,
            state: createResearchState(request.topic),
            report: null,
            error: null,
            message_id: null,
        };
        const controller = new AbortController();

        const onEvent: LoopListener = (event, state) => {
            snapshot.state = structuredClone(state);
            snapshot.loop_count = state.loopCount;
            snapshot.updated_at = this.now().toISOString();
            if (event.type === 'report') snapshot.report = event.report;
        };

        const done = this.execute(request, { signal: controller.signal, onEvent })
            .then((outcome) => {
                snapshot.state = structuredClone(outcome.state);
                snapshot.status = outcome.status;
                snapshot.loop_count = outcome.state.loopCount;
                snapshot.report = outcome.report ?? snapshot.report;
                snapshot.error = outcome.error?.message ?? null;
                snapshot.message_id = outcome.messageId ?? null;
            })
            .catch((error: unknown) => {
                const err = toError(error);
                logger.error(`Run ${snapshot.run_id} crashed: ${err.message}`);
                snapshot.status = 'failed';
                snapshot.error = err.message;
            })
            .finally(() => {
                snapshot.updated_at = this.now().toISOString();
            });

        this.runs.set(snapshot.run_id, { snapshot, controller, done });
        this.evictFinished();
        logger.debug(`Run ${snapshot.run_id} started: ${request.topic}`);
        return this.view(snapshot);
    }

    get(runId: string): RunSnapshot | undefined {
        const entry = this.runs.get(runId);
        return entry ? this.view(entry.snapshot) : undefined;
    }

    list(): RunSummary[] {
        return [...this.runs.values()]
            .map((entry) => summarize(entry.snapshot))
            .sort((a, b) => b.created_at.localeCompare(a.created_at));
    }

    cancel(runId: string): CancelResult {
        const entry = this.runs.get(runId);
        if (!entry) return 'not_found';
        if (entry.snapshot.status !== 'running') return 'not_running';
        entry.controller.abort(new Error('Run cancelled'));
        return 'cancelled';
    }

    /**
     * Resolve once the run has finished
     */
    async wait(runId: string): Promise<RunSnapshot | undefined> {
        const entry = this.runs.get(runId);
        if (!entry) return undefined;
        await entry.done;
        return this.view(entry.snapshot);
    }

    /**
     * Abort every running run and wait for them to settle
     */
    async shutdown(): Promise<void> {
        for (const entry of this.runs.values()) {
            if (entry.snapshot.status === 'running') entry.controller.abort(new Error('Server shutting down'));
        }
        await Promise.all([...this.runs.values()].map((entry) => entry.done));
    }

    private evictFinished(): void {
        // Map iteration follows insertion order, so the oldest runs go first
        for (const [runId, entry] of this.runs) {
            if (this.runs.size <= this.maxRuns) return;
            if (entry.snapshot.status === 'running') continue;
            this.runs.delete(runId);
            logger.debug(`Run ${runId} evicted`);
        }
    }

    private view(snapshot: RunSnapshot): RunSnapshot {
        return structuredClone(snapshot);
    }
}

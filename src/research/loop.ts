/**
 * Research Loop - drives query → search → summarize → reflect until STOP,
 * then finalizes exactly once.
 */

import type { Config } from '../config.js';
import {
    DeliveryError,
    ModelError,
    ModelOutputError,
    RateLimitError,
    SearchError,
    toError,
} from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { Finalizer, formatReport } from './finalizer.js';
import { QueryGenerator } from './query-generator.js';
import { Reflector } from './reflector.js';
import { WebRetriever } from './retriever.js';
import { Summarizer } from './summarizer.js';
import {
    createResearchState,
    type Decision,
    type IterationRecord,
    type ResearchState,
    type SourceDoc,
} from './types.js';

const logger = createLogger('loop');

export type LoopPhase = 'generate_query' | 'web_research' | 'summarize' | 'reflect' | 'finalize';

export type LoopEvent =
    | { type: 'query'; iteration: number; query: string }
    | { type: 'sources'; iteration: number; sources: readonly SourceDoc[] }
    | { type: 'summary'; iteration: number; summary: string }
    | { type: 'decision'; iteration: number; decision: Decision; gap: string }
    | { type: 'report'; report: string }
    | { type: 'delivered'; recipient: string; messageId: string }
    | { type: 'error'; phase: LoopPhase; error: Error; recoverable: boolean };

export type LoopListener = (event: LoopEvent, state: Readonly<ResearchState>) => void;

export type OutcomeStatus = 'completed' | 'partial' | 'failed';

export interface RunOutcome {
    status: OutcomeStatus;
    state: ResearchState;
    report?: string;
    error?: Error;
    messageId?: string;
}

export interface RunOptions {
    signal?: AbortSignal;
    onEvent?: LoopListener;
}

export interface LoopStages {
    generator: QueryGenerator;
    retriever: WebRetriever;
    summarizer: Summarizer;
    reflector: Reflector;
    finalizer: Finalizer;
}

/**
 * Errors after which whatever was gathered is still worth reporting
 */
function isRecoverable(error: Error): boolean {
    return error instanceof ModelOutputError
        || error instanceof ModelError
        || error instanceof SearchError
        || error instanceof RateLimitError;
}

function isSkippableSearchError(error: Error): boolean {
    return error instanceof SearchError || error instanceof RateLimitError;
}

function abortReason(signal: AbortSignal): Error {
    return signal.reason === undefined ? new Error('Run cancelled') : toError(signal.reason);
}

export class ResearchLoop {
    private config: Config;
    private stages: LoopStages;

    constructor(config: Config, stages: LoopStages) {
        this.config = config;
        this.stages = stages;
    }

    get maxLoops(): number {
        return this.config.research.maxLoops;
    }

    async run(topic: string, options: RunOptions = {}): Promise<RunOutcome> {
        const { signal, onEvent } = options;
        const { generator, retriever, summarizer, reflector } = this.stages;
        const maxLoops = this.maxLoops;
        const state = createResearchState(topic);

        const emit = (event: LoopEvent) => {
            if (!onEvent) return;
            try {
                onEvent(event, state);
            } catch (error) {
                logger.warn(`Listener failed on ${event.type}: ${toError(error).message}`);
            }
        };
        const checkAborted = () => {
            if (signal?.aborted) throw abortReason(signal);
        };

        let phase: LoopPhase = 'generate_query';
        let record: IterationRecord | undefined;
        let suggested: string | undefined;

        try {
            for (;;) {
                checkAborted();
                phase = 'generate_query';
                const query = await generator.generate(topic, suggested, signal);
                state.lastQuery = query;

                checkAborted();
                phase = 'web_research';
                state.loopCount += 1;
                const current: IterationRecord = { index: state.loopCount, query, sourceCount: 0 };
                record = current;
                state.iterations.push(current);
                emit({ type: 'query', iteration: current.index, query });

                let batch: SourceDoc[] = [];
                try {
                    batch = await retriever.retrieve(query, state.loopCount - 1, signal);
                } catch (error) {
                    const err = toError(error);
                    const skip = !signal?.aborted
                        && this.config.search.failurePolicy === 'skip'
                        && isSkippableSearchError(err);
                    if (!skip) throw err;
                    current.error = err.message;
                    logger.warn(`Search failed for "${query}", continuing: ${err.message}`);
                    emit({ type: 'error', phase, error: err, recoverable: true });
                }
                current.sourceCount = batch.length;
                emit({ type: 'sources', iteration: current.index, sources: batch });

                checkAborted();
                phase = 'summarize';
                const summary = await summarizer.summarize(topic, state.runningSummary, state.sources, batch, signal);
                state.sources = [...state.sources, ...batch];
                state.runningSummary = summary;
                emit({ type: 'summary', iteration: current.index, summary });

                checkAborted();
                phase = 'reflect';
                const { decision, gap } = await reflector.reflect(topic, summary, state.loopCount, maxLoops, signal);
                state.lastReflection = gap;
                current.decision = decision.kind;
                current.reason = decision.kind === 'stop' ? decision.reason : gap;
                emit({ type: 'decision', iteration: current.index, decision, gap });

                if (decision.kind === 'stop') break;
                suggested = decision.query;
            }
        } catch (error) {
            const err = signal?.aborted ? abortReason(signal) : toError(error);
            const gathered = state.runningSummary !== '';
            const recoverable = !signal?.aborted && gathered && isRecoverable(err);

            if (record && !record.error) record.error = err.message;
            emit({ type: 'error', phase, error: err, recoverable });

            if (!recoverable) {
                logger.debug(`Run failed during ${phase}: ${err.message}`);
                state.status = 'failed';
                return { status: 'failed', state, error: err };
            }

            logger.warn(`Finalizing early after ${phase} failed: ${err.message}`);
            return this.finalize(state, 'partial', emit, err);
        }

        if (state.runningSummary === '') {
            const lastSearchError = [...state.iterations].reverse().find((iteration) => iteration.error)?.error;
            const err = new SearchError(
                this.config.search.provider,
                lastSearchError
                    ? `No sources were gathered; last search error: ${lastSearchError}`
                    : 'No sources were gathered'
            );
            logger.debug(`Run failed: ${err.message}`);
            emit({ type: 'error', phase: 'finalize', error: err, recoverable: false });
            state.status = 'failed';
            return { status: 'failed', state, error: err };
        }

        return this.finalize(state, 'completed', emit);
    }

    private async finalize(
        state: ResearchState,
        status: 'completed' | 'partial',
        emit: (event: LoopEvent) => void,
        cause?: Error
    ): Promise<RunOutcome> {
        const { finalizer } = this.stages;
        const report = formatReport(state.runningSummary, state.sources);
        emit({ type: 'report', report });

        try {
            const messageId = await finalizer.deliver(state.topic, report);
            if (messageId !== undefined) {
                emit({ type: 'delivered', recipient: finalizer.deliversTo, messageId });
            }
            state.status = status;
            return { status, state, report, error: cause, messageId };
        } catch (error) {
            const err = error instanceof DeliveryError
                ? error
                : new DeliveryError(finalizer.deliversTo, toError(error).message, { cause: error });
            emit({ type: 'error', phase: 'finalize', error: err, recoverable: false });
            state.status = 'failed';
            return { status: 'failed', state, report, error: err };
        }
    }
}

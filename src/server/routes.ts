/**
 * Routes of the inspection server
 *
 *   GET  /health
 *   GET  /config                 effective configuration, secrets masked
 *   POST /runs                   start a run (or wait for it with "wait": true)
 *   GET  /runs
 *   GET  /runs/:run_id
 *   POST /runs/:run_id/cancel
 */

import { z } from 'zod';
import {
    SEARCH_PROVIDERS,
    maskConfig,
    validateConfig,
    withOverrides,
    type Config,
} from '../config.js';
import { conflict, jsonResponse, notFound, parseBody, validationError } from './helpers.js';
import type { Router } from './router.js';
import type { RunRegistry, RunRequest } from './runs.js';

const RunBodySchema = z.object({
    topic: z.string().trim().min(1, 'topic must not be empty'),
    maxLoops: z.number().int().min(1).max(20).optional(),
    provider: z.enum(SEARCH_PROVIDERS).optional(),
    deliver: z.boolean().optional(),
    wait: z.boolean().optional(),
});

/**
 * Effective configuration for one run request
 */
export function runConfig(config: Config, request: RunRequest): Config {
    return withOverrides(config, {
        maxLoops: request.maxLoops,
        provider: request.provider,
        emailEnabled: request.deliver,
    });
}

export interface RouteContext {
    config: Config;
    registry: RunRegistry;
}

export function registerRoutes(router: Router, context: RouteContext): Router {
    const { config, registry } = context;

    router.get('/health', () => jsonResponse({ status: 'ok' }));

    router.get('/config', () => jsonResponse(maskConfig(config)));

    router.post('/runs', async (request) => {
        const body = await parseBody(request);
        if (body === null) return validationError('Request body is not valid JSON');

        const parsed = RunBodySchema.safeParse(body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            return validationError(`${issue.path.join('.') || 'body'}: ${issue.message}`);
        }

        const { wait, ...runRequest } = parsed.data;
        const { valid, errors } = validateConfig(runConfig(config, runRequest));
        if (!valid) return validationError(errors.join('; '));

        const started = registry.start(runRequest);
        if (wait) {
            const finished = await registry.wait(started.run_id);
            return jsonResponse(finished ?? started);
        }
        return jsonResponse({ run_id: started.run_id, status: started.status }, 202);
    });

    router.get('/runs', () => jsonResponse(registry.list()));

    router.get('/runs/:run_id', (_request, params) => {
        const snapshot = registry.get(params.run_id);
        return snapshot ? jsonResponse(snapshot) : notFound(`Run ${params.run_id} not found`);
    });

    router.post('/runs/:run_id/cancel', (_request, params) => {
        const runId = params.run_id;
        switch (registry.cancel(runId)) {
            case 'not_found':
                return notFound(`Run ${runId} not found`);
            case 'not_running':
                return conflict(`Run ${runId} is not running`);
            case 'cancelled':
                return jsonResponse({ run_id: runId, status: 'cancelling' });
        }
    });

    return router;
}

/**
 * Development/inspection server on node:http
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { Config } from '../config.js';
import { errorMessage } from '../errors.js';
import { buildResearchLoop, type LoopDependencies } from '../research/factory.js';
import { createLogger } from '../utils/logger.js';
import { Router } from './router.js';
import { registerRoutes, runConfig } from './routes.js';
import { RunRegistry } from './runs.js';

const logger = createLogger('server');

export function createApp(config: Config, deps: LoopDependencies = {}): { router: Router; registry: RunRegistry } {
    const registry = new RunRegistry(async (request, options) =>
        buildResearchLoop(runConfig(config, request), deps).run(request.topic, options)
    );
    const router = registerRoutes(new Router(), { config, registry });
    return { router, registry };
}

async function readBody(req: IncomingMessage): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
}

/**
 * Convert a node request into a fetch Request
 */
export async function toRequest(req: IncomingMessage, origin: string): Promise<Request> {
    const headers = new Headers();
    for (const [name, value] of Object.entries(req.headers)) {
        if (Array.isArray(value)) value.forEach((v) => headers.append(name, v));
        else if (value !== undefined) headers.set(name, value);
    }

    const method = req.method ?? 'GET';
    const hasBody = method !== 'GET' && method !== 'HEAD';
    return new Request(new URL(req.url ?? '/', origin), {
        method,
        headers,
        body: hasBody ? await readBody(req) : undefined,
    });
}

async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
    res.statusCode = response.status;
    response.headers.forEach((value, name) => res.setHeader(name, value));
    res.end(Buffer.from(await response.arrayBuffer()));
}

export interface RunningServer {
    server: Server;
    url: string;
    close(): Promise<void>;
}

export function startServer(config: Config, deps: LoopDependencies = {}): Promise<RunningServer> {
    const { host, port } = config.server;
    const origin = `http://${host}:${port}`;
    const { router, registry } = createApp(config, deps);

    const server = createServer((req, res) => {
        toRequest(req, origin)
            .then((request) => router.handle(request))
            .then((response) => writeResponse(response, res))
            .catch((error: unknown) => {
                logger.error(`Request failed: ${errorMessage(error)}`);
                if (!res.headersSent) res.statusCode = 500;
                res.end();
            });
    });

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            logger.info(`Listening on ${origin}`);
            resolve({
                server,
                url: origin,
                close: async () => {
                    await registry.shutdown();
                    await new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done())));
                },
            });
        });
    });
}

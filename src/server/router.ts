/**
 * Pattern-matching router over fetch Request/Response
 *
 * Routes are stored as segment arrays; `:name` segments capture parameters.
 * Uncaught handler errors become a 500 JSON error.
 */

import { createLogger } from '../utils/logger.js';
import { errorResponse, methodNotAllowed, notFound } from './helpers.js';

const logger = createLogger('router');

export type RouteHandler = (
    request: Request,
    params: Record<string, string>,
    query: URLSearchParams
) => Response | Promise<Response>;

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

function isHttpMethod(value: string): value is HttpMethod {
    return HTTP_METHODS.some((method) => method === value);
}

interface Route {
    method: HttpMethod;
    pattern: string;
    segments: string[];
    handler: RouteHandler;
}

export class Router {
    private routes: Route[] = [];

    get(pattern: string, handler: RouteHandler): this {
        return this.addRoute('GET', pattern, handler);
    }

    post(pattern: string, handler: RouteHandler): this {
        return this.addRoute('POST', pattern, handler);
    }

    addRoute(method: HttpMethod, pattern: string, handler: RouteHandler): this {
        this.routes.push({ method, pattern, segments: splitPath(pattern), handler });
        return this;
    }

    async handle(request: Request): Promise<Response> {
        const url = new URL(request.url);
        const pathSegments = splitPath(url.pathname);
        const method = request.method.toUpperCase();
        let pathMatched = false;

        for (const route of this.routes) {
            const params = matchSegments(route.segments, pathSegments);
            if (params === null) continue;

            if (!isHttpMethod(method) || route.method !== method) {
                pathMatched = true;
                continue;
            }

            try {
                return await route.handler(request, params, url.searchParams);
            } catch (error) {
                logger.error(`Handler error for ${request.method} ${url.pathname}:`, error);
                return errorResponse(error instanceof Error ? error.message : 'Internal server error', 500);
            }
        }

        return pathMatched ? methodNotAllowed() : notFound();
    }

    listRoutes(): { method: HttpMethod; pattern: string }[] {
        return this.routes.map((route) => ({ method: route.method, pattern: route.pattern }));
    }
}

/**
 * Split a path into non-empty segments; "/" gives [].
 */
export function splitPath(path: string): string[] {
    return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Extracted params on match, null on mismatch.
 */
export function matchSegments(routeSegments: string[], pathSegments: string[]): Record<string, string> | null {
    if (routeSegments.length !== pathSegments.length) return null;

    const params: Record<string, string> = {};
    for (let i = 0; i < routeSegments.length; i++) {
        const routeSegment = routeSegments[i];
        const pathSegment = pathSegments[i];
        if (routeSegment.startsWith(':')) {
            params[routeSegment.slice(1)] = decodeURIComponent(pathSegment);
        } else if (routeSegment !== pathSegment) {
            return null;
        }
    }
    return params;
}

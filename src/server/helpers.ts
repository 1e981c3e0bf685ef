/**
 * Response helpers for the inspection server
 * Errors always have the shape { "detail": string }.
 */

export function jsonResponse(data: unknown, status = 200, headers?: Record<string, string>): Response {
    return new Response(JSON.stringify(data), {
        status,
        headers: {
            'Content-Type': 'application/json',
            ...headers,
        },
    });
}

export function errorResponse(detail: string, status = 500): Response {
    return jsonResponse({ detail }, status);
}

export function notFound(detail = 'Not found'): Response {
    return errorResponse(detail, 404);
}

export function methodNotAllowed(detail = 'Method not allowed'): Response {
    return errorResponse(detail, 405);
}

export function conflict(detail: string): Response {
    return errorResponse(detail, 409);
}

export function validationError(detail: string): Response {
    return errorResponse(detail, 422);
}

/**
 * Parse a JSON request body. Empty body → {}; invalid JSON → null.
 */
export async function parseBody(request: Request): Promise<unknown> {
    const text = await request.text();
    if (text.trim() === '') return {};
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}

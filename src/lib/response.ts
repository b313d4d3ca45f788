export const CORS = {
	"Access-Control-Allow-Origin": "*",
	"Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, PATCH, OPTIONS",
	"Access-Control-Allow-Headers": "Content-Type, Authorization",
} as const;

/**
 * Create a JSON `Response` from the given data
 * @param data Anything `JSON.stringify` accepts
 * @param init Status and extra headers
 */
export function json(data: unknown, init: ResponseInit = {}): Response {
	const headers = new Headers(init.headers);
	if (!headers.has("content-type")) {
		headers.set("content-type", "application/json");
	}

	return new Response(JSON.stringify(data), { ...init, headers });
}

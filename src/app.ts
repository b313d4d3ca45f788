import express from "express";
import type {
	Express,
	NextFunction,
	Request as ExpressRequest,
	Response as ExpressResponse,
} from "express";
import api from "./api/index.js";
import { log as _log } from "./lib/log.js";
import { CORS } from "./lib/response.js";
import "./locals.js";
import type { PostStore } from "./posts/store.js";

const log = _log.extend("app");

export interface AppOptions {
	cors: boolean;
}

function request_url(req: ExpressRequest): URL {
	return new URL(req.originalUrl, `${req.protocol}://${req.get("host") ?? "localhost"}`);
}

/**
 * Rebuild the Web `Request` the API works with from an express request whose
 * body was read by `express.raw`
 */
export function to_request(req: ExpressRequest): Request {
	const url = request_url(req);

	const headers = new Headers();
	for (const [key, value] of Object.entries(req.headers)) {
		if (Array.isArray(value)) {
			for (const v of value) {
				headers.append(key, v);
			}
		} else if (value !== undefined) {
			headers.set(key, value);
		}
	}

	const raw: unknown = req.body;
	const body =
		!["GET", "HEAD"].includes(req.method) && Buffer.isBuffer(raw) && raw.length > 0 ? raw : undefined;

	return new Request(url, {
		method: req.method,
		headers,
		body,
	});
}

/**
 * Status and message for an error raised by express or its body parser,
 * which carry a 4xx `status` (413 for an oversized body, 415 for an unknown encoding)
 */
export function describe_error(err: unknown): { status: number; error: string } {
	if (
		err instanceof Error &&
		"status" in err &&
		typeof err.status === "number" &&
		err.status >= 400 &&
		err.status < 500
	) {
		return { status: err.status, error: err.message };
	}
	return { status: 500, error: "Internal Error" };
}

async function send(res: ExpressResponse, response: Response): Promise<void> {
	res.status(response.status);
	response.headers.forEach((value, key) => {
		res.setHeader(key, value);
	});
	res.end(Buffer.from(await response.arrayBuffer()));
}

export function create_app(store: PostStore, { cors }: AppOptions = { cors: true }): Express {
	const app = express();
	app.disable("x-powered-by");
	app.use(express.raw({ type: () => true, limit: "1mb" }));

	app.get(`${api.base}/openapi.json`, (req, res, next) => {
		api.openapi(request_url(req))
			.then((doc) => {
				res.json(doc);
			})
			.catch(next);
	});

	app.use(api.base, (req, res, next) => {
		api.handle(to_request(req), { store }, { cors })
			.then((response) => send(res, response))
			.catch(next);
	});

	app.use((err: unknown, req: ExpressRequest, res: ExpressResponse, next: NextFunction) => {
		if (res.headersSent) {
			next(err);
			return;
		}

		const { status, error } = describe_error(err);
		if (status === 500) {
			log.extend("error")("%s %s failed: %O", req.method, req.originalUrl, err);
		}
		if (cors) {
			res.set(CORS);
		}
		res.status(status).json({ error });
	});

	return app;
}

import type { Simplify } from "type-fest";
import { HttpError, error } from "./error.js";
import { log as _log } from "./log.js";
import type { OpenAPIDocument, OpenAPIObjectConfig, RouteConfig, RouteMethod } from "./openapi.js";
import { OpenAPIRegistry, OpenApiGeneratorV3 } from "./openapi.js";
import { CORS, json } from "./response.js";
import { explain, z } from "./zod.js";

const log = _log.extend("api");

export const METHOD = /^(GET|POST|PUT|DELETE|PATCH|OPTIONS)$/;

const OPENAPI_METHOD = {
	GET: "get",
	POST: "post",
	PUT: "put",
	DELETE: "delete",
	PATCH: "patch",
	OPTIONS: "options",
} as const satisfies Record<string, RouteMethod>;

type Method = keyof typeof OPENAPI_METHOD;

function is_method(method: string): method is Method {
	return Object.hasOwn(OPENAPI_METHOD, method);
}

export const ErrorBody = z
	.object({
		error: z.string(),
	})
	.openapi("Error");

/**
 * Values shared by every handler of a request.
 * Applications add their own fields through declaration merging:
 * ```ts
 * declare module "./lib/api.js" {
 *     interface Locals {
 *         store: PostStore;
 *     }
 * }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface Locals {}

export interface RequestEvent {
	request: Request;
	url: URL;
	params: Record<string, string>;
	route: { id: string };
	locals: Locals;
}

/**
 * Modify route config after parsing input-ouput shapes.
 * Useful for adding custom tags, etc.
 *
 * @param r Route config
 * @returns Modified route config
 * @example
 * ```ts
 * export const Modifier: RouteModifier = (r) => {
 *     r.tags = ["Tag"];
 *     r.operationId = "customOperationId";
 *     return r;
 * };
 * ```
 */
export type RouteModifier = (r: RouteConfig) => RouteConfig;

export interface HandleOptions {
	/**
	 * Enable CORS headers
	 */
	cors: boolean;
	/**
	 * Fallback values for missing input shapes, will be validated against
	 */
	fallback: Partial<Record<"body" | "query" | "param", Record<string, unknown>>>;
	/**
	 * Verify and strip unknown properties from output, useful for preventing accidental exposure of sensitive data
	 */
	verify: boolean;
}

export interface APIRoute<
	P extends z.ZodTypeAny = z.ZodTypeAny,
	Q extends z.ZodTypeAny = z.ZodTypeAny,
	I extends z.ZodTypeAny = z.ZodTypeAny,
	O extends z.ZodTypeAny = z.ZodTypeAny,
	E extends Record<string, HttpError> = Record<string, HttpError>,
> {
	/**
	 * Path parameters
	 */
	Param?: P;
	/**
	 * Query string parameters
	 */
	Query?: Q;
	/**
	 * Body
	 */
	Input?: I;
	/**
	 * Returning data
	 */
	Output?: O;
	/**
	 * Status code of a successful response, 200 when omitted
	 */
	Status?: number;
	/**
	 * Possible errors
	 */
	Error?: E;
	/**
	 * OpenAPI route config modifier
	 */
	Modifier?: RouteModifier;
	/**
	 * Handler
	 */
	default?(input: Record<string, unknown>, evt: RequestEvent): unknown;
}

export class Endpoint<
	P extends z.ZodTypeAny = z.ZodObject<Record<never, never>>,
	Q extends z.ZodTypeAny = z.ZodObject<Record<never, never>>,
	I extends z.ZodTypeAny = z.ZodObject<Record<never, never>>,
	O extends z.ZodTypeAny = z.ZodObject<Record<never, never>>,
	E extends Record<string, HttpError> = Record<string, HttpError>,
	H extends (
		input: Simplify<z.infer<I> & z.infer<Q> & z.infer<P>>,
		evt: RequestEvent,
	) => Promise<z.input<O>> = (
		input: Simplify<z.infer<I> & z.infer<Q> & z.infer<P>>,
		evt: RequestEvent,
	) => Promise<z.input<O>>,
> implements APIRoute<P, Q, I, O, E>
{
	constructor({ Param, Query, Input, Output, Status, Error, Modifier }: APIRoute<P, Q, I, O, E> = {}) {
		this.Param = Param;
		this.Query = Query;
		this.Input = Input;
		this.Output = Output;
		this.Status = Status;
		this.Error = Error;
		this.Modifier = Modifier;
	}

	handle(f: H): this {
		this.default = f;
		return this;
	}

	Param?: P;
	Query?: Q;
	Input?: I;
	Output?: O;
	Status?: number;
	Error?: E;
	Modifier?: RouteModifier;
	default?: H;
}

function is_route(module: object): module is APIRoute {
	return "default" in module && typeof module.default === "function";
}

/**
 * Match the segments of a route ID (without the leading `.` and the trailing method)
 * against the segments of a request path
 * @returns The path parameters, or `undefined` if the path does not match
 */
export function match(pattern: string[], segments: string[]): Record<string, string> | undefined {
	const params: Record<string, string> = {};

	for (let i = 0; i < pattern.length; i++) {
		const part = pattern[i];

		const rest = /^\[\.{3}(.+)\]$/.exec(part);
		if (rest) {
			if (i >= segments.length) {
				return undefined;
			}
			params[rest[1]] = segments.slice(i).map(decode).join("/");
			return params;
		}

		if (i >= segments.length) {
			return undefined;
		}

		const param = /^\[(.+)\]$/.exec(part);
		if (param) {
			params[param[1]] = decode(segments[i]);
		} else if (part !== segments[i]) {
			return undefined;
		}
	}

	return pattern.length === segments.length ? params : undefined;
}

/**
 * Gather entries into an object, turning repeated keys into arrays.
 * Keys are defined, not assigned, so `__proto__` stays an ordinary key.
 */
export function collect(entries: Iterable<[string, unknown]>): Record<string, unknown> {
	const values = new Map<string, unknown>();
	for (const [key, value] of entries) {
		const existing = values.get(key);
		if (existing === undefined) {
			values.set(key, value);
		} else if (Array.isArray(existing)) {
			existing.push(value);
		} else {
			values.set(key, [existing, value]);
		}
	}
	return Object.fromEntries(values);
}

function decode(segment: string): string {
	try {
		return decodeURIComponent(segment);
	} catch {
		throw error(400, `Invalid path segment: ${segment}`);
	}
}

export class API {
	public routes: Record<string, () => Promise<unknown>>;
	public config: OpenAPIObjectConfig;
	public base: string;
	public register: (registry: OpenAPIRegistry) => void;

	constructor(
		routes: Record<string, () => Promise<unknown>>,
		config: OpenAPIObjectConfig,
		base = "/api",
		register: (registry: OpenAPIRegistry) => void = () => undefined,
	) {
		this.routes = Object.fromEntries(
			Object.entries(routes)
				.filter(([route]) => {
					const parts = route.split("/");
					const last = parts[parts.length - 1].split(".")[0];
					return METHOD.test(last);
				})
				.map(([route, load]) => {
					const parts = route.split("/");
					const last = parts[parts.length - 1].split(".")[0];
					parts[parts.length - 1] = last;
					const id = parts.join("/");
					return [id, load];
				}),
		);
		log("routes: %o", Object.keys(this.routes));
		this.config = config;
		this.base = base;
		log("base: %s", this.base);

		this.register = register;
	}

	/**
	 * Answer a request. Errors never escape: an `HttpError` becomes `{ error }` with its status,
	 * anything else is logged and becomes a 500.
	 */
	async handle(
		request: Request,
		locals: Locals,
		{
			cors = true,
			fallback = {
				body: {},
				query: {},
				param: {},
			},
			verify = true,
		}: Partial<HandleOptions> = {},
	): Promise<Response> {
		const headers = cors ? CORS : {};

		try {
			return await this.respond(request, locals, { cors, fallback, verify });
		} catch (err) {
			if (err instanceof HttpError) {
				log("%d %s", err.status, err.body.message);
				return json({ error: err.body.message }, { status: err.status, headers });
			}

			log.extend("error")("unexpected error: %O", err);
			return json({ error: "Internal Error" }, { status: 500, headers });
		}
	}

	/**
	 * Find the route ID serving a request. Static segments win over parameters,
	 * so `/posts/search` is preferred to `/posts/[id]`.
	 */
	resolve(method: string, pathname: string): { id: string; params: Record<string, string> } | undefined {
		if (pathname !== this.base && !pathname.startsWith(`${this.base}/`)) {
			return undefined;
		}
		const segments = pathname.slice(this.base.length).split("/").filter(Boolean);

		let best: { id: string; params: Record<string, string>; score: number } | undefined;
		for (const id of Object.keys(this.routes)) {
			const parts = id.split("/");
			if (parts[parts.length - 1] !== method) {
				continue;
			}

			const pattern = parts.slice(1, -1);
			const params = match(pattern, segments);
			if (!params) {
				continue;
			}

			const score = pattern.filter((part) => !part.startsWith("[")).length;
			if (!best || score > best.score) {
				best = { id, params, score };
			}
		}

		return best && { id: best.id, params: best.params };
	}

	async openapi(url?: URL): Promise<OpenAPIDocument> {
		const registry = new OpenAPIRegistry();

		for (const route of Object.keys(this.routes)) {
			const module = await this.parse_module(route);

			const config = module.modifier({
				method: OPENAPI_METHOD[module.method],
				path: module.path,
				request: {
					params: module.param,
					query: module.query,
					body: module.body
						? {
								description: "",
								content: {
									"application/json": {
										schema: module.body,
									},
									"application/x-www-form-urlencoded": {
										schema: module.body,
									},
									"multipart/form-data": {
										schema: module.body,
									},
								},
							}
						: undefined,
				},
				responses: {
					...(module.output
						? {
								[module.status]: {
									description: "",
									content: {
										"application/json": {
											schema: module.output,
										},
									},
								},
							}
						: undefined),
					...(module.query || module.param || module.body
						? {
								"400": {
									description:
										"Invalid input (path parameters, query string, or body)",
									content: {
										"application/json": {
											schema: ErrorBody,
										},
									},
								},
							}
						: undefined),
					...Object.fromEntries(
						module.errors.map((error) => [
							error.status,
							{
								description: error.body.message,
								content: {
									"application/json": {
										schema: ErrorBody,
									},
								},
							},
						]),
					),
				},
			});

			registry.registerPath(config);
		}

		this.register(registry);

		const generator = new OpenApiGeneratorV3(registry.definitions);
		const openapi = generator.generateDocument(
			url
				? {
						servers: [
							{
								url: url.origin,
							},
						],
						...this.config,
					}
				: this.config,
		);
		log("openapi: %d paths", Object.keys(openapi.paths).length);
		return openapi;
	}

	protected async respond(
		request: Request,
		locals: Locals,
		{ cors, fallback, verify }: HandleOptions,
	): Promise<Response> {
		const url = new URL(request.url);
		const method = request.method.toUpperCase();
		log("%s %s", method, url.pathname);

		// handle OPTIONS
		if (method === "OPTIONS") {
			return new Response(null, {
				headers: cors ? CORS : {},
			});
		}

		const route = this.resolve(method, url.pathname);
		if (!route) {
			throw error(404, "Route not found");
		}
		log("route id: %s", route.id);

		const evt: RequestEvent = {
			request,
			url,
			params: route.params,
			route: { id: route.id },
			locals,
		};

		const module = await this.load(route.id);

		const param = await this.parse_param(evt, module, fallback.param);
		const query = await this.parse_query(evt, module, fallback.query);
		const body = await this.parse_body(evt, module, fallback.body);

		if (!module.default) {
			throw error(500, "Route handler not defined");
		}

		const output = await module.default({ ...body, ...query, ...param }, evt);

		if (output instanceof Response) {
			if (cors) {
				for (const [key, value] of Object.entries(CORS)) {
					output.headers.set(key, value);
				}
			}

			return output;
		}

		const out = verify ? await this.parse_output(output, module) : output;
		return json(out, {
			status: module.Status ?? 200,
			headers: cors ? CORS : {},
		});
	}

	protected async load(id: string): Promise<APIRoute> {
		const loader = this.routes[id];
		if (!loader) {
			throw error(404, "Route not found");
		}

		const module = await loader();
		if (!module || typeof module !== "object" || !("default" in module)) {
			throw error(404, "Route not found");
		}
		if (module.default instanceof Endpoint) {
			return module.default;
		} else if (is_route(module)) {
			// whole module is an endpoint
			return module;
		} else {
			throw error(404, "Route type not supported");
		}
	}

	protected async parse_body(
		evt: RequestEvent,
		module: APIRoute,
		fallback?: Record<string, unknown>,
	): Promise<Record<string, unknown>> {
		let body: Record<string, unknown> = { ...fallback };

		// GET, HEAD, DELETE, OPTIONS have no body
		const method = evt.request.method.toUpperCase();
		if (["GET", "HEAD", "DELETE", "OPTIONS"].includes(method)) {
			return body;
		}
		const clonedRequest = evt.request.clone();
		const type = clonedRequest.headers.get("content-type");
		// JSON body
		if (type?.startsWith("application/json")) {
			const text = await clonedRequest.text();
			if (text.trim()) {
				let json: unknown;
				try {
					json = JSON.parse(text);
				} catch {
					throw error(400, "Invalid JSON body");
				}
				if (typeof json === "object" && json !== null && !Array.isArray(json)) {
					body = { ...body, ...json };
				}
			}
		}
		// Form body
		else if (
			type?.startsWith("application/x-www-form-urlencoded") ||
			type?.startsWith("multipart/form-data")
		) {
			const form = await clonedRequest.formData();
			body = { ...body, ...collect(form.entries()) };
		}

		log("body: %O", body);

		const validator = module.Input instanceof z.ZodObject ? module.Input : z.object({});
		const validation = validator.safeParse(body);
		if (!validation.success) {
			throw error(400, `Invalid body.\n${explain(validation.error)}`);
		} else {
			body = validation.data;
		}

		return body;
	}

	protected async parse_query(
		evt: RequestEvent,
		module: APIRoute,
		fallback?: Record<string, unknown>,
	): Promise<Record<string, unknown>> {
		let query: Record<string, unknown> = {
			...fallback,
			...collect(evt.url.searchParams.entries()),
		};

		log("query: %O", query);

		const validator = module.Query instanceof z.ZodObject ? module.Query : z.object({});
		const validation = validator.safeParse(query);
		if (!validation.success) {
			throw error(400, `Invalid query.\n${explain(validation.error)}`);
		} else {
			query = validation.data;
		}

		return query;
	}

	protected async parse_param(
		evt: RequestEvent,
		module: APIRoute,
		fallback?: Record<string, unknown>,
	): Promise<Record<string, unknown>> {
		let param: Record<string, unknown> = { ...fallback, ...evt.params };

		log("param: %O", param);

		const validator = module.Param instanceof z.ZodObject ? module.Param : z.object({});
		const validation = validator.safeParse(param);
		if (!validation.success) {
			throw error(400, `Invalid param.\n${explain(validation.error)}`);
		} else {
			param = validation.data;
		}

		return param;
	}

	protected async parse_output(out: unknown, module: APIRoute): Promise<unknown> {
		const output = Array.isArray(out) ? out : typeof out === "object" ? { ...out } : out;

		const validator = module.Output instanceof z.ZodType ? module.Output : z.object({});
		const validation = await validator.spa(output);
		if (!validation.success) {
			log.extend("error")("output: %O failed validation: %O", output, validation.error);
			throw error(500, "Output validation failed. Please report this error to the developer.");
		}

		return validation.data;
	}

	protected async parse_module(id: string): Promise<{
		path: string;
		method: Method;
		status: number;
		body?: z.AnyZodObject;
		query?: z.AnyZodObject;
		param?: z.AnyZodObject;
		output?: z.ZodTypeAny;
		errors: HttpError[];
		modifier: RouteModifier;
	}> {
		const parts = id.split("/");
		const path = parts
			.slice(0, -1)
			.join("/")
			.replace(/^\./, this.base)
			.replace(/\[(\.{3})?(.+?)\]/g, "{$2}");
		const method = parts[parts.length - 1].toUpperCase();
		if (!is_method(method)) {
			throw new Error(`Route ${id} has no valid method`);
		}

		const module = await this.load(id);

		const body = module.Input instanceof z.ZodObject ? module.Input : undefined;
		const query = module.Query instanceof z.ZodObject ? module.Query : undefined;
		const param = module.Param instanceof z.ZodObject ? module.Param : undefined;
		const output = module.Output instanceof z.ZodType ? module.Output : undefined;
		const errors = module.Error && typeof module.Error === "object" ? Object.values(module.Error) : [];
		const modifier = typeof module.Modifier === "function" ? module.Modifier : (r: RouteConfig) => r;

		return {
			path,
			method,
			status: module.Status ?? 200,
			body,
			query,
			param,
			output,
			errors,
			modifier,
		};
	}
}

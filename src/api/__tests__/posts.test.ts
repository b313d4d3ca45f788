import { beforeEach, describe, expect, it } from "vitest";

import { ErrorBody, z } from "../../lib/index.js";
import { PostSchema } from "../../posts/schema.js";
import { PostStore } from "../../posts/store.js";
import api from "../index.js";

const Posts = z.array(PostSchema);

let store: PostStore;

beforeEach(() => {
	store = new PostStore([
		{ id: 1, title: "Banana", content: "Hello World" },
		{ id: 2, title: "Apple", content: "Other" },
	]);
});

function request(method: string, path: string, body?: unknown): Promise<Response> {
	return api.handle(
		new Request(`http://localhost${path}`, {
			method,
			headers: body === undefined ? {} : { "content-type": "application/json" },
			body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
		}),
		{ store },
	);
}

describe("GET /api/posts", () => {
	it("lists posts in insertion order with CORS headers", async () => {
		const res = await request("GET", "/api/posts");

		expect(res.status).toBe(200);
		expect(res.headers.get("access-control-allow-origin")).toBe("*");
		expect(res.headers.get("content-type")).toBe("application/json");
		expect(await res.json()).toEqual([
			{ id: 1, title: "Banana", content: "Hello World" },
			{ id: 2, title: "Apple", content: "Other" },
		]);
	});

	it("sorts by title", async () => {
		const asc = await request("GET", "/api/posts?sort=title&direction=asc");
		expect(Posts.parse(await asc.json()).map((p) => p.title)).toEqual(["Apple", "Banana"]);

		const desc = await request("GET", "/api/posts?sort=title&direction=desc");
		expect(Posts.parse(await desc.json()).map((p) => p.title)).toEqual([
			"Banana",
			"Apple",
		]);
	});

	it("rejects an unknown sort field", async () => {
		const res = await request("GET", "/api/posts?sort=unknown");

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({
			error: "Invalid sort field. Must be 'title' or 'content'.",
		});
	});

	it("rejects an unknown direction", async () => {
		const res = await request("GET", "/api/posts?sort=title&direction=sideways");

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({
			error: "Invalid sort direction. Must be 'asc' or 'desc'.",
		});
	});

	it("uses the first of repeated parameters", async () => {
		const res = await request("GET", "/api/posts?sort=title&sort=content&direction=desc&direction=x");

		expect(res.status).toBe(200);
		expect(Posts.parse(await res.json()).map((p) => p.id)).toEqual([1, 2]);
	});
});

describe("POST /api/posts", () => {
	it("creates a post with a fresh id", async () => {
		const res = await request("POST", "/api/posts", { title: "A", content: "B" });

		expect(res.status).toBe(201);
		expect(await res.json()).toEqual({ id: 3, title: "A", content: "B" });

		const list = await request("GET", "/api/posts");
		expect(await list.json()).toContainEqual({ id: 3, title: "A", content: "B" });
	});

	it("lists both missing fields", async () => {
		const res = await request("POST", "/api/posts", {});

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "title, content fields are required!" });
		expect(store.size).toBe(2);
	});

	it("names the single missing field", async () => {
		const res = await request("POST", "/api/posts", { title: "x" });

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "content is required!" });
	});

	it("rejects malformed JSON", async () => {
		const res = await request("POST", "/api/posts", "{ title");

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "Invalid JSON body" });
	});

	it("rejects fields that are not text", async () => {
		const res = await request("POST", "/api/posts", { title: 5, content: "B" });
		const body = ErrorBody.parse(await res.json());

		expect(res.status).toBe(400);
		expect(body.error).toMatch(/^Invalid body\.\n/);
		expect(store.size).toBe(2);
	});

	it("does not read fields through a __proto__ key", async () => {
		const res = await request("POST", "/api/posts", '{"__proto__":{"title":"p","content":"q"}}');

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "title, content fields are required!" });
		expect(store.size).toBe(2);
	});

	it("reads form bodies", async () => {
		const res = await api.handle(
			new Request("http://localhost/api/posts", {
				method: "POST",
				headers: { "content-type": "application/x-www-form-urlencoded" },
				body: "title=Form&content=Body",
			}),
			{ store },
		);

		expect(res.status).toBe(201);
		expect(await res.json()).toEqual({ id: 3, title: "Form", content: "Body" });
	});
});

describe("GET /api/posts/{id}", () => {
	it("returns one post", async () => {
		const res = await request("GET", "/api/posts/2");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ id: 2, title: "Apple", content: "Other" });
	});

	it("answers 404 for an unknown id", async () => {
		const res = await request("GET", "/api/posts/42");

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: "Post with id 42 doesn't exist." });
	});
});

describe("PUT /api/posts/{id}", () => {
	it("changes only the given fields and ignores the rest", async () => {
		const res = await request("PUT", "/api/posts/1", { title: "new", id: 99, author: "me" });

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ id: 1, title: "new", content: "Hello World" });
		expect(store.get(1)).toEqual({ id: 1, title: "new", content: "Hello World" });
	});

	it("answers 404 for an unknown id", async () => {
		const res = await request("PUT", "/api/posts/7", { title: "new" });

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: "Post with id 7 doesn't exist." });
		expect(store.size).toBe(2);
	});

	it("rejects an id that is not an integer", async () => {
		const res = await request("PUT", "/api/posts/abc", { title: "new" });
		const body = ErrorBody.parse(await res.json());

		expect(res.status).toBe(400);
		expect(body.error).toMatch(/^Invalid param\.\n/);
	});

	it("accepts only plain digits as an id", async () => {
		for (const id of ["2.0", "0x2", "2e0", "%202"]) {
			const res = await request("PUT", `/api/posts/${id}`, { title: "z" });
			expect(res.status).toBe(400);
		}
		expect(store.get(2)).toEqual({ id: 2, title: "Apple", content: "Other" });
	});

	it("validates the body before looking up the id", async () => {
		const res = await request("PUT", "/api/posts/999", { title: 5 });
		const body = ErrorBody.parse(await res.json());

		expect(res.status).toBe(400);
		expect(body.error).toMatch(/^Invalid body\.\n/);
	});
});

describe("DELETE /api/posts/{id}", () => {
	it("deletes once, then answers 404", async () => {
		const first = await request("DELETE", "/api/posts/1");

		expect(first.status).toBe(200);
		expect(await first.json()).toEqual({
			message: "Post with id 1 has been deleted successfully.",
		});
		expect(store.size).toBe(1);

		const second = await request("DELETE", "/api/posts/1");

		expect(second.status).toBe(404);
		expect(await second.json()).toEqual({ error: "Post with id 1 doesn't exist." });
		expect(store.size).toBe(1);
	});

	it("leaves the post alone for a non-decimal id", async () => {
		const res = await request("DELETE", "/api/posts/0x1");

		expect(res.status).toBe(400);
		expect(store.size).toBe(2);
		expect(store.get(1)).toEqual({ id: 1, title: "Banana", content: "Hello World" });
	});
});

describe("GET /api/posts/search", () => {
	it("matches titles ignoring case", async () => {
		store = new PostStore([
			{ id: 1, title: "Hello World", content: "a" },
			{ id: 2, title: "Other", content: "b" },
		]);
		const res = await request("GET", "/api/posts/search?title=hello");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual([{ id: 1, title: "Hello World", content: "a" }]);
	});

	it("matches content", async () => {
		const res = await request("GET", "/api/posts/search?content=world");

		expect(await res.json()).toEqual([{ id: 1, title: "Banana", content: "Hello World" }]);
	});

	it("returns nothing without filters", async () => {
		const res = await request("GET", "/api/posts/search");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual([]);
	});

	it("uses the first of repeated filters", async () => {
		const res = await request("GET", "/api/posts/search?title=ban&title=x");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual([{ id: 1, title: "Banana", content: "Hello World" }]);
	});
});

describe("routing", () => {
	it("answers 404 for unknown paths and methods", async () => {
		const missing = await request("GET", "/api/comments");
		expect(missing.status).toBe(404);
		expect(await missing.json()).toEqual({ error: "Route not found" });

		const patch = await request("PATCH", "/api/posts/1", { title: "x" });
		expect(patch.status).toBe(404);
	});

	it("answers preflight requests", async () => {
		const res = await request("OPTIONS", "/api/posts");

		expect(res.status).toBe(200);
		expect(res.headers.get("access-control-allow-origin")).toBe("*");
		expect(res.headers.get("access-control-allow-methods")).toBe(
			"GET, POST, PUT, DELETE, PATCH, OPTIONS",
		);
		expect(await res.text()).toBe("");
	});

	it("leaves out CORS headers when disabled", async () => {
		const res = await api.handle(new Request("http://localhost/api/posts"), { store }, { cors: false });

		expect(res.status).toBe(200);
		expect(res.headers.get("access-control-allow-origin")).toBeNull();
	});
});

describe("openapi", () => {
	it("documents every route", async () => {
		const doc = await api.openapi(new URL("http://localhost:5002/api/openapi.json"));

		expect(doc.openapi).toBe("3.0.0");
		expect(doc.servers).toEqual([{ url: "http://localhost:5002" }]);
		expect(Object.keys(doc.paths).sort()).toEqual([
			"/api/posts",
			"/api/posts/search",
			"/api/posts/{id}",
		]);
		expect(Object.keys(doc.paths["/api/posts"]?.post?.responses ?? {})).toEqual(["201", "400"]);
		expect(Object.keys(doc.paths["/api/posts/{id}"]?.delete?.responses ?? {})).toEqual([
			"200",
			"400",
			"404",
		]);
		expect(doc.paths["/api/posts/search"]?.get?.tags).toEqual(["posts"]);
	});
});

import { log as _log } from "../lib/log.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { SortDirection, SortField } from "./schema.js";

const log = _log.extend("store");

export interface Post {
	id: number;
	title: string;
	content: string;
}

export type PostFields = Pick<Post, "title" | "content">;

export interface ListQuery {
	sort?: string;
	direction?: string;
}

export interface SearchQuery {
	title?: string;
	content?: string;
}

const REQUIRED = ["title", "content"] as const;

/**
 * Order strings by Unicode code point, so characters outside the BMP sort after `\uFFFF`
 */
function compare(a: string, b: string): number {
	const x = [...a];
	const y = [...b];
	for (let i = 0; i < Math.min(x.length, y.length); i++) {
		const diff = (x[i].codePointAt(0) ?? 0) - (y[i].codePointAt(0) ?? 0);
		if (diff !== 0) {
			return diff;
		}
	}
	return x.length - y.length;
}

export function required_message(missing: readonly string[]): string {
	return missing.length === 1
		? `${missing[0]} is required!`
		: `${missing.join(", ")} fields are required!`;
}

/**
 * The in-memory post collection. Every operation is synchronous, so on a single
 * event loop each one completes before the next request sees the collection.
 *
 * Ids come from a counter that only moves forward: deleting the newest post
 * never frees its id for the next one.
 */
export class PostStore {
	protected posts: Post[];
	protected next_id: number;

	constructor(seed: readonly Post[] = []) {
		const ids = new Set<number>();
		for (const post of seed) {
			if (ids.has(post.id)) {
				throw new Error(`Duplicate post id ${post.id} in seed`);
			}
			ids.add(post.id);
		}

		this.posts = seed.map((post) => ({ ...post }));
		this.next_id = seed.length ? Math.max(...ids) + 1 : 0;
		log("seeded %d posts, next id %d", this.posts.length, this.next_id);
	}

	get size(): number {
		return this.posts.length;
	}

	/**
	 * All posts in insertion order, or a copy sorted by `sort`
	 * (ascending unless `direction` is `desc`).
	 */
	list({ sort, direction }: ListQuery = {}): Post[] {
		let field: SortField | undefined;
		if (sort) {
			const parsed = SortField.safeParse(sort);
			if (!parsed.success) {
				throw new ValidationError("Invalid sort field. Must be 'title' or 'content'.");
			}
			field = parsed.data;
		}

		if (direction && !SortDirection.safeParse(direction).success) {
			throw new ValidationError("Invalid sort direction. Must be 'asc' or 'desc'.");
		}

		const posts = this.posts.map((post) => ({ ...post }));
		if (!field) {
			return posts;
		}

		const key = field;
		const sign = direction === "desc" ? -1 : 1;
		return posts.sort((a, b) => sign * compare(a[key], b[key]));
	}

	get(id: number): Post {
		return { ...this.find(id) };
	}

	create(input: Partial<PostFields>): Post {
		const { title, content } = input;
		if (title === undefined || content === undefined) {
			const missing = REQUIRED.filter((field) => input[field] === undefined);
			throw new ValidationError(required_message(missing));
		}

		const post: Post = { id: this.next_id++, title, content };
		this.posts.push(post);
		log("created post %d", post.id);

		return { ...post };
	}

	/**
	 * Apply the fields present in `input`; the others keep their value.
	 */
	update(id: number, input: Partial<PostFields>): Post {
		const post = this.find(id);

		if (input.title !== undefined) {
			post.title = input.title;
		}
		if (input.content !== undefined) {
			post.content = input.content;
		}
		log("updated post %d", id);

		return { ...post };
	}

	delete(id: number): { message: string } {
		const index = this.posts.findIndex((post) => post.id === id);
		if (index === -1) {
			throw new NotFoundError(id);
		}

		this.posts.splice(index, 1);
		log("deleted post %d", id);

		return { message: `Post with id ${id} has been deleted successfully.` };
	}

	/**
	 * Posts whose title contains `title` or whose content contains `content`, ignoring case.
	 * Without either filter nothing matches.
	 */
	search({ title, content }: SearchQuery = {}): Post[] {
		const t = title?.toLowerCase();
		const c = content?.toLowerCase();

		return this.posts
			.filter(
				(post) =>
					(t !== undefined && post.title.toLowerCase().includes(t)) ||
					(c !== undefined && post.content.toLowerCase().includes(c)),
			)
			.map((post) => ({ ...post }));
	}

	protected find(id: number): Post {
		const post = this.posts.find((post) => post.id === id);
		if (!post) {
			throw new NotFoundError(id);
		}
		return post;
	}
}

import { z } from "../lib/zod.js";
import type { Post } from "./store.js";

export const SortField = z.enum(["title", "content"]);
export type SortField = z.infer<typeof SortField>;

export const SortDirection = z.enum(["asc", "desc"]);
export type SortDirection = z.infer<typeof SortDirection>;

export const PostSchema = z
	.object({
		id: z.number().int(),
		title: z.string(),
		content: z.string(),
	})
	.openapi("Post") satisfies z.ZodSchema<Post>;

/**
 * Seed file contents, see `data/seed.json`
 */
export const Seed = z.array(PostSchema);

import { readFile } from "node:fs/promises";
import { explain } from "../lib/zod.js";
import { Seed } from "./schema.js";
import type { Post } from "./store.js";

export const DEFAULT_SEED = new URL("../../data/seed.json", import.meta.url);

/**
 * Read the posts a store starts with from a JSON file
 */
export async function load_seed(file: URL | string = DEFAULT_SEED): Promise<Post[]> {
	const data: unknown = JSON.parse(await readFile(file, "utf8"));

	const result = Seed.safeParse(data);
	if (!result.success) {
		throw new Error(`Invalid seed file ${file.toString()}.\n${explain(result.error)}`);
	}

	return result.data;
}

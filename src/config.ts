import { explain, z } from "./lib/zod.js";

const flag = z
	.enum(["true", "false", "1", "0"])
	.transform((value) => value === "true" || value === "1");

export const Config = z.object({
	HOST: z.string().min(1).default("0.0.0.0"),
	PORT: z.coerce.number().int().min(0).max(65535).default(5002),
	/**
	 * Start with the posts of `data/seed.json` instead of an empty collection
	 */
	SEED: flag.default("true"),
	/**
	 * Allow cross-origin requests from anywhere
	 */
	CORS: flag.default("true"),
});

export type Config = z.infer<typeof Config>;

export function load_config(env: Record<string, string | undefined> = process.env): Config {
	const result = Config.safeParse(env);
	if (!result.success) {
		throw new Error(`Invalid configuration.\n${explain(result.error)}`);
	}

	return result.data;
}

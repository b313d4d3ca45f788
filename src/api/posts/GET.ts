import { Endpoint, first, z } from "../../lib/index.js";
import { PostSchema } from "../../posts/schema.js";
import { Modifier } from "./modifier.js";

export const Query = z.object({
	sort: first(z.string().optional()).openapi({
		description: "Field to sort by: `title` or `content`",
	}),
	direction: first(z.string().optional()).openapi({ description: "`asc` (default) or `desc`" }),
});

export const Output = z.array(PostSchema);

export default new Endpoint({ Query, Output, Modifier }).handle(async (query, { locals }) => {
	return locals.store.list(query);
});

import type { RequestEvent } from "../../../lib/index.js";
import { first, z } from "../../../lib/index.js";
import { PostSchema } from "../../../posts/schema.js";

export { Modifier } from "../modifier.js";

export const Query = z.object({
	title: first(z.string().optional()),
	content: first(z.string().optional()),
});

export const Output = z.array(PostSchema);

export default async function (
	query: z.infer<typeof Query>,
	{ locals }: RequestEvent,
): Promise<z.infer<typeof Output>> {
	return locals.store.search(query);
}

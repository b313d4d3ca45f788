import { Endpoint, z } from "../../lib/index.js";
import { PostSchema } from "../../posts/schema.js";
import { Modifier } from "./modifier.js";

// presence is checked by the store so that every missing field is reported at once
export const Input = z.object({
	title: z.string().optional(),
	content: z.string().optional(),
});

export const Output = PostSchema;

export default new Endpoint({ Input, Output, Status: 201, Modifier }).handle(
	async (input, { locals }) => {
		return locals.store.create(input);
	},
);

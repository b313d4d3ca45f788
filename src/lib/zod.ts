import { z } from "zod";
import { extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";
import { fromZodError } from "zod-validation-error";

extendZodWithOpenApi(z);

/**
 * An integer carried in a path segment, e.g. the `{id}` of `/posts/{id}`
 */
export function integer() {
	return z
		.string()
		.regex(/^\d+$/, "Expected an integer")
		.transform(Number)
		.openapi({ type: "integer" });
}

/**
 * Keep only the first value of a repeated query parameter
 */
export function first<T extends z.ZodTypeAny>(schema: T) {
	return z.preprocess((value) => (Array.isArray(value) ? value[0] : value), schema);
}

export function explain(err: z.ZodError): string {
	return fromZodError(err).message;
}

export { z };

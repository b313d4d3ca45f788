import { HttpError } from "../lib/error.js";

/**
 * Client input rejected before anything was changed.
 */
export class ValidationError extends HttpError {
	constructor(message: string) {
		super(400, message);
		this.name = "ValidationError";
	}
}

export class NotFoundError extends HttpError {
	readonly id: number;

	constructor(id: number) {
		super(404, `Post with id ${id} doesn't exist.`);
		this.name = "NotFoundError";
		this.id = id;
	}
}

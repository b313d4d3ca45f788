export interface HttpErrorBody {
	message: string;
}

/**
 * An error that is answered with its own status code instead of a 500.
 */
export class HttpError extends Error {
	readonly status: number;
	readonly body: HttpErrorBody;

	constructor(status: number, message: string) {
		super(message);
		this.name = "HttpError";
		this.status = status;
		this.body = { message };
	}
}

export function error(status: number, message: string): HttpError {
	return new HttpError(status, message);
}

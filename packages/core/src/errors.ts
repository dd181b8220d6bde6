export type JobErrorKind = "not_found" | "format" | "validation";

/**
 * Base class for every failure the job reports through its error path.
 */
export abstract class JobError extends Error {
	abstract readonly kind: JobErrorKind;
}

export class NotFoundError extends JobError {
	readonly kind = "not_found";

	constructor(message: string, public readonly path?: string) {
		super(message);
		this.name = "NotFoundError";
	}
}

export class FormatError extends JobError {
	readonly kind = "format";

	constructor(message: string, public readonly detail?: string) {
		super(message);
		this.name = "FormatError";
	}
}

export class ValidationError extends JobError {
	readonly kind = "validation";

	constructor(message: string, public readonly field?: string) {
		super(message);
		this.name = "ValidationError";
	}
}

export const isJobError = (error: unknown): error is JobError =>
	error instanceof JobError;

export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "string") return error;
	return "An unknown error occurred";
}

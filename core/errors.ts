export type AppErrorCode = "NOT_FOUND" | "INVALID_ARGUMENT" | "IO" | "PARSE";

/** Distinguishes "file missing" from "file present but unreadable as data". */
export type ParseFailureReason = "missing" | "malformed";

export interface AppErrorDetails {
	/** Filesystem path the failure relates to */
	path?: string;
	/** Filesystem operation that failed (IO errors only) */
	operation?: string;
	reason?: ParseFailureReason;
	cause?: unknown;
}

/**
 * Application-level error with a machine-readable code.
 * IO and PARSE errors carry the path involved so callers can
 * tell a corrupt file from an unavailable disk.
 */
export class AppError extends Error {
	readonly code: AppErrorCode;
	readonly path?: string;
	readonly operation?: string;
	readonly reason?: ParseFailureReason;

	constructor(
		code: AppErrorCode,
		message: string,
		details: AppErrorDetails = {},
	) {
		super(message, { cause: details.cause });
		this.name = "AppError";
		this.code = code;
		this.path = details.path;
		this.operation = details.operation;
		this.reason = details.reason;
	}
}

export function isAppError(
	error: unknown,
	code?: AppErrorCode,
): error is AppError {
	return (
		error instanceof AppError && (code === undefined || error.code === code)
	);
}

export function ioError(
	operation: string,
	path: string,
	cause: unknown,
): AppError {
	const detail = cause instanceof Error ? cause.message : String(cause);
	return new AppError("IO", `Failed to ${operation} ${path}: ${detail}`, {
		path,
		operation,
		cause,
	});
}

export function errorCode(error: unknown): string | undefined {
	return typeof error === "object" &&
		error !== null &&
		"code" in error &&
		typeof error.code === "string"
		? error.code
		: undefined;
}

import { z } from "zod";
import { AppError, errorCode, isAppError } from "../errors";
import { readText, writeTextAtomic } from "./fs-ops";
import {
	STORE_FILE_VERSION,
	type StoreConfig,
	type VersionedFile,
} from "./store-types";

const envelopeSchema = z.object({
	version: z.number().int(),
	data: z.unknown(),
});

/**
 * A single JSON document on disk, wrapped in a `{ version, data }` envelope
 * and validated against a zod schema on every read.
 */
export class JsonStore<T> {
	constructor(
		private readonly config: StoreConfig,
		private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	) {}

	get filePath(): string {
		return this.config.filePath;
	}

	/** Read and validate. Throws PARSE with reason "missing" or "malformed". */
	async read(): Promise<T> {
		let raw: string;
		try {
			raw = await readText(this.config.filePath);
		} catch (err: unknown) {
			if (err instanceof AppError && errorCode(err.cause) === "ENOENT") {
				throw new AppError("PARSE", `File not found: ${this.config.filePath}`, {
					path: this.config.filePath,
					reason: "missing",
					cause: err.cause,
				});
			}
			throw err;
		}
		return this.parse(raw);
	}

	/** Like read(), but a missing file yields `fallback` instead of an error. */
	async readOr(fallback: T): Promise<T> {
		try {
			return await this.read();
		} catch (err: unknown) {
			if (isAppError(err, "PARSE") && err.reason === "missing") {
				return fallback;
			}
			throw err;
		}
	}

	/** Write via a temp file and rename so readers never see a half-written file. */
	async write(data: T): Promise<void> {
		const versioned: VersionedFile<T> = { version: STORE_FILE_VERSION, data };
		await writeTextAtomic(
			this.config.filePath,
			JSON.stringify(versioned, null, 2),
		);
	}

	private parse(raw: string): T {
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err: unknown) {
			throw this.malformed("invalid JSON", err);
		}

		const envelope = envelopeSchema.safeParse(parsed);
		if (!envelope.success) {
			throw this.malformed(describeIssue(envelope.error), envelope.error);
		}

		const result = this.schema.safeParse(envelope.data.data);
		if (!result.success) {
			throw this.malformed(describeIssue(result.error, "data"), result.error);
		}
		return result.data;
	}

	private malformed(detail: string, cause: unknown): AppError {
		return new AppError(
			"PARSE",
			`Malformed file ${this.config.filePath}: ${detail}`,
			{ path: this.config.filePath, reason: "malformed", cause },
		);
	}
}

function describeIssue(error: z.ZodError, prefix?: string): string {
	const issue = error.issues[0];
	if (!issue) {
		return "invalid data";
	}
	const path = prefix ? [prefix, ...issue.path] : issue.path;
	return path.length > 0 ? `${issue.message} at ${path.join(".")}` : issue.message;
}

import { z } from "zod";
import { AppError } from "./errors";

export const logLevelSchema = z.enum([
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
	QUIRE_LOG_LEVEL: logLevelSchema.default("info"),
	QUIRE_DEFAULT_VOLUME_TITLE: z.string().trim().min(1).default("Volume 1"),
});

export interface QuireConfig {
	logLevel: LogLevel;
	/** Title given to the volume every new project starts with */
	defaultVolumeTitle: string;
}

export const DEFAULT_CONFIG: QuireConfig = {
	logLevel: "info",
	defaultVolumeTitle: "Volume 1",
};

/** Read configuration from environment variables. */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): QuireConfig {
	const result = envSchema.safeParse({
		QUIRE_LOG_LEVEL: env.QUIRE_LOG_LEVEL,
		QUIRE_DEFAULT_VOLUME_TITLE: env.QUIRE_DEFAULT_VOLUME_TITLE,
	});
	if (!result.success) {
		const issue = result.error.issues[0];
		const field = issue?.path.join(".") ?? "environment";
		throw new AppError(
			"INVALID_ARGUMENT",
			`Invalid configuration for ${field}: ${issue?.message ?? "unknown"}`,
		);
	}
	return {
		logLevel: result.data.QUIRE_LOG_LEVEL,
		defaultVolumeTitle: result.data.QUIRE_DEFAULT_VOLUME_TITLE,
	};
}

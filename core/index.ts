export { type QuireConfig, type LogLevel, DEFAULT_CONFIG, loadConfig } from "./config";
export {
	type AppErrorCode,
	type AppErrorDetails,
	type ParseFailureReason,
	AppError,
	isAppError,
} from "./errors";
export { type Logger, createLogger, silentLogger } from "./logger";
export {
	DEFAULT_SNAPSHOT_SUMMARY,
	type ProjectStoreDeps,
	ProjectStore,
	openProject,
} from "./projects/project-store";
export { ProjectSession } from "./projects/project-session";
export {
	CHAPTERS_DIR,
	DRAFTS_DIR,
	METADATA_DIR,
	type ProjectPaths,
	projectPaths,
} from "./projects/project-layout";
export { countWords } from "./projects/word-count";
export type {
	Chapter,
	ChapterId,
	ChapterIndexEntry,
	ChapterMetadata,
	ChapterStatus,
	ChapterVersion,
	CharacterProfile,
	PlotPoint,
	ProjectMetadata,
	ProjectSettings,
	ProjectStats,
	SettingsSummary,
	Volume,
	VolumeId,
	WorldSetting,
} from "./projects/project-types";
export { chapterStatusSchema } from "./projects/project-types";

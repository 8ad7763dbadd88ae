import { z } from "zod";

/** Monotonically allocated, never reused within a project */
export const chapterIdSchema = z.number().int().nonnegative();
export type ChapterId = z.infer<typeof chapterIdSchema>;

/** UUID v4 generated on volume creation */
export const volumeIdSchema = z.string().min(1);
export type VolumeId = z.infer<typeof volumeIdSchema>;

/** ISO 8601 UTC */
const timestampSchema = z.string().datetime();

export const chapterStatusSchema = z.enum([
	"NotStarted",
	"InProgress",
	"Draft",
	"Review",
	"Complete",
]);

export type ChapterStatus = z.infer<typeof chapterStatusSchema>;

export const volumeSchema = z.object({
	id: volumeIdSchema,
	title: z.string(),
	/** Position among sibling volumes, 0-based and dense */
	order: z.number().int().nonnegative(),
	/** Authoritative chapter order within the volume */
	chapterIds: z.array(chapterIdSchema),
	description: z.string(),
	createdAt: timestampSchema,
	modifiedAt: timestampSchema,
});

export type Volume = z.infer<typeof volumeSchema>;

/**
 * Chapter as stored in `metadata.json`: everything except the text,
 * which lives in `content.md` beside it.
 */
export const chapterMetadataSchema = z.object({
	id: chapterIdSchema,
	title: z.string(),
	/** Mirror of the chapter's index in its volume's chapterIds */
	order: z.number().int().nonnegative(),
	volumeId: volumeIdSchema,
	dirPath: z.string(),
	wordCount: z.number().int().nonnegative(),
	status: chapterStatusSchema,
	currentVersion: z.number().int().nonnegative(),
	createdAt: timestampSchema,
	modifiedAt: timestampSchema,
});

export type ChapterMetadata = z.infer<typeof chapterMetadataSchema>;

export interface Chapter extends ChapterMetadata {
	content: string;
}

export const chapterVersionSchema = z.object({
	version: z.number().int().nonnegative(),
	content: z.string(),
	wordCount: z.number().int().nonnegative(),
	summary: z.string(),
	timestamp: timestampSchema,
});

export type ChapterVersion = z.infer<typeof chapterVersionSchema>;

export const characterProfileSchema = z.object({
	name: z.string(),
	age: z.number().int().nonnegative().optional(),
	appearance: z.string().default(""),
	personality: z.string().default(""),
	background: z.string().default(""),
	goals: z.string().default(""),
	/** Other character's name → nature of the relationship */
	relationships: z.record(z.string()).default({}),
});

export type CharacterProfile = z.infer<typeof characterProfileSchema>;

export const worldSettingSchema = z.object({
	name: z.string(),
	description: z.string().default(""),
	rules: z.array(z.string()).default([]),
});

export type WorldSetting = z.infer<typeof worldSettingSchema>;

export const plotPointSchema = z.object({
	title: z.string(),
	description: z.string().default(""),
	chapterIds: z.array(chapterIdSchema).default([]),
	order: z.number().int().nonnegative(),
});

export type PlotPoint = z.infer<typeof plotPointSchema>;

export interface ProjectSettings {
	characters: CharacterProfile[];
	world: WorldSetting[];
	plotPoints: PlotPoint[];
}

export const charactersFileSchema = z.array(characterProfileSchema);
export const worldFileSchema = z.array(worldSettingSchema);
export const plotFileSchema = z.array(plotPointSchema);

export const settingsSummarySchema = z.object({
	characterCount: z.number().int().nonnegative(),
	worldSettingCount: z.number().int().nonnegative(),
	plotPointCount: z.number().int().nonnegative(),
});

export type SettingsSummary = z.infer<typeof settingsSummarySchema>;

/** Entry of the chapter index kept in `project.json` for listings. */
export const chapterIndexEntrySchema = z.object({
	id: chapterIdSchema,
	title: z.string(),
	volumeId: volumeIdSchema,
	order: z.number().int().nonnegative(),
	wordCount: z.number().int().nonnegative(),
	status: chapterStatusSchema,
	currentVersion: z.number().int().nonnegative(),
});

export type ChapterIndexEntry = z.infer<typeof chapterIndexEntrySchema>;

/** Contents of `.quire/project.json`. */
export const projectMetadataSchema = z.object({
	title: z.string(),
	volumes: z.array(volumeSchema),
	chapters: z.array(chapterIndexEntrySchema),
	settings: settingsSummarySchema,
	/** Next id to hand out; only ever grows */
	nextChapterId: chapterIdSchema,
	createdAt: timestampSchema,
	modifiedAt: timestampSchema,
});

export type ProjectMetadata = z.infer<typeof projectMetadataSchema>;

export interface ProjectStats {
	volumeCount: number;
	chapterCount: number;
	totalWordCount: number;
}

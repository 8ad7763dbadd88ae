import { join } from "node:path";
import type { ChapterId } from "./project-types";

/**
 * On-disk layout of a project:
 *
 *   <root>/
 *     .quire/            project.json, characters.json, world.json, plot.json
 *     chapters/
 *       chapter-<id>/    metadata.json, content.md, history/v<N>.json
 *     drafts/            scratch area, not touched by the store
 */
export const METADATA_DIR = ".quire";
export const CHAPTERS_DIR = "chapters";
export const DRAFTS_DIR = "drafts";

export const CHAPTER_METADATA_FILE = "metadata.json";
export const CHAPTER_CONTENT_FILE = "content.md";
export const HISTORY_DIR = "history";

const CHAPTER_DIR_PREFIX = "chapter-";
const VERSION_FILE_PATTERN = /^v(\d+)\.json$/;

export interface ProjectPaths {
	root: string;
	metadataDir: string;
	chaptersDir: string;
	draftsDir: string;
	projectFile: string;
	charactersFile: string;
	worldFile: string;
	plotFile: string;
}

export function projectPaths(root: string): ProjectPaths {
	const metadataDir = join(root, METADATA_DIR);
	return {
		root,
		metadataDir,
		chaptersDir: join(root, CHAPTERS_DIR),
		draftsDir: join(root, DRAFTS_DIR),
		projectFile: join(metadataDir, "project.json"),
		charactersFile: join(metadataDir, "characters.json"),
		worldFile: join(metadataDir, "world.json"),
		plotFile: join(metadataDir, "plot.json"),
	};
}

export function chapterDirName(id: ChapterId): string {
	return `${CHAPTER_DIR_PREFIX}${id}`;
}

export function chapterMetadataPath(chapterDir: string): string {
	return join(chapterDir, CHAPTER_METADATA_FILE);
}

export function chapterContentPath(chapterDir: string): string {
	return join(chapterDir, CHAPTER_CONTENT_FILE);
}

export function historyDirPath(chapterDir: string): string {
	return join(chapterDir, HISTORY_DIR);
}

export function versionFileName(version: number): string {
	return `v${version}.json`;
}

/** `"v12.json"` → 12; anything else → null. */
export function parseVersionFileName(name: string): number | null {
	const match = VERSION_FILE_PATTERN.exec(name);
	if (!match?.[1]) {
		return null;
	}
	const version = Number.parseInt(match[1], 10);
	return Number.isSafeInteger(version) ? version : null;
}

import { join } from "node:path";
import { isAppError } from "../errors";
import { ensureDir, listDir } from "../store/fs-ops";
import { JsonStore } from "../store/json-store";
import {
	historyDirPath,
	parseVersionFileName,
	versionFileName,
} from "./project-layout";
import { type ChapterVersion, chapterVersionSchema } from "./project-types";

// Snapshots are append-only: nothing here deletes or rewrites an existing version file.

function snapshotStore(chapterDir: string, version: number): JsonStore<ChapterVersion> {
	return new JsonStore<ChapterVersion>(
		{ filePath: join(historyDirPath(chapterDir), versionFileName(version)) },
		chapterVersionSchema,
	);
}

async function versionNumbers(chapterDir: string): Promise<number[]> {
	const names = await listDir(historyDirPath(chapterDir));
	const versions: number[] = [];
	for (const name of names) {
		const version = parseVersionFileName(name);
		if (version !== null) {
			versions.push(version);
		}
	}
	return versions;
}

export async function writeSnapshot(
	chapterDir: string,
	snapshot: ChapterVersion,
): Promise<void> {
	await ensureDir(historyDirPath(chapterDir));
	await snapshotStore(chapterDir, snapshot.version).write(snapshot);
}

/** All snapshots, most recent first. Empty when the chapter has no history directory. */
export async function listSnapshots(chapterDir: string): Promise<ChapterVersion[]> {
	const numbers = await versionNumbers(chapterDir);
	const snapshots = await Promise.all(
		numbers.map((version) => snapshotStore(chapterDir, version).read()),
	);
	snapshots.sort((a, b) => b.version - a.version);
	return snapshots;
}

/** Returns null when no snapshot file exists for `version`. */
export async function readSnapshot(
	chapterDir: string,
	version: number,
): Promise<ChapterVersion | null> {
	try {
		return await snapshotStore(chapterDir, version).read();
	} catch (err: unknown) {
		if (isAppError(err, "PARSE") && err.reason === "missing") {
			return null;
		}
		throw err;
	}
}

/** Highest version number present in history, or null when there is none. */
export async function latestSnapshotVersion(
	chapterDir: string,
): Promise<number | null> {
	const numbers = await versionNumbers(chapterDir);
	return numbers.length === 0 ? null : Math.max(...numbers);
}

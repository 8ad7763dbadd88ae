import {
	mkdir,
	readFile,
	readdir,
	rename,
	rm,
	stat,
	writeFile,
} from "node:fs/promises";
import { dirname } from "node:path";
import { errorCode, ioError } from "../errors";

// Every failure leaving this module is an AppError("IO") naming the path and operation.

export async function ensureDir(path: string): Promise<void> {
	try {
		await mkdir(path, { recursive: true });
	} catch (err: unknown) {
		throw ioError("create directory", path, err);
	}
}

export async function removeDir(path: string): Promise<void> {
	try {
		await rm(path, { recursive: true, force: true });
	} catch (err: unknown) {
		throw ioError("remove directory", path, err);
	}
}

export async function readText(path: string): Promise<string> {
	try {
		return await readFile(path, "utf-8");
	} catch (err: unknown) {
		throw ioError("read", path, err);
	}
}

/** Returns `fallback` when the file does not exist. */
export async function readTextOr(
	path: string,
	fallback: string,
): Promise<string> {
	try {
		return await readFile(path, "utf-8");
	} catch (err: unknown) {
		if (errorCode(err) === "ENOENT") {
			return fallback;
		}
		throw ioError("read", path, err);
	}
}

export async function writeText(path: string, content: string): Promise<void> {
	try {
		await writeFile(path, content, "utf-8");
	} catch (err: unknown) {
		throw ioError("write", path, err);
	}
}

export async function writeTextAtomic(
	path: string,
	content: string,
): Promise<void> {
	await ensureDir(dirname(path));
	const tmpPath = `${path}.tmp`;
	await writeText(tmpPath, content);
	try {
		await rename(tmpPath, path);
	} catch (err: unknown) {
		throw ioError("rename", tmpPath, err);
	}
}

export async function pathExists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch (err: unknown) {
		if (errorCode(err) === "ENOENT") {
			return false;
		}
		throw ioError("stat", path, err);
	}
}

/** Directory entry names, or an empty list when the directory does not exist. */
export async function listDir(path: string): Promise<string[]> {
	try {
		return await readdir(path);
	} catch (err: unknown) {
		if (errorCode(err) === "ENOENT") {
			return [];
		}
		throw ioError("list directory", path, err);
	}
}

/** Subdirectory names, or an empty list when the directory does not exist. */
export async function listSubdirs(path: string): Promise<string[]> {
	try {
		const entries = await readdir(path, { withFileTypes: true });
		return entries
			.filter((entry) => entry.isDirectory())
			.map((entry) => entry.name);
	} catch (err: unknown) {
		if (errorCode(err) === "ENOENT") {
			return [];
		}
		throw ioError("list directory", path, err);
	}
}

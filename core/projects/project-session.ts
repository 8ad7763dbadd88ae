import { type ProjectStoreDeps, ProjectStore, openProject } from "./project-store";

/**
 * Exclusive handle on one open project. Every call goes through a single
 * promise chain, so operations from different callers never interleave.
 * A failed operation rejects its own caller and the chain moves on.
 */
export class ProjectSession {
	private tail: Promise<unknown> = Promise.resolve();

	constructor(private readonly store: ProjectStore) {}

	static async open(
		rootPath: string,
		title: string,
		deps?: ProjectStoreDeps,
	): Promise<ProjectSession> {
		return new ProjectSession(await openProject(rootPath, title, deps));
	}

	get rootPath(): string {
		return this.store.rootPath;
	}

	/** Queue `operation` behind everything already submitted. */
	run<T>(operation: (store: ProjectStore) => Promise<T> | T): Promise<T> {
		const result = this.tail.then(() => operation(this.store));
		this.tail = result.catch(() => undefined);
		return result;
	}
}

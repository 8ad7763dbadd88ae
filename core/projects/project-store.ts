import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { DEFAULT_CONFIG, type QuireConfig } from "../config";
import { AppError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import {
	ensureDir,
	listSubdirs,
	pathExists,
	readTextOr,
	removeDir,
	writeText,
} from "../store/fs-ops";
import { JsonStore } from "../store/json-store";
import {
	latestSnapshotVersion,
	listSnapshots,
	readSnapshot,
	writeSnapshot,
} from "./chapter-history";
import {
	chapterContentPath,
	chapterDirName,
	chapterMetadataPath,
	type ProjectPaths,
	projectPaths,
} from "./project-layout";
import {
	type Chapter,
	type ChapterId,
	type ChapterMetadata,
	chapterMetadataSchema,
	type ChapterStatus,
	type ChapterVersion,
	charactersFileSchema,
	type CharacterProfile,
	type PlotPoint,
	plotFileSchema,
	type ProjectMetadata,
	projectMetadataSchema,
	type ProjectSettings,
	type ProjectStats,
	type Volume,
	type VolumeId,
	worldFileSchema,
	type WorldSetting,
} from "./project-types";
import { countWords } from "./word-count";

export const DEFAULT_SNAPSHOT_SUMMARY = "Autosave";

export interface ProjectStoreDeps {
	now?: () => string;
	createVolumeId?: () => string;
	logger?: Logger;
	config?: Partial<QuireConfig>;
}

interface ProjectState {
	title: string;
	volumes: Volume[];
	chapters: Map<ChapterId, Chapter>;
	settings: ProjectSettings;
	nextChapterId: ChapterId;
	createdAt: string;
	modifiedAt: string;
}

interface ProjectFiles {
	project: JsonStore<ProjectMetadata>;
	characters: JsonStore<CharacterProfile[]>;
	world: JsonStore<WorldSetting[]>;
	plot: JsonStore<PlotPoint[]>;
}

function projectFiles(paths: ProjectPaths): ProjectFiles {
	return {
		project: new JsonStore<ProjectMetadata>(
			{ filePath: paths.projectFile },
			projectMetadataSchema,
		),
		characters: new JsonStore<CharacterProfile[]>(
			{ filePath: paths.charactersFile },
			charactersFileSchema,
		),
		world: new JsonStore<WorldSetting[]>({ filePath: paths.worldFile }, worldFileSchema),
		plot: new JsonStore<PlotPoint[]>({ filePath: paths.plotFile }, plotFileSchema),
	};
}

function chapterMetadataStore(chapterDir: string): JsonStore<ChapterMetadata> {
	return new JsonStore<ChapterMetadata>(
		{ filePath: chapterMetadataPath(chapterDir) },
		chapterMetadataSchema,
	);
}

function toMetadata(chapter: Chapter): ChapterMetadata {
	const { content: _content, ...metadata } = chapter;
	return metadata;
}

function cloneVolume(volume: Volume): Volume {
	return { ...volume, chapterIds: [...volume.chapterIds] };
}

/**
 * Owns one writing project: its volumes, the chapter arena and the settings
 * documents, kept in step with the directory tree under `rootPath`.
 *
 * Volumes hold chapter ids only; the `chapters` map is the single place a
 * Chapter lives. A chapter's `order` mirrors its index in its volume's
 * `chapterIds` and is rewritten whenever that list changes.
 *
 * Not safe for interleaved calls. Wrap in a ProjectSession when more than one
 * caller shares a project.
 */
export class ProjectStore {
	readonly paths: ProjectPaths;
	private readonly files: ProjectFiles;
	private readonly now: () => string;
	private readonly createVolumeId: () => string;
	private readonly defaultVolumeTitle: string;
	private readonly log: Logger;

	private constructor(
		readonly rootPath: string,
		private readonly state: ProjectState,
		deps: ProjectStoreDeps,
	) {
		this.paths = projectPaths(rootPath);
		this.files = projectFiles(this.paths);
		this.now = deps.now ?? (() => new Date().toISOString());
		this.createVolumeId = deps.createVolumeId ?? randomUUID;
		this.defaultVolumeTitle =
			deps.config?.defaultVolumeTitle ?? DEFAULT_CONFIG.defaultVolumeTitle;
		this.log = (deps.logger ?? silentLogger()).child({
			component: "project-store",
			root: rootPath,
		});
	}

	// ── Lifecycle ────────────────────────────────────────────────

	/** New project with one empty default volume. Touches nothing on disk. */
	static create(
		rootPath: string,
		title: string,
		deps: ProjectStoreDeps = {},
	): ProjectStore {
		const now = (deps.now ?? (() => new Date().toISOString()))();
		const createVolumeId = deps.createVolumeId ?? randomUUID;
		const defaultVolumeTitle =
			deps.config?.defaultVolumeTitle ?? DEFAULT_CONFIG.defaultVolumeTitle;

		return new ProjectStore(
			rootPath,
			{
				title,
				volumes: [
					{
						id: createVolumeId(),
						title: defaultVolumeTitle,
						order: 0,
						chapterIds: [],
						description: "",
						createdAt: now,
						modifiedAt: now,
					},
				],
				chapters: new Map(),
				settings: { characters: [], world: [], plotPoints: [] },
				nextChapterId: 0,
				createdAt: now,
				modifiedAt: now,
			},
			deps,
		);
	}

	/**
	 * Rebuild a project from disk. Chapters come from the directory scan, not
	 * from the index in project.json, and version counters come from the
	 * history files actually present.
	 */
	static async load(
		rootPath: string,
		deps: ProjectStoreDeps = {},
	): Promise<ProjectStore> {
		const paths = projectPaths(rootPath);
		const files = projectFiles(paths);
		const metadata = await files.project.read();
		const [characters, world, plotPoints] = await Promise.all([
			files.characters.readOr([]),
			files.world.readOr([]),
			files.plot.readOr([]),
		]);

		const store = new ProjectStore(
			rootPath,
			{
				title: metadata.title,
				volumes: metadata.volumes
					.map(cloneVolume)
					.sort((a, b) => a.order - b.order),
				chapters: new Map(),
				settings: { characters, world, plotPoints },
				nextChapterId: metadata.nextChapterId,
				createdAt: metadata.createdAt,
				modifiedAt: metadata.modifiedAt,
			},
			deps,
		);
		await store.scanChapters();
		store.reconcile();
		store.log.info(
			{
				volumes: store.state.volumes.length,
				chapters: store.state.chapters.size,
			},
			"Project loaded",
		);
		return store;
	}

	/** Create the directory skeleton if needed, then persist. */
	async initialize(): Promise<void> {
		await ensureDir(this.paths.metadataDir);
		await ensureDir(this.paths.chaptersDir);
		await ensureDir(this.paths.draftsDir);
		await this.persist();
		this.log.info("Project initialized");
	}

	/**
	 * Write project.json and the three settings documents, one after another.
	 * A failure part-way leaves earlier files written.
	 */
	async persist(): Promise<void> {
		await this.files.project.write(this.toProjectMetadata());
		await this.files.characters.write(this.state.settings.characters);
		await this.files.world.write(this.state.settings.world);
		await this.files.plot.write(this.state.settings.plotPoints);
		this.log.debug("Project metadata persisted");
	}

	// ── Reads ────────────────────────────────────────────────────

	get title(): string {
		return this.state.title;
	}

	get createdAt(): string {
		return this.state.createdAt;
	}

	get modifiedAt(): string {
		return this.state.modifiedAt;
	}

	get nextChapterId(): ChapterId {
		return this.state.nextChapterId;
	}

	/** Volumes in order. */
	get volumes(): Volume[] {
		return this.state.volumes.map(cloneVolume);
	}

	get settings(): ProjectSettings {
		return structuredClone(this.state.settings);
	}

	getVolume(id: VolumeId): Volume | undefined {
		const volume = this.findVolume(id);
		return volume ? cloneVolume(volume) : undefined;
	}

	getChapter(id: ChapterId): Chapter | undefined {
		const chapter = this.state.chapters.get(id);
		return chapter ? { ...chapter } : undefined;
	}

	/** Every chapter, sorted by owning volume's order then the chapter's own order. */
	allChaptersInOrder(): Chapter[] {
		const volumeOrder = new Map(
			this.state.volumes.map((volume) => [volume.id, volume.order]),
		);
		return [...this.state.chapters.values()]
			.sort(
				(a, b) =>
					(volumeOrder.get(a.volumeId) ?? 0) -
						(volumeOrder.get(b.volumeId) ?? 0) || a.order - b.order,
			)
			.map((chapter) => ({ ...chapter }));
	}

	/** Chapters of one volume in stored order. Empty for an unknown volume. */
	chaptersForVolume(volumeId: VolumeId): Chapter[] {
		const volume = this.findVolume(volumeId);
		if (!volume) {
			return [];
		}
		const chapters: Chapter[] = [];
		for (const id of volume.chapterIds) {
			const chapter = this.state.chapters.get(id);
			if (chapter) {
				chapters.push({ ...chapter });
			}
		}
		return chapters;
	}

	stats(): ProjectStats {
		let totalWordCount = 0;
		for (const chapter of this.state.chapters.values()) {
			totalWordCount += chapter.wordCount;
		}
		return {
			volumeCount: this.state.volumes.length,
			chapterCount: this.state.chapters.size,
			totalWordCount,
		};
	}

	// ── Volumes ──────────────────────────────────────────────────

	async createVolume(title: string): Promise<VolumeId> {
		const now = this.now();
		const volume: Volume = {
			id: this.createVolumeId(),
			title,
			order: this.state.volumes.length,
			chapterIds: [],
			description: "",
			createdAt: now,
			modifiedAt: now,
		};
		this.state.volumes.push(volume);
		this.state.modifiedAt = now;
		await this.persist();
		this.log.debug({ volumeId: volume.id }, "Volume created");
		return volume.id;
	}

	/** Delete a volume and every chapter it owns. No-op for an unknown id. */
	async deleteVolume(id: VolumeId): Promise<void> {
		const index = this.state.volumes.findIndex((volume) => volume.id === id);
		const volume = this.state.volumes[index];
		if (!volume) {
			return;
		}

		const owned = new Set(volume.chapterIds);
		for (const chapter of this.state.chapters.values()) {
			if (chapter.volumeId === id) {
				owned.add(chapter.id);
			}
		}
		for (const chapterId of owned) {
			const chapter = this.state.chapters.get(chapterId);
			if (chapter) {
				await removeDir(chapter.dirPath);
				this.state.chapters.delete(chapterId);
			}
		}

		this.state.volumes.splice(index, 1);
		this.state.volumes.forEach((remaining, order) => {
			remaining.order = order;
		});
		this.state.modifiedAt = this.now();
		await this.persist();
		this.log.debug({ volumeId: id, chapters: owned.size }, "Volume deleted");
	}

	async renameVolume(id: VolumeId, title: string): Promise<void> {
		await this.updateVolume(id, (volume) => {
			volume.title = title;
		});
	}

	async setVolumeDescription(id: VolumeId, description: string): Promise<void> {
		await this.updateVolume(id, (volume) => {
			volume.description = description;
		});
	}

	// ── Chapters ─────────────────────────────────────────────────

	/** Create an empty chapter at the end of `volumeId`, or of the first volume. */
	async createChapter(title: string, volumeId?: VolumeId): Promise<ChapterId> {
		const volume =
			volumeId === undefined
				? this.state.volumes[0]
				: this.findVolume(volumeId);
		if (!volume) {
			throw new AppError(
				"NOT_FOUND",
				volumeId === undefined
					? "Project has no volumes"
					: `Volume not found: ${volumeId}`,
			);
		}

		const id = this.state.nextChapterId;
		this.state.nextChapterId += 1;
		const now = this.now();
		const chapter: Chapter = {
			id,
			title,
			order: volume.chapterIds.length,
			volumeId: volume.id,
			dirPath: join(this.paths.chaptersDir, chapterDirName(id)),
			content: "",
			wordCount: 0,
			status: "NotStarted",
			currentVersion: 0,
			createdAt: now,
			modifiedAt: now,
		};

		await ensureDir(chapter.dirPath);
		await writeText(chapterContentPath(chapter.dirPath), "");
		await this.writeChapterMetadata(chapter);

		this.state.chapters.set(id, chapter);
		volume.chapterIds.push(id);
		volume.modifiedAt = now;
		this.state.modifiedAt = now;
		await this.persist();
		this.log.debug({ chapterId: id, volumeId: volume.id }, "Chapter created");
		return id;
	}

	/** Delete a chapter and its directory. No-op for an unknown id. */
	async deleteChapter(id: ChapterId): Promise<void> {
		const chapter = this.state.chapters.get(id);
		if (!chapter) {
			return;
		}

		const now = this.now();
		const volume = this.state.volumes.find((candidate) =>
			candidate.chapterIds.includes(id),
		);
		let renumbered: Chapter[] = [];
		if (volume) {
			volume.chapterIds = volume.chapterIds.filter(
				(chapterId) => chapterId !== id,
			);
			volume.modifiedAt = now;
			renumbered = this.renumberChapters(volume);
		}

		await removeDir(chapter.dirPath);
		this.state.chapters.delete(id);
		await this.writeChapterMetadataAll(renumbered);
		this.state.modifiedAt = now;
		await this.persist();
		this.log.debug({ chapterId: id }, "Chapter deleted");
	}

	async renameChapter(id: ChapterId, title: string): Promise<void> {
		await this.updateChapter(id, (chapter) => {
			chapter.title = title;
		});
	}

	async updateChapterStatus(id: ChapterId, status: ChapterStatus): Promise<void> {
		await this.updateChapter(id, (chapter) => {
			chapter.status = status;
		});
	}

	/**
	 * Replace a volume's chapter order. Every id must be a chapter of this
	 * volume. Chapters left out are dropped from the order but not deleted.
	 */
	async reorderChaptersInVolume(
		volumeId: VolumeId,
		orderedIds: ChapterId[],
	): Promise<void> {
		const volume = this.requireVolume(volumeId);
		const seen = new Set<ChapterId>();
		for (const id of orderedIds) {
			const chapter = this.state.chapters.get(id);
			if (!chapter) {
				throw new AppError("INVALID_ARGUMENT", `Chapter not found: ${id}`);
			}
			if (chapter.volumeId !== volumeId) {
				throw new AppError(
					"INVALID_ARGUMENT",
					`Chapter ${id} does not belong to volume ${volumeId}`,
				);
			}
			if (seen.has(id)) {
				throw new AppError(
					"INVALID_ARGUMENT",
					`Chapter ${id} appears more than once`,
				);
			}
			seen.add(id);
		}

		const omitted = volume.chapterIds.filter((id) => !seen.has(id));
		if (omitted.length > 0) {
			this.log.warn(
				{ volumeId, omitted },
				"Reorder left chapters out of the volume order",
			);
		}

		const now = this.now();
		volume.chapterIds = [...orderedIds];
		volume.modifiedAt = now;
		await this.writeChapterMetadataAll(this.renumberChapters(volume));
		this.state.modifiedAt = now;
		await this.persist();
	}

	/**
	 * Move a chapter into `targetVolumeId` at `position`, clamped to the end of
	 * that volume. Both volumes are renumbered.
	 */
	async moveChapterToVolume(
		chapterId: ChapterId,
		targetVolumeId: VolumeId,
		position: number,
	): Promise<void> {
		const chapter = this.state.chapters.get(chapterId);
		if (!chapter) {
			throw new AppError("NOT_FOUND", `Chapter not found: ${chapterId}`);
		}
		const target = this.requireVolume(targetVolumeId);
		if (!Number.isInteger(position) || position < 0) {
			throw new AppError(
				"INVALID_ARGUMENT",
				`Position must be a non-negative integer, got ${position}`,
			);
		}

		const now = this.now();
		const source = this.state.volumes.find((volume) =>
			volume.chapterIds.includes(chapterId),
		);
		if (source) {
			source.chapterIds = source.chapterIds.filter((id) => id !== chapterId);
			source.modifiedAt = now;
		}
		target.chapterIds.splice(
			Math.min(position, target.chapterIds.length),
			0,
			chapterId,
		);
		target.modifiedAt = now;
		chapter.volumeId = targetVolumeId;
		chapter.modifiedAt = now;

		const changed = new Set<Chapter>([chapter]);
		if (source && source !== target) {
			for (const renumbered of this.renumberChapters(source)) {
				changed.add(renumbered);
			}
		}
		for (const renumbered of this.renumberChapters(target)) {
			changed.add(renumbered);
		}
		await this.writeChapterMetadataAll([...changed]);

		this.state.modifiedAt = now;
		await this.persist();
		this.log.debug(
			{ chapterId, from: source?.id, to: targetVolumeId },
			"Chapter moved",
		);
	}

	/** Replace any of the settings documents and persist. */
	async updateSettings(patch: Partial<ProjectSettings>): Promise<void> {
		this.state.settings = {
			characters: patch.characters ?? this.state.settings.characters,
			world: patch.world ?? this.state.settings.world,
			plotPoints: patch.plotPoints ?? this.state.settings.plotPoints,
		};
		this.state.modifiedAt = this.now();
		await this.persist();
	}

	// ── Versioning ───────────────────────────────────────────────

	/**
	 * Set a chapter's text. The text being replaced is snapshotted at the
	 * current version first, unless it is empty or unchanged.
	 *
	 * project.json is not rewritten here; call persist() for listings to pick
	 * up the new word count.
	 */
	async updateChapterContent(
		id: ChapterId,
		content: string,
		changeSummary?: string,
	): Promise<void> {
		const chapter = this.state.chapters.get(id);
		if (!chapter) {
			return;
		}

		const now = this.now();
		if (chapter.content.length > 0 && chapter.content !== content) {
			await writeSnapshot(chapter.dirPath, {
				version: chapter.currentVersion,
				content: chapter.content,
				wordCount: chapter.wordCount,
				summary: changeSummary ?? DEFAULT_SNAPSHOT_SUMMARY,
				timestamp: now,
			});
		}

		chapter.content = content;
		chapter.wordCount = countWords(content);
		chapter.modifiedAt = now;
		chapter.currentVersion += 1;

		await writeText(chapterContentPath(chapter.dirPath), content);
		await this.writeChapterMetadata(chapter);
		this.state.modifiedAt = now;
		this.log.debug(
			{ chapterId: id, version: chapter.currentVersion },
			"Chapter content updated",
		);
	}

	/** Prior versions of a chapter, most recent first. */
	async getVersionHistory(id: ChapterId): Promise<ChapterVersion[]> {
		const chapter = this.requireChapter(id);
		return listSnapshots(chapter.dirPath);
	}

	/**
	 * Bring back the text of `version`. This is itself a content update: the
	 * text being replaced is snapshotted and currentVersion keeps growing.
	 */
	async restoreVersion(id: ChapterId, version: number): Promise<void> {
		const chapter = this.requireChapter(id);
		const snapshot = await readSnapshot(chapter.dirPath, version);
		if (!snapshot) {
			throw new AppError(
				"NOT_FOUND",
				`Version ${version} not found for chapter ${id}`,
			);
		}
		await this.updateChapterContent(
			id,
			snapshot.content,
			`Restored to version ${version}`,
		);
	}

	// ── Internals ────────────────────────────────────────────────

	private findVolume(id: VolumeId): Volume | undefined {
		return this.state.volumes.find((volume) => volume.id === id);
	}

	private requireVolume(id: VolumeId): Volume {
		const volume = this.findVolume(id);
		if (!volume) {
			throw new AppError("NOT_FOUND", `Volume not found: ${id}`);
		}
		return volume;
	}

	private requireChapter(id: ChapterId): Chapter {
		const chapter = this.state.chapters.get(id);
		if (!chapter) {
			throw new AppError("NOT_FOUND", `Chapter not found: ${id}`);
		}
		return chapter;
	}

	private async updateVolume(
		id: VolumeId,
		apply: (volume: Volume) => void,
	): Promise<void> {
		const volume = this.findVolume(id);
		if (!volume) {
			return;
		}
		const now = this.now();
		apply(volume);
		volume.modifiedAt = now;
		this.state.modifiedAt = now;
		await this.persist();
	}

	private async updateChapter(
		id: ChapterId,
		apply: (chapter: Chapter) => void,
	): Promise<void> {
		const chapter = this.state.chapters.get(id);
		if (!chapter) {
			return;
		}
		const now = this.now();
		apply(chapter);
		chapter.modifiedAt = now;
		await this.writeChapterMetadata(chapter);
		this.state.modifiedAt = now;
		await this.persist();
	}

	/** Sync each member's order with its index. Returns the chapters that changed. */
	private renumberChapters(volume: Volume): Chapter[] {
		const changed: Chapter[] = [];
		volume.chapterIds.forEach((id, index) => {
			const chapter = this.state.chapters.get(id);
			if (chapter && chapter.order !== index) {
				chapter.order = index;
				changed.push(chapter);
			}
		});
		return changed;
	}

	private async writeChapterMetadata(chapter: Chapter): Promise<void> {
		await chapterMetadataStore(chapter.dirPath).write(toMetadata(chapter));
	}

	private async writeChapterMetadataAll(chapters: Chapter[]): Promise<void> {
		for (const chapter of chapters) {
			await this.writeChapterMetadata(chapter);
		}
	}

	private toProjectMetadata(): ProjectMetadata {
		const chapters = [...this.state.chapters.values()]
			.sort((a, b) => a.id - b.id)
			.map((chapter) => ({
				id: chapter.id,
				title: chapter.title,
				volumeId: chapter.volumeId,
				order: chapter.order,
				wordCount: chapter.wordCount,
				status: chapter.status,
				currentVersion: chapter.currentVersion,
			}));
		return {
			title: this.state.title,
			volumes: this.state.volumes.map(cloneVolume),
			chapters,
			settings: {
				characterCount: this.state.settings.characters.length,
				worldSettingCount: this.state.settings.world.length,
				plotPointCount: this.state.settings.plotPoints.length,
			},
			nextChapterId: this.state.nextChapterId,
			createdAt: this.state.createdAt,
			modifiedAt: this.state.modifiedAt,
		};
	}

	/**
	 * Read every chapter directory. A directory without metadata.json is
	 * scaffolding from an interrupted create and is skipped.
	 */
	private async scanChapters(): Promise<void> {
		const dirNames = (await listSubdirs(this.paths.chaptersDir)).sort();
		for (const dirName of dirNames) {
			const dirPath = join(this.paths.chaptersDir, dirName);
			const metadataFile = chapterMetadataPath(dirPath);
			if (!(await pathExists(metadataFile))) {
				this.log.warn(
					{ dirPath },
					"Skipping chapter directory without metadata",
				);
				continue;
			}

			const metadata = await chapterMetadataStore(dirPath).read();
			if (this.state.chapters.has(metadata.id)) {
				this.log.warn(
					{ dirPath, chapterId: metadata.id },
					"Skipping chapter directory with a duplicate id",
				);
				continue;
			}

			const content = await readTextOr(chapterContentPath(dirPath), "");
			const latest = await latestSnapshotVersion(dirPath);
			this.state.chapters.set(metadata.id, {
				...metadata,
				content,
				wordCount: countWords(content),
				dirPath,
				currentVersion: latest === null ? 0 : latest + 1,
			});
		}
	}

	/**
	 * Repair volume membership after a scan so that every chapter sits in
	 * exactly one volume and every order cache matches its index. Only
	 * in-memory state changes; the next persist writes the result.
	 */
	private reconcile(): void {
		const { volumes, chapters } = this.state;
		const listed = new Set<ChapterId>();
		for (const volume of volumes) {
			volume.chapterIds = volume.chapterIds.filter((id) => {
				if (!chapters.has(id)) {
					this.log.warn(
						{ volumeId: volume.id, chapterId: id },
						"Dropping missing chapter from volume",
					);
					return false;
				}
				if (listed.has(id)) {
					this.log.warn(
						{ volumeId: volume.id, chapterId: id },
						"Dropping chapter listed in two volumes",
					);
					return false;
				}
				listed.add(id);
				return true;
			});
		}

		const unlisted = [...chapters.values()]
			.filter((chapter) => !listed.has(chapter.id))
			.sort((a, b) => a.order - b.order || a.id - b.id);
		if (unlisted.length > 0 && volumes.length === 0) {
			const now = this.now();
			volumes.push({
				id: this.createVolumeId(),
				title: this.defaultVolumeTitle,
				order: 0,
				chapterIds: [],
				description: "",
				createdAt: now,
				modifiedAt: now,
			});
		}
		for (const chapter of unlisted) {
			const home =
				volumes.find((volume) => volume.id === chapter.volumeId) ?? volumes[0];
			if (home) {
				this.log.warn(
					{ volumeId: home.id, chapterId: chapter.id },
					"Re-attaching chapter to volume",
				);
				home.chapterIds.push(chapter.id);
			}
		}

		volumes.forEach((volume, order) => {
			volume.order = order;
			volume.chapterIds.forEach((id, index) => {
				const chapter = chapters.get(id);
				if (chapter) {
					chapter.volumeId = volume.id;
					chapter.order = index;
				}
			});
		});

		let highestId = -1;
		for (const id of chapters.keys()) {
			highestId = Math.max(highestId, id);
		}
		this.state.nextChapterId = Math.max(
			this.state.nextChapterId,
			highestId + 1,
		);
	}
}

/** Load the project at `rootPath`, or create and initialize one if none exists. */
export async function openProject(
	rootPath: string,
	title: string,
	deps: ProjectStoreDeps = {},
): Promise<ProjectStore> {
	if (await pathExists(projectPaths(rootPath).projectFile)) {
		return ProjectStore.load(rootPath, deps);
	}
	const store = ProjectStore.create(rootPath, title, deps);
	await store.initialize();
	return store;
}

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ProjectStore } from "../../../core/projects/project-store";
import {
	TEST_PROJECT_TITLE,
	TEST_TIMESTAMP,
	createTestDeps,
	createTickingClock,
} from "../../fixtures/projects";
import {
	type TempProject,
	createInitializedStore,
	createTempProjectDir,
	readEnvelopeData,
} from "../../helpers/temp-project";

describe("ProjectStore", () => {
	let temp: TempProject;
	let root: string;

	beforeEach(() => {
		temp = createTempProjectDir();
		root = temp.root;
	});

	afterEach(() => {
		temp.cleanup();
	});

	describe("create / initialize / persist", () => {
		it("create starts with one empty default volume and touches nothing on disk", () => {
			const store = ProjectStore.create(root, TEST_PROJECT_TITLE, createTestDeps());

			expect(store.title).toBe(TEST_PROJECT_TITLE);
			expect(store.createdAt).toBe(TEST_TIMESTAMP);
			expect(store.modifiedAt).toBe(TEST_TIMESTAMP);
			expect(store.volumes).toEqual([
				{
					id: "vol-1",
					title: "Volume 1",
					order: 0,
					chapterIds: [],
					description: "",
					createdAt: TEST_TIMESTAMP,
					modifiedAt: TEST_TIMESTAMP,
				},
			]);
			expect(store.allChaptersInOrder()).toEqual([]);
			expect(existsSync(root)).toBe(false);
		});

		it("create uses the configured default volume title", () => {
			const store = ProjectStore.create(
				root,
				TEST_PROJECT_TITLE,
				createTestDeps({ config: { defaultVolumeTitle: "Part One" } }),
			);

			expect(store.volumes[0]?.title).toBe("Part One");
		});

		it("initialize creates the directory skeleton and writes metadata", async () => {
			await createInitializedStore(root);

			expect(existsSync(join(root, ".quire"))).toBe(true);
			expect(existsSync(join(root, "chapters"))).toBe(true);
			expect(existsSync(join(root, "drafts"))).toBe(true);
			for (const file of ["characters.json", "world.json", "plot.json"]) {
				expect(readEnvelopeData(join(root, ".quire", file))).toEqual([]);
			}

			const raw: unknown = JSON.parse(
				readFileSync(join(root, ".quire", "project.json"), "utf-8"),
			);
			expect(raw).toMatchObject({
				version: 1,
				data: {
					title: TEST_PROJECT_TITLE,
					nextChapterId: 0,
					chapters: [],
					settings: {
						characterCount: 0,
						worldSettingCount: 0,
						plotPointCount: 0,
					},
				},
			});
		});

		it("initialize is idempotent", async () => {
			const store = await createInitializedStore(root);
			await store.createChapter("Opening");

			await store.initialize();

			expect(existsSync(join(root, "chapters", "chapter-0"))).toBe(true);
			expect(store.allChaptersInOrder()).toHaveLength(1);
		});

		it("initialize fails with IO when the root is not writable", async () => {
			const blocker = join(temp.tempDir, "blocker");
			writeFileSync(blocker, "not a directory", "utf-8");
			const store = ProjectStore.create(
				join(blocker, "novel"),
				TEST_PROJECT_TITLE,
				createTestDeps(),
			);

			await expect(store.initialize()).rejects.toMatchObject({
				name: "AppError",
				code: "IO",
				operation: "create directory",
				path: join(blocker, "novel", ".quire"),
			});
		});

		it("persist leaves no temp files behind", async () => {
			const store = await createInitializedStore(root);
			await store.persist();

			expect(existsSync(join(root, ".quire", "project.json.tmp"))).toBe(false);
		});
	});

	describe("volumes", () => {
		it("createVolume appends with the next order and persists", async () => {
			const store = await createInitializedStore(root);

			const id = await store.createVolume("Part Two");

			expect(id).toBe("vol-2");
			expect(store.getVolume(id)).toMatchObject({
				title: "Part Two",
				order: 1,
				chapterIds: [],
			});
			const persisted = readEnvelopeData(join(root, ".quire", "project.json"));
			expect(persisted).toMatchObject({
				volumes: [{ id: "vol-1" }, { id: "vol-2", order: 1 }],
			});
		});

		it("deleteVolume removes its chapters and directories and keeps orders dense", async () => {
			const store = await createInitializedStore(root);
			const second = await store.createVolume("Part Two");
			const third = await store.createVolume("Part Three");
			const kept = await store.createChapter("Prologue");
			const doomedA = await store.createChapter("Storm", second);
			const doomedB = await store.createChapter("Wreck", second);

			await store.deleteVolume(second);

			expect(store.volumes.map((volume) => [volume.id, volume.order])).toEqual([
				["vol-1", 0],
				[third, 1],
			]);
			expect(store.getChapter(doomedA)).toBeUndefined();
			expect(store.getChapter(doomedB)).toBeUndefined();
			expect(store.getChapter(kept)).toBeDefined();
			expect(existsSync(join(root, "chapters", `chapter-${doomedA}`))).toBe(false);
			expect(existsSync(join(root, "chapters", `chapter-${doomedB}`))).toBe(false);
			expect(existsSync(join(root, "chapters", `chapter-${kept}`))).toBe(true);
			expect(store.stats()).toEqual({
				volumeCount: 2,
				chapterCount: 1,
				totalWordCount: 0,
			});
		});

		it("deleteVolume also removes chapters dropped from its order by a reorder", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");
			await store.reorderChaptersInVolume("vol-1", [a]);

			await store.deleteVolume("vol-1");

			expect(store.getChapter(b)).toBeUndefined();
			expect(existsSync(join(root, "chapters", `chapter-${b}`))).toBe(false);
		});

		it("deleteVolume and renameVolume are no-ops for an unknown id", async () => {
			const store = await createInitializedStore(root);

			await store.deleteVolume("vol-missing");
			await store.renameVolume("vol-missing", "Ghost");

			expect(store.volumes).toHaveLength(1);
			expect(store.volumes[0]?.title).toBe("Volume 1");
		});

		it("renameVolume and setVolumeDescription update the volume and its timestamp", async () => {
			const store = await createInitializedStore(
				root,
				createTestDeps({ now: createTickingClock() }),
			);

			await store.renameVolume("vol-1", "Book One");
			await store.setVolumeDescription("vol-1", "Where it begins");

			const volume = store.getVolume("vol-1");
			expect(volume?.title).toBe("Book One");
			expect(volume?.description).toBe("Where it begins");
			expect(volume?.modifiedAt).toBe("2026-01-15T10:00:02.000Z");
			expect(store.modifiedAt).toBe("2026-01-15T10:00:02.000Z");
		});
	});

	describe("chapters", () => {
		it("createChapter writes the directory, empty content and metadata", async () => {
			const store = await createInitializedStore(root);

			const id = await store.createChapter("Opening");

			const dir = join(root, "chapters", "chapter-0");
			expect(id).toBe(0);
			expect(readFileSync(join(dir, "content.md"), "utf-8")).toBe("");
			expect(readEnvelopeData(join(dir, "metadata.json"))).toEqual({
				id: 0,
				title: "Opening",
				order: 0,
				volumeId: "vol-1",
				dirPath: dir,
				wordCount: 0,
				status: "NotStarted",
				currentVersion: 0,
				createdAt: TEST_TIMESTAMP,
				modifiedAt: TEST_TIMESTAMP,
			});
			expect(store.getVolume("vol-1")?.chapterIds).toEqual([0]);
			expect(store.nextChapterId).toBe(1);
		});

		it("createChapter targets an explicit volume", async () => {
			const store = await createInitializedStore(root);
			const second = await store.createVolume("Part Two");
			await store.createChapter("First");

			const id = await store.createChapter("Second", second);

			expect(store.getChapter(id)).toMatchObject({ volumeId: second, order: 0 });
			expect(store.chaptersForVolume(second).map((chapter) => chapter.id)).toEqual([id]);
		});

		it("createChapter fails with NOT_FOUND for an unknown volume", async () => {
			const store = await createInitializedStore(root);

			await expect(store.createChapter("Lost", "vol-missing")).rejects.toMatchObject({
				code: "NOT_FOUND",
			});
			expect(store.allChaptersInOrder()).toEqual([]);
			expect(store.nextChapterId).toBe(0);
		});

		it("never reuses a chapter id after deletion", async () => {
			const store = await createInitializedStore(root);
			await store.createChapter("A");
			const b = await store.createChapter("B");
			await store.deleteChapter(b);

			const c = await store.createChapter("C");

			expect(c).toBe(2);
		});

		it("deleteChapter renumbers the remaining chapters and removes the directory", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");
			const c = await store.createChapter("C");

			await store.deleteChapter(b);

			expect(
				store.chaptersForVolume("vol-1").map((chapter) => [chapter.id, chapter.order]),
			).toEqual([
				[a, 0],
				[c, 1],
			]);
			expect(existsSync(join(root, "chapters", `chapter-${b}`))).toBe(false);
			expect(
				readEnvelopeData(join(root, "chapters", `chapter-${c}`, "metadata.json")),
			).toMatchObject({ order: 1 });
		});

		it("deleteChapter, renameChapter and updateChapterStatus are no-ops for an unknown id", async () => {
			const store = await createInitializedStore(root);
			await store.createChapter("A");

			await store.deleteChapter(42);
			await store.renameChapter(42, "Nope");
			await store.updateChapterStatus(42, "Complete");

			expect(store.allChaptersInOrder().map((chapter) => chapter.title)).toEqual(["A"]);
		});

		it("renameChapter and updateChapterStatus rewrite chapter metadata", async () => {
			const store = await createInitializedStore(root);
			const id = await store.createChapter("Draft title");

			await store.renameChapter(id, "Final title");
			await store.updateChapterStatus(id, "Review");

			expect(store.getChapter(id)).toMatchObject({
				title: "Final title",
				status: "Review",
			});
			expect(
				readEnvelopeData(join(root, "chapters", "chapter-0", "metadata.json")),
			).toMatchObject({ title: "Final title", status: "Review" });
			expect(
				readEnvelopeData(join(root, ".quire", "project.json")),
			).toMatchObject({
				chapters: [{ id: 0, title: "Final title", status: "Review" }],
			});
		});

		it("returned chapters and volumes are copies", async () => {
			const store = await createInitializedStore(root);
			const id = await store.createChapter("A");

			const chapter = store.getChapter(id);
			const volume = store.getVolume("vol-1");
			if (!chapter || !volume) {
				throw new Error("expected chapter and volume");
			}
			chapter.title = "Mutated";
			volume.chapterIds.push(99);

			expect(store.getChapter(id)?.title).toBe("A");
			expect(store.getVolume("vol-1")?.chapterIds).toEqual([id]);
		});
	});

	describe("reorderChaptersInVolume", () => {
		it("replaces the order and recomputes each chapter's order", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");
			const c = await store.createChapter("C");

			await store.reorderChaptersInVolume("vol-1", [c, a, b]);

			expect(
				store.allChaptersInOrder().map((chapter) => [chapter.id, chapter.order]),
			).toEqual([
				[c, 0],
				[a, 1],
				[b, 2],
			]);
			expect(
				readEnvelopeData(join(root, ".quire", "project.json")),
			).toMatchObject({ volumes: [{ chapterIds: [c, a, b] }] });
		});

		it("rejects a chapter from another volume and leaves the order unchanged", async () => {
			const store = await createInitializedStore(root);
			const second = await store.createVolume("Part Two");
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");
			const foreign = await store.createChapter("Elsewhere", second);

			await expect(
				store.reorderChaptersInVolume("vol-1", [b, foreign, a]),
			).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
				message: `Chapter ${foreign} does not belong to volume vol-1`,
			});
			expect(store.getVolume("vol-1")?.chapterIds).toEqual([a, b]);
		});

		it("rejects unknown and duplicated ids", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");

			await expect(
				store.reorderChaptersInVolume("vol-1", [a, 17]),
			).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
				message: "Chapter not found: 17",
			});
			await expect(
				store.reorderChaptersInVolume("vol-1", [a, a]),
			).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
			expect(store.getVolume("vol-1")?.chapterIds).toEqual([a]);
		});

		it("fails with NOT_FOUND for an unknown volume", async () => {
			const store = await createInitializedStore(root);

			await expect(
				store.reorderChaptersInVolume("vol-missing", []),
			).rejects.toMatchObject({ code: "NOT_FOUND" });
		});

		it("drops omitted chapters from the order without deleting them", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");

			await store.reorderChaptersInVolume("vol-1", [b]);

			expect(store.getVolume("vol-1")?.chapterIds).toEqual([b]);
			expect(store.getChapter(a)).toMatchObject({ title: "A", volumeId: "vol-1" });
			expect(existsSync(join(root, "chapters", `chapter-${a}`))).toBe(true);
		});
	});

	describe("moveChapterToVolume", () => {
		it("clamps a position past the end to an append and renumbers both volumes", async () => {
			const store = await createInitializedStore(root);
			const second = await store.createVolume("Part Two");
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");
			const c = await store.createChapter("C");
			const x = await store.createChapter("X", second);

			await store.moveChapterToVolume(a, second, 10);

			expect(store.getVolume(second)?.chapterIds).toEqual([x, a]);
			expect(store.getChapter(a)).toMatchObject({ volumeId: second, order: 1 });
			expect(
				store.chaptersForVolume("vol-1").map((chapter) => [chapter.id, chapter.order]),
			).toEqual([
				[b, 0],
				[c, 1],
			]);
			expect(
				readEnvelopeData(join(root, "chapters", `chapter-${a}`, "metadata.json")),
			).toMatchObject({ volumeId: second, order: 1 });
			expect(
				readEnvelopeData(join(root, "chapters", `chapter-${b}`, "metadata.json")),
			).toMatchObject({ order: 0 });
		});

		it("inserts at the requested position", async () => {
			const store = await createInitializedStore(root);
			const second = await store.createVolume("Part Two");
			const a = await store.createChapter("A");
			const x = await store.createChapter("X", second);
			const y = await store.createChapter("Y", second);

			await store.moveChapterToVolume(a, second, 1);

			expect(
				store.chaptersForVolume(second).map((chapter) => [chapter.id, chapter.order]),
			).toEqual([
				[x, 0],
				[a, 1],
				[y, 2],
			]);
			expect(store.chaptersForVolume("vol-1")).toEqual([]);
		});

		it("moves within the same volume", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");
			const c = await store.createChapter("C");

			await store.moveChapterToVolume(a, "vol-1", 2);

			expect(store.getVolume("vol-1")?.chapterIds).toEqual([b, c, a]);
			expect(store.getChapter(a)?.order).toBe(2);
		});

		it("fails with NOT_FOUND for an unknown chapter or volume without changing anything", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");

			await expect(store.moveChapterToVolume(9, "vol-1", 0)).rejects.toMatchObject({
				code: "NOT_FOUND",
			});
			await expect(
				store.moveChapterToVolume(a, "vol-missing", 0),
			).rejects.toMatchObject({ code: "NOT_FOUND" });
			expect(store.getVolume("vol-1")?.chapterIds).toEqual([a]);
			expect(store.getChapter(a)?.volumeId).toBe("vol-1");
		});

		it("rejects a negative position", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");

			await expect(store.moveChapterToVolume(a, "vol-1", -1)).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
			});
		});
	});

	describe("queries", () => {
		it("allChaptersInOrder sorts by volume order first", async () => {
			const store = await createInitializedStore(root);
			const second = await store.createVolume("Part Two");
			const late = await store.createChapter("Late", second);
			const early = await store.createChapter("Early");
			const earlier = await store.createChapter("Earlier");
			await store.reorderChaptersInVolume("vol-1", [earlier, early]);

			expect(store.allChaptersInOrder().map((chapter) => chapter.id)).toEqual([
				earlier,
				early,
				late,
			]);
		});

		it("chaptersForVolume returns an empty list for an unknown volume", async () => {
			const store = await createInitializedStore(root);

			expect(store.chaptersForVolume("vol-missing")).toEqual([]);
		});

		it("stats totals word counts across chapters", async () => {
			const store = await createInitializedStore(root);
			const a = await store.createChapter("A");
			const b = await store.createChapter("B");
			await store.updateChapterContent(a, "the tide came in");
			await store.updateChapterContent(b, "and went out");

			expect(store.stats()).toEqual({
				volumeCount: 1,
				chapterCount: 2,
				totalWordCount: 7,
			});
		});
	});

	describe("settings", () => {
		it("updateSettings writes each settings document", async () => {
			const store = await createInitializedStore(root);

			await store.updateSettings({
				characters: [
					{
						name: "Ines",
						age: 34,
						appearance: "",
						personality: "stubborn",
						background: "",
						goals: "reach the coast",
						relationships: { Tomas: "brother" },
					},
				],
				world: [{ name: "Salt flats", description: "", rules: ["no rain"] }],
			});

			expect(readEnvelopeData(join(root, ".quire", "characters.json"))).toMatchObject([
				{ name: "Ines", relationships: { Tomas: "brother" } },
			]);
			expect(readEnvelopeData(join(root, ".quire", "world.json"))).toEqual([
				{ name: "Salt flats", description: "", rules: ["no rain"] },
			]);
			expect(readEnvelopeData(join(root, ".quire", "plot.json"))).toEqual([]);
			expect(
				readEnvelopeData(join(root, ".quire", "project.json")),
			).toMatchObject({
				settings: { characterCount: 1, worldSettingCount: 1, plotPointCount: 0 },
			});
			expect(store.settings.world[0]?.rules).toEqual(["no rain"]);
		});
	});
});

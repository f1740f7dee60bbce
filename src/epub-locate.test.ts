import { mkdir, mkdtemp, readdir, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { locateInEpub, locateInPublication, resolveOptions } from "./epub-locate";
import { InvalidQueryError, UnresolvedSpineItemError } from "./errors";
import TestBook from "./test-book";

describe("locateInEpub", () => {
	let dir: string;
	let tempDir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "epub-locate-test-"));
		tempDir = path.join(dir, "staging");
		await mkdir(tempDir);
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	function twoChapterBook(): TestBook {
		return new TestBook()
			.addChapter("c1", "<p>Nothing here</p>", "ch1.xhtml")
			.addChapter("c2", "<div><p>Hello world</p></div>", "ch2.xhtml");
	}

	test("locates a match in the second spine document", async () => {
		const archive = await twoChapterBook().save(dir);

		const result = await locateInEpub(archive, "world", { tempDir });

		expect(result).toEqual({
			status: "found",
			address: {
				spineIndex: 2,
				spineTotal: 2,
				matchedFile: "OEBPS/ch2.xhtml",
				elementPath: [
					{ tagName: "html", siblingOrdinal: 1 },
					{ tagName: "body", siblingOrdinal: 1 },
					{ tagName: "div", siblingOrdinal: 1 },
					{ tagName: "p", siblingOrdinal: 1 },
				],
				indexPath: [1, 1, 1],
				matchStart: 6,
				matchEnd: 11,
				nodeText: "Hello world",
			},
			publication: {
				packagePath: "OEBPS/content.opf",
				spineXmlPosition: { ordinal: 3, total: 3 },
				spineDocuments: ["OEBPS/ch1.xhtml", "OEBPS/ch2.xhtml"],
			},
		});
		await expect(readdir(tempDir)).resolves.toEqual([]);
	});

	test("reports not found without raising", async () => {
		const archive = await twoChapterBook().save(dir);

		const result = await locateInEpub(archive, "absent phrase", { tempDir });

		expect(result.status).toBe("not-found");
		expect(result.publication.spineDocuments).toHaveLength(2);
		await expect(readdir(tempDir)).resolves.toEqual([]);
	});

	test("fails on a spine id missing from the manifest and still cleans up", async () => {
		const archive = await twoChapterBook().addSpineRef("cX").save(dir);

		const failure = locateInEpub(archive, "world", { tempDir });

		await expect(failure).rejects.toBeInstanceOf(UnresolvedSpineItemError);
		await expect(failure).rejects.toMatchObject({ id: "cX", archivePath: archive });
		await expect(readdir(tempDir)).resolves.toEqual([]);
	});

	test("returns equal results on repeated runs", async () => {
		const archive = await twoChapterBook().save(dir);

		const first = await locateInEpub(archive, "Hello", { tempDir });
		const second = await locateInEpub(archive, "Hello", { tempDir });

		expect(second).toEqual(first);
	});

	test("rejects an empty query and still cleans up", async () => {
		const archive = await twoChapterBook().save(dir);

		const failure = locateInEpub(archive, "", { tempDir });

		await expect(failure).rejects.toBeInstanceOf(InvalidQueryError);
		await expect(failure).rejects.toMatchObject({ code: "INVALID_QUERY", archivePath: archive });
		await expect(readdir(tempDir)).resolves.toEqual([]);
	});

	test("handles a package descriptor at the archive root", async () => {
		const archive = await new TestBook("")
			.setSections(["manifest", "spine", "metadata"])
			.addChapter("intro", "<section><h1>Intro</h1><p>Plain text</p></section>")
			.save(dir);

		const result = await locateInEpub(archive, "Plain", { tempDir });

		expect(result.publication).toEqual({
			packagePath: "content.opf",
			spineXmlPosition: { ordinal: 2, total: 3 },
			spineDocuments: ["intro.xhtml"],
		});
		expect(result.status === "found" && result.address.indexPath).toEqual([1, 1, 1]);
	});

	test("slices the matched node back to the query", async () => {
		const archive = await new TestBook()
			.addChapter("c1", "<p>Ünïcödé 😀 rklı mefhumlardır</p>")
			.save(dir);

		const result = await locateInEpub(archive, "rklı", { tempDir });
		if (result.status !== "found") throw new Error("expected a match");

		const { nodeText, matchStart, matchEnd } = result.address;
		expect([...nodeText].slice(matchStart, matchEnd).join("")).toBe("rklı");
		expect(matchStart).toBe(10);
		expect(result.address.indexPath).toHaveLength(result.address.elementPath.length - 1);
	});

	test("skips manifest items that are not in the spine", async () => {
		const archive = await new TestBook()
			.addChapter("nav", "<nav><p>Hello world</p></nav>", "nav.xhtml", false)
			.addChapter("c1", "<p>world of text</p>")
			.save(dir);

		const result = await locateInEpub(archive, "world", { tempDir });

		expect(result.status === "found" && result.address.matchedFile).toBe("OEBPS/c1.xhtml");
	});
});

describe("locateInPublication", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "publication-test-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	test("works on an extracted publication", async () => {
		await new TestBook()
			.addChapter("c1", "<p>first</p>", "text/one.xhtml")
			.addChapter("c2", "<p>first</p><p>second</p>", "text/two.xhtml")
			.writeTo(dir);

		const result = await locateInPublication(dir, "second");

		expect(result.status).toBe("found");
		if (result.status === "found") {
			expect(result.address.matchedFile).toBe("OEBPS/text/two.xhtml");
			expect(result.address.elementPath.at(-1)).toEqual({ tagName: "p", siblingOrdinal: 2 });
			expect(result.address.indexPath).toEqual([1, 2]);
		}
	});
});

describe("resolveOptions", () => {
	test("fills in defaults", () => {
		expect(resolveOptions()).toEqual({ tempDir: os.tmpdir(), verbose: false });
		expect(resolveOptions({ tempDir: "/var/stage", verbose: true })).toEqual({
			tempDir: "/var/stage",
			verbose: true,
		});
	});
});

import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { resolveInside, resolvePackagePath } from "./container";
import { MalformedContainerError, MissingContainerError } from "./errors";
import TestBook from "./test-book";

const container = (rootfiles: string) => `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>${rootfiles}</rootfiles>
</container>`;

describe("resolvePackagePath", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "container-test-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	test("returns the declared package descriptor", async () => {
		await new TestBook().writeTo(dir);

		await expect(resolvePackagePath(dir)).resolves.toBe(path.join(dir, "OEBPS", "content.opf"));
	});

	test("skips rootfile elements without a full-path", async () => {
		await new TestBook()
			.setContainer(container('<rootfile media-type="application/oebps-package+xml"/><rootfile full-path="OPS/book.opf"/>'))
			.writeTo(dir);

		await expect(resolvePackagePath(dir)).resolves.toBe(path.join(dir, "OPS", "book.opf"));
	});

	test("fails when the container descriptor is absent", async () => {
		await new TestBook().setContainer(null).writeTo(dir);

		await expect(resolvePackagePath(dir)).rejects.toBeInstanceOf(MissingContainerError);
	});

	test("fails when no rootfile declares a full-path", async () => {
		await new TestBook().setContainer(container("")).writeTo(dir);

		await expect(resolvePackagePath(dir)).rejects.toThrow(
			'no rootfile element with a "full-path" attribute',
		);
	});

	test("fails when the container is not well formed", async () => {
		await new TestBook().setContainer("<container><rootfiles></container>").writeTo(dir);

		await expect(resolvePackagePath(dir)).rejects.toBeInstanceOf(MalformedContainerError);
	});

	test("refuses a full-path outside the publication", async () => {
		await new TestBook().setContainer(container('<rootfile full-path="../elsewhere.opf"/>')).writeTo(dir);

		await expect(resolvePackagePath(dir)).rejects.toMatchObject({ code: "MALFORMED_CONTAINER" });
	});
});

describe("resolveInside", () => {
	test("joins archive paths below the root", () => {
		expect(resolveInside("/staging", "OEBPS/content.opf")).toBe(
			path.resolve("/staging", "OEBPS", "content.opf"),
		);
	});

	test("returns null for paths that escape the root", () => {
		expect(resolveInside("/staging", "../etc/passwd")).toBeNull();
		expect(resolveInside("/staging", "a/../../b")).toBeNull();
	});
});

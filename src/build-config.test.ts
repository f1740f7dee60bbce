import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { describe, expect, test } from "vitest";

describe("tsconfig.build.json", () => {
	test("keeps test suites and the fixture builder out of dist", async () => {
		const config: unknown = JSON.parse(await readFile(path.join(__dirname, "..", "tsconfig.build.json"), "utf-8"));

		expect(config).toEqual({
			extends: "./tsconfig.json",
			exclude: ["src/**/*.test.ts", "src/test-book.ts"],
		});
	});

	test("is what the build script compiles", async () => {
		const manifest: unknown = JSON.parse(await readFile(path.join(__dirname, "..", "package.json"), "utf-8"));

		expect(manifest).toMatchObject({
			scripts: { build: "tsc -p tsconfig.build.json", typecheck: "tsc --noEmit" },
		});
	});
});

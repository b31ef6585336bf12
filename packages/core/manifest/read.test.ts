import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { readSkillManifest } from "@core/manifest/read"
import type { AbsolutePath } from "@core/types/branded"

async function withTempDir<T>(fn: (dir: AbsolutePath) => Promise<T>): Promise<T> {
	const dir = await mkdtemp(path.join(tmpdir(), "core-manifest-"))
	try {
		return await fn(dir as AbsolutePath)
	} finally {
		await rm(dir, { force: true, recursive: true })
	}
}

describe("readSkillManifest", () => {
	it("returns null when SKILL.md is absent", async () => {
		await withTempDir(async (dir) => {
			const result = await readSkillManifest(dir)

			expect(result).toEqual({ ok: true, value: null })
		})
	})

	it("loads the manifest with its path", async () => {
		await withTempDir(async (dir) => {
			await writeFile(
				path.join(dir, "SKILL.md"),
				"---\nname: greeting\ndescription: Says hello\n---\n\n# Greeting\n",
			)

			const result = await readSkillManifest(dir)

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value).toEqual({
					description: "Says hello",
					manifestPath: path.join(dir, "SKILL.md"),
					metadata: {},
					name: "greeting",
				})
			}
		})
	})

	it("attaches the manifest path to parse failures", async () => {
		await withTempDir(async (dir) => {
			await mkdir(path.join(dir, "nested"))
			await writeFile(path.join(dir, "SKILL.md"), "# No frontmatter\n")

			const result = await readSkillManifest(dir)

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("validation")
				expect("path" in result.error && result.error.path).toBe(
					path.join(dir, "SKILL.md"),
				)
			}
		})
	})
})

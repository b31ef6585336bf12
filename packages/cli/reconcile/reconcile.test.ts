import { lstat, mkdir, readdir, readlink, realpath, symlink, writeFile } from "node:fs/promises"
import path from "node:path"
import type { SkillName } from "@skillmesh/core"
import { describe, expect, it, vi } from "vitest"
import { snapshotInstallation } from "@/platforms/locate"
import type { InstallationSnapshot, PlatformRoot } from "@/platforms/types"
import { applyReconciliation } from "@/reconcile/apply"
import { planReconciliation, previewPlan, resolveConflicts } from "@/reconcile/plan"
import { reconcile, summarizeOutcomes } from "@/reconcile/reconcile"
import type { ReconcileOutcome, ReconcileTarget } from "@/reconcile/types"
import {
	abs,
	createSkill,
	isSymlink,
	pid,
	readText,
	skill,
	withTempDir,
	writeTree,
} from "@/tests/helpers"

function rootFor(dir: string, id: string): PlatformRoot {
	return { displayName: id, id: pid(id), rootPath: abs(path.join(dir, id, "skills")) }
}

async function loadSource(root: PlatformRoot, name: SkillName): Promise<InstallationSnapshot> {
	const snapshot = await snapshotInstallation(root, name)
	if (!snapshot.ok || !snapshot.value) {
		throw new Error(`Missing test source ${name}`)
	}
	return snapshot.value
}

function targetOf(root: PlatformRoot): ReconcileTarget {
	return { platformId: root.id, rootPath: root.rootPath }
}

describe("reconcile in link mode", () => {
	it("links an absent target to the source", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const sourcePath = await createSkill(claude.rootPath, "demo")
			const source = await loadSource(claude, skill("demo"))

			const result = await reconcile(source, [targetOf(codex)], {
				mode: "link",
				onConflict: "skip",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				const targetPath = path.join(codex.rootPath, "demo")
				expect(result.value).toEqual([
					{
						action: "linked",
						detail: `Linked to ${sourcePath}.`,
						dryRun: false,
						platformId: "codex",
						targetPath,
					},
				])
				expect(await readlink(targetPath)).toBe(sourcePath)
				expect(await realpath(targetPath)).toBe(sourcePath)
			}
		})
	})

	it("reports already_correct on a second run", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			await createSkill(claude.rootPath, "demo")
			const source = await loadSource(claude, skill("demo"))
			const options = { mode: "link" as const, onConflict: "skip" as const }

			await reconcile(source, [targetOf(codex)], options)
			const second = await reconcile(source, [targetOf(codex)], options)

			expect(second.ok).toBe(true)
			if (second.ok) {
				expect(second.value.map((outcome) => outcome.action)).toEqual(["already_correct"])
			}
		})
	})

	it("leaves an existing directory byte-for-byte intact under skip", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			await createSkill(claude.rootPath, "demo")
			const existing = await createSkill(codex.rootPath, "demo", { "local.txt": "mine" })
			const source = await loadSource(claude, skill("demo"))

			const result = await reconcile(source, [targetOf(codex)], {
				mode: "link",
				onConflict: "skip",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value[0]?.action).toBe("skipped_existing")
				expect(result.value[0]?.detail).toBe("Existing directory kept.")
			}
			expect(await isSymlink(existing)).toBe(false)
			expect(await readText(path.join(existing, "local.txt"))).toBe("mine")
		})
	})

	it("replaces an existing directory under force without leaving siblings", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const sourcePath = await createSkill(claude.rootPath, "demo")
			const existing = await createSkill(codex.rootPath, "demo", { "local.txt": "mine" })
			const source = await loadSource(claude, skill("demo"))

			const result = await reconcile(source, [targetOf(codex)], {
				mode: "link",
				onConflict: "force",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value[0]).toMatchObject({ action: "linked", replaced: "directory" })
				expect(result.value[0]?.detail).toBe(
					`Replaced existing directory. Linked to ${sourcePath}.`,
				)
			}
			expect(await readlink(existing)).toBe(sourcePath)
			expect(await readdir(codex.rootPath)).toEqual(["demo"])
		})
	})

	it("replaces a stray file and a foreign link under force", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const gemini = rootFor(dir, "gemini")
			const sourcePath = await createSkill(claude.rootPath, "demo")
			const other = await createSkill(path.join(dir, "elsewhere"), "demo")
			await mkdir(codex.rootPath, { recursive: true })
			await writeFile(path.join(codex.rootPath, "demo"), "not a skill")
			await mkdir(gemini.rootPath, { recursive: true })
			await symlink(other, path.join(gemini.rootPath, "demo"))
			const source = await loadSource(claude, skill("demo"))

			const result = await reconcile(source, [targetOf(codex), targetOf(gemini)], {
				mode: "link",
				onConflict: "force",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.map((outcome) => [outcome.action, outcome.replaced])).toEqual([
					["linked", "file"],
					["linked", "symlink"],
				])
			}
			expect(await readlink(path.join(codex.rootPath, "demo"))).toBe(sourcePath)
			expect(await readlink(path.join(gemini.rootPath, "demo"))).toBe(sourcePath)
			expect(await readdir(gemini.rootPath)).toEqual(["demo"])
		})
	})

	it("never overwrites the source itself", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const sourcePath = await createSkill(claude.rootPath, "demo")
			const source = await loadSource(claude, skill("demo"))

			const result = await reconcile(source, [targetOf(claude)], {
				mode: "link",
				onConflict: "force",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value[0]?.action).toBe("skipped_existing")
				expect(result.value[0]?.detail).toBe("Target is the source installation.")
			}
			expect(await isSymlink(sourcePath)).toBe(false)
		})
	})
})

describe("conflict resolution", () => {
	it("fails fast on unresolved confirmations without touching targets", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const gemini = rootFor(dir, "gemini")
			await createSkill(claude.rootPath, "demo")
			const existing = await createSkill(codex.rootPath, "demo", { "local.txt": "mine" })
			const source = await loadSource(claude, skill("demo"))

			const result = await reconcile(source, [targetOf(gemini), targetOf(codex)], {
				mode: "link",
				onConflict: "ask",
			})

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("validation")
				expect(result.error.field).toBe("onConflict")
			}
			expect(await readText(path.join(existing, "local.txt"))).toBe("mine")
			await expect(lstat(path.join(gemini.rootPath, "demo"))).rejects.toThrow()
		})
	})

	it("replaces confirmed targets and records declined ones", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const gemini = rootFor(dir, "gemini")
			const sourcePath = await createSkill(claude.rootPath, "demo")
			const codexPath = await createSkill(codex.rootPath, "demo", { "local.txt": "a" })
			const geminiPath = await createSkill(gemini.rootPath, "demo", { "local.txt": "b" })
			const source = await loadSource(claude, skill("demo"))
			const confirm = vi.fn(async (message: string) => message.includes(codexPath))

			const result = await reconcile(source, [targetOf(codex), targetOf(gemini)], {
				confirm,
				mode: "link",
				onConflict: "ask",
			})

			expect(confirm).toHaveBeenCalledTimes(2)
			expect(confirm).toHaveBeenNthCalledWith(1, `Replace existing directory at ${codexPath}?`)
			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.map((outcome) => outcome.action)).toEqual([
					"linked",
					"skipped_declined",
				])
				expect(result.value[1]?.detail).toBe("Declined to replace existing directory.")
			}
			expect(await readlink(codexPath)).toBe(sourcePath)
			expect(await readText(path.join(geminiPath, "local.txt"))).toBe("b")
		})
	})

	it("resolves a plan without applying it", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			await createSkill(claude.rootPath, "demo")
			await createSkill(codex.rootPath, "demo", { "local.txt": "a" })
			const source = await loadSource(claude, skill("demo"))

			const planned = await planReconciliation(source, [targetOf(codex)], {
				mode: "link",
				onConflict: "ask",
			})
			expect(planned.ok).toBe(true)
			if (!planned.ok) return

			const resolved = await resolveConflicts(planned.value, async () => false)

			expect(planned.value.tasks[0]?.kind).toBe("confirm")
			expect(resolved.tasks[0]).toMatchObject({ action: "skipped_declined", kind: "skip" })
		})
	})
})

describe("dry run", () => {
	it("previews the same actions that execution then takes", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const gemini = rootFor(dir, "gemini")
			await createSkill(claude.rootPath, "demo")
			await createSkill(gemini.rootPath, "demo", { "local.txt": "g" })
			const source = await loadSource(claude, skill("demo"))
			const targets = [targetOf(codex), targetOf(gemini)]

			for (const onConflict of ["skip", "force"] as const) {
				const preview = await reconcile(source, targets, {
					dryRun: true,
					mode: "copy",
					onConflict,
				})
				const executed = await reconcile(source, targets, { mode: "copy", onConflict })

				expect(preview.ok && executed.ok).toBe(true)
				if (preview.ok && executed.ok) {
					const actions = (outcomes: ReconcileOutcome[]) =>
						outcomes.map((outcome) => outcome.action)
					expect(actions(preview.value)).toEqual(actions(executed.value))
					expect(preview.value.every((outcome) => outcome.dryRun)).toBe(true)
				}
			}
		})
	})

	it("does not touch the filesystem or prompt", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const gemini = rootFor(dir, "gemini")
			await createSkill(claude.rootPath, "demo")
			const existing = await createSkill(gemini.rootPath, "demo", { "local.txt": "g" })
			const source = await loadSource(claude, skill("demo"))
			const confirm = vi.fn(async () => true)

			const result = await reconcile(source, [targetOf(codex), targetOf(gemini)], {
				confirm,
				dryRun: true,
				mode: "link",
				onConflict: "ask",
			})

			expect(confirm).not.toHaveBeenCalled()
			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.map((outcome) => [outcome.action, outcome.detail])).toEqual([
					["linked", `Would link to ${source.resolvedPath}.`],
					["linked", "Would ask before replacing existing directory."],
				])
			}
			await expect(lstat(path.join(codex.rootPath, "demo"))).rejects.toThrow()
			expect(await isSymlink(existing)).toBe(false)
		})
	})
})

describe("reconcile in copy mode", () => {
	it("creates an independent copy and is idempotent", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const sourcePath = await createSkill(claude.rootPath, "demo", { "refs/guide.md": "guide" })
			const source = await loadSource(claude, skill("demo"))
			const options = { mode: "copy" as const, onConflict: "skip" as const }

			const first = await reconcile(source, [targetOf(codex)], options)
			const second = await reconcile(source, [targetOf(codex)], options)

			const targetPath = path.join(codex.rootPath, "demo")
			expect(first.ok && first.value[0]?.action).toBe("copied")
			expect(second.ok && second.value[0]?.action).toBe("already_correct")
			expect(await isSymlink(targetPath)).toBe(false)

			await writeFile(path.join(sourcePath, "refs/guide.md"), "changed")
			expect(await readText(path.join(targetPath, "refs/guide.md"))).toBe("guide")
		})
	})

	it("dereferences linked files and leaves out linked directories", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const sourcePath = await createSkill(claude.rootPath, "demo")
			await writeTree(path.join(dir, "shared"), { "note.txt": "shared", "lib/a.txt": "a" })
			await symlink(path.join(dir, "shared", "note.txt"), path.join(sourcePath, "note.txt"))
			await symlink(path.join(dir, "shared", "lib"), path.join(sourcePath, "lib"))
			const source = await loadSource(claude, skill("demo"))

			const result = await reconcile(source, [targetOf(codex)], {
				mode: "copy",
				onConflict: "skip",
			})

			expect(result.ok).toBe(true)
			const targetPath = path.join(codex.rootPath, "demo")
			expect((await readdir(targetPath)).sort()).toEqual(["SKILL.md", "note.txt"])
			expect(await isSymlink(path.join(targetPath, "note.txt"))).toBe(false)
			expect(await readText(path.join(targetPath, "note.txt"))).toBe("shared")
		})
	})

	it("treats an existing link to the source as a conflict", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			const sourcePath = await createSkill(claude.rootPath, "demo")
			await mkdir(codex.rootPath, { recursive: true })
			await symlink(sourcePath, path.join(codex.rootPath, "demo"))
			const source = await loadSource(claude, skill("demo"))

			const skipped = await reconcile(source, [targetOf(codex)], {
				mode: "copy",
				onConflict: "skip",
			})
			expect(skipped.ok && skipped.value[0]?.detail).toBe("Existing symlink kept.")

			const forced = await reconcile(source, [targetOf(codex)], {
				mode: "copy",
				onConflict: "force",
			})
			expect(forced.ok && forced.value[0]?.replaced).toBe("symlink")
			expect(await isSymlink(path.join(codex.rootPath, "demo"))).toBe(false)
			expect(await isSymlink(sourcePath)).toBe(false)
		})
	})
})

describe("applyReconciliation", () => {
	it("reports per-target failures without stopping", async () => {
		await withTempDir(async (dir) => {
			const claude = rootFor(dir, "claude")
			const codex = rootFor(dir, "codex")
			await createSkill(claude.rootPath, "demo")
			await writeFile(path.join(dir, "blocked"), "a file where a root should be")
			const blocked: ReconcileTarget = {
				platformId: pid("blocked"),
				rootPath: abs(path.join(dir, "blocked")),
			}
			const source = await loadSource(claude, skill("demo"))

			const planned = await planReconciliation(source, [blocked, targetOf(codex)], {
				mode: "link",
				onConflict: "skip",
			})
			expect(planned.ok).toBe(true)
			if (!planned.ok) return

			const applied = await applyReconciliation(planned.value)

			expect(applied.ok).toBe(true)
			if (applied.ok) {
				expect(applied.value.map((outcome) => outcome.action)).toEqual(["failed", "linked"])
			}
			expect(previewPlan(planned.value).map((outcome) => outcome.action)).toEqual([
				"failed",
				"linked",
			])
		})
	})
})

describe("summarizeOutcomes", () => {
	const outcome = (action: ReconcileOutcome["action"]): ReconcileOutcome => ({
		action,
		detail: "",
		dryRun: false,
		platformId: pid("codex"),
		targetPath: abs("/tmp/demo"),
	})

	it("exits 1 when any target failed", () => {
		const summary = summarizeOutcomes([outcome("linked"), outcome("failed")])
		expect(summary.exitCode).toBe(1)
		expect(summary.failed).toBe(1)
		expect(summary.linked).toBe(1)
	})

	it("exits 2 when everything was skipped", () => {
		const summary = summarizeOutcomes([outcome("skipped_existing"), outcome("skipped_declined")])
		expect(summary.exitCode).toBe(2)
	})

	it("exits 0 when something succeeded", () => {
		expect(summarizeOutcomes([outcome("already_correct"), outcome("skipped_existing")])).toEqual({
			alreadyCorrect: 1,
			copied: 0,
			exitCode: 0,
			failed: 0,
			linked: 0,
			skippedDeclined: 0,
			skippedExisting: 1,
			total: 2,
		})
	})

	it("exits 0 for no targets", () => {
		expect(summarizeOutcomes([]).exitCode).toBe(0)
	})
})

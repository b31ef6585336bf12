import { mkdir, readlink, symlink } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import {
	distributeMarketplaces,
	distributionStatus,
	listMarketplaceSkills,
} from "@/sync/distribute"
import {
	abs,
	createSkill,
	exists,
	makeConfig,
	rootOf,
	skillMarkdown,
	withTempDir,
	writeTree,
} from "@/tests/helpers"

function withMarketplace(dir: string, platforms: string[]) {
	return makeConfig(dir, platforms, {
		marketplaces: [{ name: "team", path: abs(path.join(dir, "team-skills")) }],
	})
}

describe("distributeMarketplaces", () => {
	it("links marketplace skills into every enabled platform except claude", async () => {
		await withTempDir(async (dir) => {
			const config = withMarketplace(dir, ["claude", "codex"])
			const review = await createSkill(path.join(dir, "team-skills", "skills"), "review")

			const result = await distributeMarketplaces(config, { dryRun: false, onConflict: "skip" })

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.totals.linked).toBe(1)
				expect(result.value.excludedPlatforms).toEqual(["claude"])
			}
			expect(await readlink(path.join(rootOf(config, "codex"), "review"))).toBe(review)
			expect(await exists(path.join(rootOf(config, "claude"), "review"))).toBe(false)
		})
	})

	it("links into claude when native platforms are included", async () => {
		await withTempDir(async (dir) => {
			const config = withMarketplace(dir, ["claude", "codex"])
			const review = await createSkill(path.join(dir, "team-skills", "skills"), "review")

			const result = await distributeMarketplaces(config, {
				dryRun: false,
				includeNative: true,
				onConflict: "skip",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.totals.linked).toBe(2)
				expect(result.value.excludedPlatforms).toEqual([])
			}
			expect(await readlink(path.join(rootOf(config, "claude"), "review"))).toBe(review)
		})
	})

	it("distributes only the named skill", async () => {
		await withTempDir(async (dir) => {
			const config = withMarketplace(dir, ["codex"])
			const skillsDir = path.join(dir, "team-skills", "skills")
			await createSkill(skillsDir, "review")
			const lint = await createSkill(skillsDir, "lint")

			const result = await distributeMarketplaces(config, {
				dryRun: false,
				onConflict: "skip",
				skill: "lint",
			})

			expect(result.ok && result.value.skills.map((skill) => skill.skillName)).toEqual(["lint"])
			expect(await readlink(path.join(rootOf(config, "codex"), "lint"))).toBe(lint)
			expect(await exists(path.join(rootOf(config, "codex"), "review"))).toBe(false)
		})
	})

	it("fails for a skill no marketplace has", async () => {
		await withTempDir(async (dir) => {
			await createSkill(path.join(dir, "team-skills", "skills"), "review")

			const result = await distributeMarketplaces(withMarketplace(dir, ["codex"]), {
				dryRun: false,
				onConflict: "skip",
				skill: "ghost",
			})

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("not_found")
				expect(result.error.message).toBe('Skill "ghost" was not found in any marketplace.')
			}
		})
	})

	it("links only into the requested platforms", async () => {
		await withTempDir(async (dir) => {
			const config = withMarketplace(dir, ["claude", "codex", "gemini"])
			const review = await createSkill(path.join(dir, "team-skills", "skills"), "review")

			const result = await distributeMarketplaces(config, {
				dryRun: false,
				onConflict: "skip",
				to: ["gemini"],
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.skills[0]?.outcomes.map((outcome) => outcome.platformId)).toEqual([
					"gemini",
				])
			}
			expect(await readlink(path.join(rootOf(config, "gemini"), "review"))).toBe(review)
			expect(await exists(path.join(rootOf(config, "codex"), "review"))).toBe(false)
		})
	})

	it("reports no targets when only claude is requested", async () => {
		await withTempDir(async (dir) => {
			const config = withMarketplace(dir, ["claude", "codex"])
			await createSkill(path.join(dir, "team-skills", "skills"), "review")

			const result = await distributeMarketplaces(config, {
				dryRun: false,
				onConflict: "skip",
				to: ["claude"],
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.noOpReason).toBe("no-targets")
				expect(result.value.excludedPlatforms).toEqual(["claude"])
			}
		})
	})

	it("fails for an unknown marketplace", async () => {
		await withTempDir(async (dir) => {
			const result = await distributeMarketplaces(withMarketplace(dir, ["claude"]), {
				dryRun: false,
				marketplace: "other",
				onConflict: "skip",
			})

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("not_found")
				expect(result.error.message).toBe('Unknown marketplace "other".')
			}
		})
	})

	it("reports a no-op for a marketplace without skills", async () => {
		await withTempDir(async (dir) => {
			const result = await distributeMarketplaces(withMarketplace(dir, ["claude"]), {
				dryRun: true,
				onConflict: "skip",
			})

			expect(result.ok && result.value.noOpReason).toBe("no-skills")
		})
	})
})

describe("listMarketplaceSkills", () => {
	it("lists skills with their descriptions", async () => {
		await withTempDir(async (dir) => {
			const skillsDir = path.join(dir, "team-skills", "skills")
			await writeTree(path.join(skillsDir, "review"), {
				"SKILL.md": skillMarkdown("review", "Instructions.", "Reviews pull requests"),
			})
			await createSkill(skillsDir, "lint")

			const result = await listMarketplaceSkills(withMarketplace(dir, ["codex"]))

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(
					result.value.map((skill) => [skill.marketplace, skill.skillName, skill.description]),
				).toEqual([
					["team", "lint", null],
					["team", "review", "Reviews pull requests"],
				])
			}
		})
	})
})

describe("distributionStatus", () => {
	it("classifies each platform entry", async () => {
		await withTempDir(async (dir) => {
			const config = withMarketplace(dir, ["claude", "codex", "gemini", "copilot"])
			const review = await createSkill(path.join(dir, "team-skills", "skills"), "review")
			const other = await createSkill(path.join(dir, "other"), "review")

			await mkdir(rootOf(config, "claude"), { recursive: true })
			await symlink(review, path.join(rootOf(config, "claude"), "review"))
			await mkdir(rootOf(config, "codex"), { recursive: true })
			await symlink(other, path.join(rootOf(config, "codex"), "review"))
			await createSkill(rootOf(config, "gemini"), "review")

			const result = await distributionStatus(config, { includeNative: true })

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.map((entry) => [entry.platformId, entry.state])).toEqual([
					["claude", "linked"],
					["codex", "linked_elsewhere"],
					["gemini", "exists"],
					["copilot", "absent"],
				])
				expect(result.value[1]?.linkTarget).toBe(other)
			}
		})
	})

	it("leaves out claude by default", async () => {
		await withTempDir(async (dir) => {
			const config = withMarketplace(dir, ["claude", "codex"])
			await createSkill(path.join(dir, "team-skills", "skills"), "review")

			const result = await distributionStatus(config)

			expect(result.ok && result.value.map((entry) => entry.platformId)).toEqual(["codex"])
		})
	})
})

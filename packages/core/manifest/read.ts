import { readFile } from "node:fs/promises"
import { SKILL_FILENAME } from "@core/constants"
import { parseFrontmatter } from "@core/parsing/frontmatter"
import type { AbsolutePath } from "@core/types/branded"
import { coerceAbsolutePath } from "@core/types/coerce"
import type { LoadedSkillManifest } from "@core/types/content"
import type { Result } from "@core/types/error"

/**
 * Read and parse the manifest of the skill rooted at `skillDir`.
 *
 * Resolves to `null` when the directory has no SKILL.md; callers treat that
 * directory as "not a skill".
 */
export async function readSkillManifest(
	skillDir: AbsolutePath,
): Promise<Result<LoadedSkillManifest | null>> {
	const manifestPath = coerceAbsolutePath(SKILL_FILENAME, skillDir)
	if (!manifestPath) {
		const message = `Unable to resolve ${SKILL_FILENAME} under ${skillDir}.`
		return {
			error: {
				field: "manifestPath",
				message,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	let contents: string
	try {
		contents = await readFile(manifestPath, "utf8")
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return {
			error: {
				message: `Unable to read ${manifestPath}.`,
				operation: "readFile",
				path: manifestPath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}

	const parsed = parseFrontmatter(contents)
	if (!parsed.ok) {
		return {
			error: {
				...parsed.error,
				path: manifestPath,
			},
			ok: false,
		}
	}

	return { ok: true, value: { ...parsed.value, manifestPath } }
}

function isNotFound(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
}

import matter from "gray-matter"
import { z } from "zod"
import type { NonEmptyString } from "@core/types/branded"
import type { SkillManifest } from "@core/types/content"
import type { Result } from "@core/types/error"

const NonEmptyStringSchema = z
	.string()
	.trim()
	.min(1)
	.transform((value) => value as NonEmptyString)

const SkillSchema = z.object({
	description: NonEmptyStringSchema.optional(),
	name: NonEmptyStringSchema,
})

const RESERVED_KEYS = new Set(["name", "description"])

export function parseFrontmatter(contents: string): Result<SkillManifest> {
	const normalized = contents.replace(/\r\n/g, "\n")
	if (!normalized.startsWith("---\n")) {
		const message = "SKILL.md must start with YAML frontmatter."
		return {
			error: {
				field: "frontmatter",
				message,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const closingIndex = normalized.indexOf("\n---", 3)
	if (closingIndex === -1) {
		const message = "Frontmatter is missing a closing --- line."
		return {
			error: {
				field: "frontmatter",
				message,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	let parsed: matter.GrayMatterFile<string>
	try {
		parsed = matter(normalized)
	} catch (error) {
		return {
			error: {
				message: "Invalid frontmatter.",
				rawError: error instanceof Error ? error : undefined,
				source: "frontmatter",
				type: "parse",
			},
			ok: false,
		}
	}

	const data: unknown = parsed.data
	if (!isRecord(data)) {
		const message = "Frontmatter must be a key/value map."
		return {
			error: {
				field: "frontmatter",
				message,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const result = SkillSchema.safeParse(data)
	if (!result.success) {
		return {
			error: {
				field: "frontmatter",
				message: "Frontmatter validation failed.",
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const metadata: Record<string, unknown> = {}
	for (const [key, value] of Object.entries(data)) {
		if (!RESERVED_KEYS.has(key)) {
			metadata[key] = value
		}
	}

	const manifest: SkillManifest = { metadata, name: result.data.name }
	if (result.data.description) {
		manifest.description = result.data.description
	}

	return { ok: true, value: manifest }
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

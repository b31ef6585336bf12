import type { AbsolutePath, NonEmptyString } from "@core/types/branded"

export type SkillManifest = {
	name: NonEmptyString
	description?: NonEmptyString
	/** Every other frontmatter key, as parsed. */
	metadata: Record<string, unknown>
}

export type LoadedSkillManifest = SkillManifest & {
	manifestPath: AbsolutePath
}

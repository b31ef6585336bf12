/**
 * @skillmesh/core
 *
 * Shared constants, types, and manifest parsing for skill drift detection.
 */

export {
	CONFIG_FILENAME,
	ERROR_HASH,
	MARKETPLACE_SKILLS_DIR,
	SKILL_FILENAME,
	SKILLMESH_GLOBAL_DIR,
} from "@core/constants"
export { readSkillManifest } from "@core/manifest/read"
export { parseFrontmatter } from "@core/parsing/frontmatter"
export type {
	AbsolutePath,
	NonEmptyString,
	PlatformId,
	SkillName,
} from "@core/types/branded"
export {
	assertPlatformId,
	coerceAbsolutePath,
	coercePlatformId,
	coerceSkillName,
	expandHomePath,
} from "@core/types/coerce"
export type { LoadedSkillManifest, SkillManifest } from "@core/types/content"
export type {
	BaseError,
	ConflictError,
	CoreError,
	IoError,
	NotFoundError,
	ParseError,
	Result,
	ValidationError,
} from "@core/types/error"
export { isPlatformId } from "@core/types/guards"

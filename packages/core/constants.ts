/**
 * Shared constants for skill discovery and configuration.
 *
 * These are the canonical filenames and directory names used to identify
 * skills and the skillmesh configuration.
 */

/** Skill definition file - markdown with YAML frontmatter */
export const SKILL_FILENAME = "SKILL.md"

/** Global skillmesh configuration directory (relative to home) */
export const SKILLMESH_GLOBAL_DIR = ".skillmesh"

/** Configuration file inside SKILLMESH_GLOBAL_DIR */
export const CONFIG_FILENAME = "config.toml"

/** Skills subdirectory inside a marketplace clone */
export const MARKETPLACE_SKILLS_DIR = "skills"

/**
 * Reserved content hash for files that could not be read.
 * Never equal to any other hash, including itself.
 */
export const ERROR_HASH = "ERROR"

import path from "node:path"
import type { PlatformId } from "@skillmesh/core"
import { MARKETPLACE_SKILLS_DIR } from "@skillmesh/core"
import type { PlatformConfig, SkillmeshConfig } from "@/config/types"
import { toAbsolutePath } from "@/io/fs"
import { EXTERNAL_PLATFORM_ID } from "@/platforms/registry"
import type { PlatformRoot } from "@/platforms/types"

export function platformRoots(
	config: SkillmeshConfig,
	options: { includeDisabled?: boolean } = {},
): PlatformRoot[] {
	return config.platforms
		.filter((platform) => options.includeDisabled || platform.enabled)
		.map((platform) => ({
			displayName: platform.displayName,
			id: platform.id,
			rootPath: platform.rootPath,
		}))
}

export function findPlatform(
	config: SkillmeshConfig,
	platformId: PlatformId | string,
): PlatformConfig | undefined {
	return config.platforms.find((platform) => platform.id === platformId)
}

/**
 * Skill roots of the configured marketplaces, owned by the external platform.
 */
export function marketplaceRoots(config: SkillmeshConfig): PlatformRoot[] {
	return config.marketplaces.map((marketplace) => ({
		displayName: `${marketplace.name} (marketplace)`,
		id: EXTERNAL_PLATFORM_ID,
		rootPath: toAbsolutePath(path.join(marketplace.path, MARKETPLACE_SKILLS_DIR)),
	}))
}

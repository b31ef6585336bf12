import type { AbsolutePath, PlatformId, SkillManifest, SkillName } from "@skillmesh/core"
import type { FingerprintMap } from "@/fingerprint/types"

export interface PlatformDefinition {
	id: PlatformId
	displayName: string
	/** Default skills directory, `~/`-relative. */
	skillsPath: string
	/** Directory whose presence means the platform is installed, `~/`-relative. */
	detectPath: string
	/** Reads marketplace clones on its own, so distribution skips it by default. */
	nativeMarketplace: boolean
}

/** One configured installation root, in registry order. */
export interface PlatformRoot {
	id: PlatformId
	displayName: string
	rootPath: AbsolutePath
}

export interface PlatformDetection {
	platform: PlatformDefinition
	detectPath: AbsolutePath
	detected: boolean
}

export interface InstallationSnapshot {
	platformId: PlatformId
	skillName: SkillName
	rootPath: AbsolutePath
	skillPath: AbsolutePath
	/** False only for a dangling link. */
	exists: boolean
	isSymlink: boolean
	/** End of the link chain; set only for links. */
	symlinkTarget: AbsolutePath | null
	/** Real path of the installation (the link target for links). */
	resolvedPath: AbsolutePath
	files: FingerprintMap
	manifest: SkillManifest | null
	warnings: string[]
}

export interface InventoryEntry {
	directoryName: SkillName
	/** Manifest name, or the directory name when the manifest is invalid. */
	name: string
	description: string | null
	skillPath: AbsolutePath
	valid: boolean
	isSymlink: boolean
	symlinkTarget: AbsolutePath | null
}

export interface PlatformInventory {
	platform: PlatformRoot
	skills: InventoryEntry[]
	warnings: string[]
}

import type { AbsolutePath, ParseError, PlatformId, Result, ValidationError } from "@skillmesh/core"
import type { IoError } from "@/io/types"
import type { ReconcileMode } from "@/reconcile/types"

export interface PlatformConfig {
	id: PlatformId
	displayName: string
	rootPath: AbsolutePath
	enabled: boolean
}

/** A local clone of a shared skills repository. */
export interface MarketplaceConfig {
	name: string
	path: AbsolutePath
}

export interface SkillmeshConfig {
	configPath: AbsolutePath
	syncMode: ReconcileMode
	/** Platform that holds the canonical copy of every skill, if any. */
	source: PlatformId | null
	platforms: PlatformConfig[]
	marketplaces: MarketplaceConfig[]
}

export interface LoadedConfig {
	config: SkillmeshConfig
	/** False when the file was missing and defaults were used. */
	fromFile: boolean
}

export type ConfigError = ParseError | ValidationError | IoError

export type ConfigResult<T> = Result<T, ConfigError>

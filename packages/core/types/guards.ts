import type { PlatformId } from "@core/types/branded"
import { coercePlatformId } from "@core/types/coerce"

export function isPlatformId(value: string): value is PlatformId {
	return coercePlatformId(value) === value
}

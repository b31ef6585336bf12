import type { SyncResult, SyncStage } from "@/sync/types"
import type { SkmError } from "@/types/errors"

export function failSync(stage: SyncStage, error: SkmError): SyncResult<never> {
	return {
		error: {
			...error,
			cause: error,
			message: `Sync failed at ${stage}.`,
			stage,
		},
		ok: false,
	}
}

export function syncValidation(
	stage: SyncStage,
	field: string,
	message: string,
): SyncResult<never> {
	return {
		error: { field, message, source: "manual", stage, type: "validation" },
		ok: false,
	}
}

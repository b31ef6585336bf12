import type {
	ConflictError,
	IoError,
	NotFoundError,
	ParseError,
	ValidationError,
} from "@skillmesh/core"

export type { ConflictError, IoError, NotFoundError, ParseError, ValidationError }

export type SkmError =
	| ValidationError
	| ParseError
	| IoError
	| ConflictError
	| NotFoundError

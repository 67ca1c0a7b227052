// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: Protected core accessors stay internal; only the chaining surface is exported
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fluent validator ending in a success or failure continuation.
 *
 * @example
 * ```typescript
 * import { create } from "fluent-validation-chain";
 *
 * const label = create<number, string>(port)
 * 	.on((p) => p < 1024, "port is privileged", "PRIVILEGED_PORT")
 * 	.onSuccess((p) => `listening on ${p}`)
 * 	.onFailure((_, message) => message);
 * ```
 */
export {
	AppliableValidator,
	create,
	resolveValidatorOptions,
} from "./core/appliable-validator.js";
export { ValidationCore } from "./core/validation-core.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	NO_ERROR_CODE,
	NULL_VALUE_MESSAGE,
} from "./core/constants.js";
export {
	DEFAULT_VALIDATOR_OPTIONS,
	isAbsent,
} from "./core/models.js";
export type {
	Absent,
	FailureHandler,
	Mapper,
	Predicate,
	SuccessHandler,
	ValidationFailure,
	ValidatorOptions,
	ValidityState,
} from "./core/models.js";

// ═══════════════════════════════════════════════════════════════════════════════
// MISUSE ERRORS (thrown, never reported as validation failures)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	DuplicateSuccessHandlerError,
	isValidatorMisuseError,
	MissingSuccessHandlerError,
	NullValueCodeError,
} from "./core/errors.js";
export type { ValidatorMisuseError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// RESULT ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	isLeft,
	isRight,
	left,
	right,
} from "./core/either.js";
export type { Either } from "./core/either.js";
export { validateEffect } from "./app/validate-effect.js";

// PURITY: CORE
// INVARIANT: Constants are plain strings; NO_ERROR_CODE is never confused with an unset code
// COMPLEXITY: O(1)

/**
 * Error code recorded when a check is attached without an explicit code.
 *
 * @invariant NO_ERROR_CODE !== undefined ∧ NO_ERROR_CODE !== null
 */
export const NO_ERROR_CODE = "NO_ERROR_CODE";

/** Message recorded when the validated value itself is absent. */
export const NULL_VALUE_MESSAGE = "value is null";

export const NULL_VALUE_CODE_MESSAGE = "The null value code must not be null.";
export const DUPLICATE_SUCCESS_HANDLER_MESSAGE =
	"The success mapper must be unique.";
export const MISSING_SUCCESS_HANDLER_MESSAGE =
	"The success consumer must not be null.";

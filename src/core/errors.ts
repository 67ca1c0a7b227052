// CHANGE: Typed misuse errors for the validation chain using Effect.Data
// WHY: Misuse of the API is a separate channel from validation failures, which stay data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Every misuse error is an Error discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

import {
	DUPLICATE_SUCCESS_HANDLER_MESSAGE,
	MISSING_SUCCESS_HANDLER_MESSAGE,
	NULL_VALUE_CODE_MESSAGE,
} from "./constants.js";

/**
 * A validator was created with a null/undefined null-value code.
 *
 * @pure true (Data class)
 * @invariant thrown before any validator state exists
 * @complexity O(1)
 */
export class NullValueCodeError extends Data.TaggedError("NullValueCode")<{
	readonly message: string;
}> {
	constructor() {
		super({ message: NULL_VALUE_CODE_MESSAGE });
	}
}

/**
 * `onSuccess` was called a second time on the same validator.
 *
 * @pure true (Data class)
 * @complexity O(1)
 */
export class DuplicateSuccessHandlerError extends Data.TaggedError(
	"DuplicateSuccessHandler",
)<{
	readonly message: string;
}> {
	constructor() {
		super({ message: DUPLICATE_SUCCESS_HANDLER_MESSAGE });
	}
}

/**
 * The terminal evaluation ran before any success handler was attached.
 *
 * @pure true (Data class)
 * @complexity O(1)
 */
export class MissingSuccessHandlerError extends Data.TaggedError(
	"MissingSuccessHandler",
)<{
	readonly message: string;
}> {
	constructor() {
		super({ message: MISSING_SUCCESS_HANDLER_MESSAGE });
	}
}

/**
 * Union of all programmer-misuse errors.
 *
 * @invariant never produced by a correctly-used chain
 */
export type ValidatorMisuseError =
	| NullValueCodeError
	| DuplicateSuccessHandlerError
	| MissingSuccessHandlerError;

/**
 * Type guard separating misuse errors from arbitrary thrown values.
 *
 * @pure true
 * @complexity O(1)
 */
export const isValidatorMisuseError = (
	error: Error,
): error is ValidatorMisuseError =>
	error instanceof NullValueCodeError ||
	error instanceof DuplicateSuccessHandlerError ||
	error instanceof MissingSuccessHandlerError;

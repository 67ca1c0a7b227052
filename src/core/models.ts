// CHANGE: Domain models for the validation chain
// PURITY: CORE
// INVARIANT: Types, the default options record and the absent-value guard only
// COMPLEXITY: O(1)

import { NO_ERROR_CODE } from "./constants.js";

/**
 * Absent value: the subject (or a mapped property) carries nothing.
 */
export type Absent = null | undefined;

/**
 * Check predicate. Returns `true` when the value FAILS the check.
 *
 * @remarks
 * - @pure expected (evaluated at most once per check)
 */
export type Predicate<T> = (value: T) => boolean;

/** Projects a property out of the validated value for `notNull`. */
export type Mapper<T, R> = (value: T) => R;

/** Success continuation: receives the validated value. */
export type SuccessHandler<T, U> = (value: T) => U;

/** Failure continuation: receives the value and the retained error message. */
export type FailureHandler<T, U> = (value: T, errorMessage: string) => U;

/**
 * The single retained validation failure.
 *
 * @remarks
 * - @invariant at most one failure exists per validator
 */
export interface ValidationFailure {
	readonly code: string;
	readonly message: string;
}

/**
 * Construction-time policy of a validator.
 *
 * @remarks
 * - @invariant nullValueCode is never null/undefined
 * - @invariant fastValidate is fixed for the validator's lifetime
 */
export interface ValidatorOptions {
	readonly nullValueCode: string;
	readonly fastValidate: boolean;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
	nullValueCode: NO_ERROR_CODE,
	fastValidate: false,
};

/**
 * Validity state machine. `Invalid` is terminal: there is no transition back.
 */
export type ValidityState =
	| { readonly tag: "Valid" }
	| { readonly tag: "Invalid"; readonly failure: ValidationFailure };

/**
 * Type guard for absent values.
 *
 * @pure true
 * @complexity O(1)
 */
export const isAbsent = <A>(value: A | Absent): value is Absent =>
	value === null || value === undefined;

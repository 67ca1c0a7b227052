// CHANGE: Either module for the data channel of validation outcomes
// PURITY: CORE
// INVARIANT: Either contains exactly one of Left (failure) or Right (value)
// COMPLEXITY: O(1) for every combinator

/**
 * Result type for computations that may fail.
 *
 * @typeParam E - Error type
 * @typeParam A - Success value type
 *
 * @invariant Either contains exactly one of Left (error) or Right (success)
 */
export type Either<E, A> =
	| { readonly tag: "Left"; readonly error: E }
	| { readonly tag: "Right"; readonly value: A };

/**
 * Creates a Left (error) value.
 *
 * @complexity O(1) time, O(1) space
 */
export const left = <E, A = never>(error: E): Either<E, A> => ({
	tag: "Left",
	error,
});

/**
 * Creates a Right (success) value.
 *
 * @complexity O(1) time, O(1) space
 */
export const right = <A, E = never>(value: A): Either<E, A> => ({
	tag: "Right",
	value,
});

export const isLeft = <E, A>(
	either: Either<E, A>,
): either is { readonly tag: "Left"; readonly error: E } =>
	either.tag === "Left";

export const isRight = <E, A>(
	either: Either<E, A>,
): either is { readonly tag: "Right"; readonly value: A } =>
	either.tag === "Right";

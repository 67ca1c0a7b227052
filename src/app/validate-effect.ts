// CHANGE: Effect projection of the terminal evaluation
// PURITY: APP (logging only; no I/O of its own)
// EFFECT: Effect<U, ValidationFailure>
// INVARIANT: Validation failures travel in the error channel; misuse errors are defects
// COMPLEXITY: O(1) excluding the caller's continuations

import { Effect, pipe } from "effect";
import { match } from "ts-pattern";

import type { AppliableValidator } from "../core/appliable-validator.js";
import type { Either } from "../core/either.js";
import type { ValidationFailure } from "../core/models.js";

/**
 * Runs the validator's terminal evaluation as an Effect.
 *
 * @param validator - Validator with a success handler attached
 * @returns Effect that succeeds with `successHandler(value)` or fails with
 * the retained failure
 *
 * @pure false - emits debug logs
 * @effect Effect<U, ValidationFailure, never>
 *
 * @example
 * ```ts
 * const program = validateEffect(
 * 	create<string, number>(input)
 * 		.on((s) => s.length === 0, "must not be empty", "EMPTY")
 * 		.onSuccess((s) => s.length),
 * );
 * ```
 */
export const validateEffect = <T, U>(
	validator: AppliableValidator<T, U>,
): Effect.Effect<U, ValidationFailure> =>
	pipe(
		// Thrown misuse errors become defects inside Effect.sync
		Effect.sync(() => validator.evaluate()),
		Effect.flatMap((outcome) =>
			match<Either<ValidationFailure, U>, Effect.Effect<U, ValidationFailure>>(
				outcome,
			)
				.with({ tag: "Right" }, ({ value }) =>
					pipe(
						Effect.logDebug("validation passed"),
						Effect.as(value),
					),
				)
				.with({ tag: "Left" }, ({ error }) =>
					pipe(
						Effect.logDebug("validation failed"),
						Effect.annotateLogs({
							errorCode: error.code,
							errorMessage: error.message,
						}),
						Effect.zipRight(Effect.fail(error)),
					),
				)
				.exhaustive(),
		),
		Effect.withLogSpan("validate"),
	);

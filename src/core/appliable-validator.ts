// CHANGE: Concrete validator with typed success/failure continuations
// PURITY: CORE (continuations are caller code; the validator itself performs no I/O)
// INVARIANT: successHandler is assigned at most once
// INVARIANT: Every terminal call runs exactly one continuation or throws a misuse error
// COMPLEXITY: O(1) excluding the caller's continuations

import { match } from "ts-pattern";

import { NO_ERROR_CODE } from "./constants.js";
import { type Either, left, right } from "./either.js";
import {
	DuplicateSuccessHandlerError,
	MissingSuccessHandlerError,
} from "./errors.js";
import {
	DEFAULT_VALIDATOR_OPTIONS,
	type FailureHandler,
	type SuccessHandler,
	type ValidationFailure,
	type ValidatorOptions,
	type ValidityState,
} from "./models.js";
import { ValidationCore } from "./validation-core.js";

/**
 * Resolves the positional `create` arguments into validator options.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveValidatorOptions = (
	codeOrFastValidate?: string | boolean,
	fastValidate?: boolean,
): ValidatorOptions => {
	if (codeOrFastValidate === undefined) {
		return DEFAULT_VALIDATOR_OPTIONS;
	}
	if (typeof codeOrFastValidate === "boolean") {
		return {
			nullValueCode: NO_ERROR_CODE,
			fastValidate: codeOrFastValidate,
		};
	}
	return {
		nullValueCode: codeOrFastValidate,
		fastValidate: fastValidate ?? DEFAULT_VALIDATOR_OPTIONS.fastValidate,
	};
};

/**
 * Validator that ends in a value: attach checks, then `onSuccess`, then
 * `onFailure`.
 *
 * @typeParam T - Type of the validated value
 * @typeParam U - Result type of both continuations
 *
 * @example
 * ```ts
 * const doubled = AppliableValidator.create<number, number>(42)
 * 	.on((v) => v < 0, "must be non-negative")
 * 	.onSuccess((v) => v * 2)
 * 	.onFailure(() => -1);
 * // doubled === 84
 * ```
 */
export class AppliableValidator<T, U> extends ValidationCore<T> {
	private successHandler: SuccessHandler<T, U> | undefined;

	private constructor(value: T, options: ValidatorOptions) {
		super(value, options);
	}

	/**
	 * Defaults: `nullValueCode = NO_ERROR_CODE`, `fastValidate = false`.
	 * `R` defaults to `never`; name it to attach a success handler.
	 *
	 * @throws NullValueCodeError when the null-value code is null or undefined
	 */
	static create<P, R = never>(value: P): AppliableValidator<P, R>;
	static create<P, R = never>(
		value: P,
		fastValidate: boolean,
	): AppliableValidator<P, R>;
	static create<P, R = never>(
		value: P,
		nullValueCode: string,
		fastValidate: boolean,
	): AppliableValidator<P, R>;
	static create<P, R = never>(
		value: P,
		codeOrFastValidate?: string | boolean,
		fastValidate?: boolean,
	): AppliableValidator<P, R> {
		return AppliableValidator.fromOptions<P, R>(
			value,
			resolveValidatorOptions(codeOrFastValidate, fastValidate),
		);
	}

	/**
	 * @throws NullValueCodeError when `options.nullValueCode` is null or undefined
	 */
	static fromOptions<P, R = never>(
		value: P,
		options: ValidatorOptions,
	): AppliableValidator<P, R> {
		return new AppliableValidator<P, R>(value, options);
	}

	/**
	 * @throws DuplicateSuccessHandlerError on a second call
	 */
	onSuccess(successHandler: SuccessHandler<T, U>): this {
		if (this.successHandler !== undefined) {
			throw new DuplicateSuccessHandlerError();
		}
		this.successHandler = successHandler;
		return this;
	}

	/**
	 * Terminal evaluation. Returns `successHandler(value)` when the chain is
	 * still valid, otherwise `failureHandler(value, errorMessage)`.
	 *
	 * @throws MissingSuccessHandlerError when `onSuccess` was never called
	 */
	onFailure(failureHandler: FailureHandler<T, U>): U {
		const successHandler = this.requireSuccessHandler();
		return match(this.settle())
			.with({ tag: "Valid" }, () => successHandler(this.value))
			.with({ tag: "Invalid" }, ({ failure }) =>
				failureHandler(this.value, failure.message),
			)
			.exhaustive();
	}

	/**
	 * Terminal evaluation that keeps the error code: `Right` carries
	 * `successHandler(value)`, `Left` the retained failure.
	 *
	 * @throws MissingSuccessHandlerError when `onSuccess` was never called
	 */
	evaluate(): Either<ValidationFailure, U> {
		const successHandler = this.requireSuccessHandler();
		return match(this.settle())
			.with({ tag: "Valid" }, () =>
				right<U, ValidationFailure>(successHandler(this.value)),
			)
			.with({ tag: "Invalid" }, ({ failure }) =>
				left<ValidationFailure, U>(failure),
			)
			.exhaustive();
	}

	private settle(): ValidityState {
		this.checkValue();
		return this.currentState();
	}

	private requireSuccessHandler(): SuccessHandler<T, U> {
		if (this.successHandler === undefined) {
			throw new MissingSuccessHandlerError();
		}
		return this.successHandler;
	}
}

/**
 * Module-level alias of {@link AppliableValidator.create}.
 */
export function create<P, R = never>(value: P): AppliableValidator<P, R>;
export function create<P, R = never>(
	value: P,
	fastValidate: boolean,
): AppliableValidator<P, R>;
export function create<P, R = never>(
	value: P,
	nullValueCode: string,
	fastValidate: boolean,
): AppliableValidator<P, R>;
export function create<P, R = never>(
	value: P,
	codeOrFastValidate?: string | boolean,
	fastValidate?: boolean,
): AppliableValidator<P, R> {
	return AppliableValidator.fromOptions<P, R>(
		value,
		resolveValidatorOptions(codeOrFastValidate, fastValidate),
	);
}

// CHANGE: Abstract validation state machine shared by every concrete validator
// PURITY: CORE (mutable state is owned by one instance and never shared)
// INVARIANT: Valid → Invalid is the only transition; at most one failure is retained
// INVARIANT: fastValidate ∧ ¬valid → no further predicate is invoked
// COMPLEXITY: O(1) per check, excluding the caller's predicate

import { NO_ERROR_CODE, NULL_VALUE_MESSAGE } from "./constants.js";
import { NullValueCodeError } from "./errors.js";
import {
	isAbsent,
	type Mapper,
	type Predicate,
	type ValidatorOptions,
	type ValidityState,
} from "./models.js";

const VALID: ValidityState = { tag: "Valid" };

/**
 * Holds the subject value, the single error slot and the fail-fast policy.
 *
 * Check operations return `this`, so subclasses keep their own type through
 * the chain.
 *
 * @typeParam T - Type of the validated value
 *
 * @remarks
 * - @invariant nullValueCode is never null/undefined
 * - @invariant state.tag === "Invalid" is absorbing
 */
export abstract class ValidationCore<T> {
	protected readonly value: T;
	private readonly nullValueCode: string;
	private readonly fastValidate: boolean;
	private state: ValidityState = VALID;

	/**
	 * @throws NullValueCodeError when `options.nullValueCode` is null or undefined
	 */
	protected constructor(value: T, options: ValidatorOptions) {
		if (isAbsent(options.nullValueCode)) {
			throw new NullValueCodeError();
		}
		this.value = value;
		this.nullValueCode = options.nullValueCode;
		this.fastValidate = options.fastValidate;
	}

	/**
	 * Fails when `mapper(value)` is absent. The mapper is not called for an
	 * absent subject, which `checkValue` has already reported.
	 */
	notNull<R>(
		mapper: Mapper<NonNullable<T>, R>,
		errorMessage: string,
		errorCode: string = NO_ERROR_CODE,
	): this {
		this.checkValue();
		const subject = this.value;
		if (
			this.keepValidating() &&
			subject !== null &&
			subject !== undefined &&
			isAbsent(mapper(subject))
		) {
			this.setError(errorCode, errorMessage);
		}
		return this;
	}

	/**
	 * Fails when `predicate(value)` returns `true`: the predicate describes
	 * the failing condition.
	 */
	on(
		predicate: Predicate<T>,
		errorMessage: string,
		errorCode: string = NO_ERROR_CODE,
	): this {
		this.checkValue();
		if (this.keepValidating() && predicate(this.value)) {
			this.setError(errorCode, errorMessage);
		}
		return this;
	}

	/**
	 * Fails when both `condition(value)` and `predicate(value)` are true.
	 * The predicate is not evaluated when the condition is false.
	 */
	onIf(
		predicate: Predicate<T>,
		errorMessage: string,
		condition: Predicate<T>,
	): this;
	onIf(
		predicate: Predicate<T>,
		errorMessage: string,
		errorCode: string,
		condition: Predicate<T>,
	): this;
	onIf(
		predicate: Predicate<T>,
		errorMessage: string,
		codeOrCondition: string | Predicate<T>,
		condition?: Predicate<T>,
	): this {
		const errorCode =
			typeof codeOrCondition === "string" ? codeOrCondition : NO_ERROR_CODE;
		const applies =
			typeof codeOrCondition === "string" ? condition : codeOrCondition;
		this.checkValue();
		if (
			this.keepValidating() &&
			(applies === undefined || applies(this.value)) &&
			predicate(this.value)
		) {
			this.setError(errorCode, errorMessage);
		}
		return this;
	}

	/**
	 * Records the null-value failure once, the first time an absent subject
	 * is seen while still valid.
	 */
	protected checkValue(): void {
		if (isAbsent(this.value) && this.isValid()) {
			this.setError(this.nullValueCode, NULL_VALUE_MESSAGE);
		}
	}

	/**
	 * Fail-fast: only while valid. Run-all: always.
	 */
	protected keepValidating(): boolean {
		return !this.fastValidate || this.isValid();
	}

	/** Last writer wins. */
	protected setError(errorCode: string, errorMessage: string): void {
		this.state = {
			tag: "Invalid",
			failure: { code: errorCode, message: errorMessage },
		};
	}

	protected isValid(): boolean {
		return this.state.tag === "Valid";
	}

	/** Undefined while valid. */
	protected getErrMsg(): string | undefined {
		return this.state.tag === "Invalid" ? this.state.failure.message : undefined;
	}

	protected currentState(): ValidityState {
		return this.state;
	}
}

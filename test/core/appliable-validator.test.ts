// CHANGE: Specs for the terminal evaluation of AppliableValidator
// FORMAT THEOREM: ∀ v passing every check: onFailure(h) = successHandler(v) ∧ h never runs
// PURITY: CORE
// INVARIANT: Exactly one continuation runs per terminal call

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	AppliableValidator,
	create,
	resolveValidatorOptions,
} from "../../src/core/appliable-validator.js";
import { NO_ERROR_CODE, NULL_VALUE_MESSAGE } from "../../src/core/constants.js";
import { left, right } from "../../src/core/either.js";
import {
	DuplicateSuccessHandlerError,
	MissingSuccessHandlerError,
	NullValueCodeError,
} from "../../src/core/errors.js";
import { DEFAULT_VALIDATOR_OPTIONS } from "../../src/core/models.js";

const nonNegative = (value: number) =>
	create<number, number>(value)
		.on((v) => v < 0, "must be non-negative")
		.onSuccess((v) => v * 2);

describe("onFailure", () => {
	it("returns the success continuation for a passing value", () => {
		expect(nonNegative(42).onFailure(() => -1)).toBe(84);
	});

	it("returns the failure continuation for a failing value", () => {
		let seen = "";
		const result = nonNegative(-5).onFailure((_, message) => {
			seen = message;
			return -1;
		});
		expect(result).toBe(-1);
		expect(seen).toBe("must be non-negative");
	});

	it("passes the original value to the failure continuation", () => {
		expect(nonNegative(-5).onFailure((v) => v)).toBe(-5);
	});

	it("reports an absent value even with no checks attached", () => {
		const result = create<string | null, string>(null, "ERR_NULL", false)
			.onSuccess((v) => v ?? "unreachable")
			.onFailure((_, message) => message);
		expect(result).toBe(NULL_VALUE_MESSAGE);
	});

	it("never calls the failure continuation for passing values", () => {
		fc.assert(
			fc.property(fc.nat(), (n) => {
				let failures = 0;
				const result = nonNegative(n).onFailure(() => {
					failures += 1;
					return -1;
				});
				expect(result).toBe(n * 2);
				expect(failures).toBe(0);
			}),
		);
	});

	it("never calls the success continuation for absent values", () => {
		fc.assert(
			fc.property(
				fc.constantFrom(null, undefined),
				fc.boolean(),
				(absent, fastValidate) => {
					let successes = 0;
					const result = create<number | null | undefined, string>(
						absent,
						"ERR_NULL",
						fastValidate,
					)
						.onSuccess(() => {
							successes += 1;
							return "ok";
						})
						.onFailure((_, message) => message);
					expect(result).toBe(NULL_VALUE_MESSAGE);
					expect(successes).toBe(0);
				},
			),
		);
	});

	it("decides on validity even when the failure carries no message", () => {
		const untyped: Record<string, string> = {};
		const validator = create<number, string>(-5)
			.on((n) => n < 0, untyped["message"])
			.onSuccess(() => "success");
		expect(validator.onFailure(() => "failure")).toBe("failure");
		expect(validator.evaluate().tag).toBe("Left");
	});

	it("re-runs the matching continuation when called twice", () => {
		let calls = 0;
		const validator = create<number, number>(1).onSuccess((v) => {
			calls += 1;
			return v;
		});
		validator.onFailure(() => 0);
		validator.onFailure(() => 0);
		expect(calls).toBe(2);
	});
});

describe("misuse errors", () => {
	it("throws DuplicateSuccessHandlerError on the second onSuccess", () => {
		const validator = create<number, number>(1).onSuccess((v) => v);
		expect(() => validator.onSuccess((v) => v + 1)).toThrow(
			DuplicateSuccessHandlerError,
		);
	});

	it("throws MissingSuccessHandlerError when onSuccess was never called", () => {
		expect(() => create<number, number>(1).onFailure(() => 0)).toThrow(
			MissingSuccessHandlerError,
		);
	});

	it("checks the success handler before the value", () => {
		expect(() => create<null, string>(null).onFailure((_, m) => m)).toThrow(
			MissingSuccessHandlerError,
		);
	});

	it("throws NullValueCodeError at construction for a null code", () => {
		const missingCode: string = JSON.parse("null");
		expect(() => create(1, missingCode, true)).toThrow(NullValueCodeError);
		expect(() => AppliableValidator.create(1, missingCode, false)).toThrow(
			NullValueCodeError,
		);
	});
});

describe("create", () => {
	it("defaults to NO_ERROR_CODE and run-all policy", () => {
		expect(resolveValidatorOptions()).toEqual(DEFAULT_VALIDATOR_OPTIONS);
		expect(DEFAULT_VALIDATOR_OPTIONS).toEqual({
			nullValueCode: NO_ERROR_CODE,
			fastValidate: false,
		});
	});

	it("resolves the two-argument form to the sentinel code", () => {
		expect(resolveValidatorOptions(true)).toEqual({
			nullValueCode: NO_ERROR_CODE,
			fastValidate: true,
		});
	});

	it("resolves the three-argument form as given", () => {
		expect(resolveValidatorOptions("E_NULL", true)).toEqual({
			nullValueCode: "E_NULL",
			fastValidate: true,
		});
	});

	it("records the sentinel code for an absent value by default", () => {
		const result = create<null, string>(null)
			.onSuccess(() => "unreachable")
			.evaluate();
		expect(result).toEqual(
			left({ code: NO_ERROR_CODE, message: NULL_VALUE_MESSAGE }),
		);
	});

	it("honours the fast-validate flag of the two-argument form", () => {
		let calls = 0;
		create(1, true)
			.on(() => true, "first")
			.on(() => {
				calls += 1;
				return false;
			}, "second");
		expect(calls).toBe(0);
	});

	it("builds validators from an options record", () => {
		const result = AppliableValidator.fromOptions<string | null, string>(null, {
			nullValueCode: "MISSING",
			fastValidate: true,
		})
			.onSuccess((s) => s ?? "unreachable")
			.evaluate();
		expect(result).toEqual(left({ code: "MISSING", message: NULL_VALUE_MESSAGE }));
	});
});

describe("evaluate", () => {
	it("returns the transformed value in Right", () => {
		expect(nonNegative(21).evaluate()).toEqual(right(42));
	});

	it("returns the retained failure with its code in Left", () => {
		const result = create<number, number>(-1)
			.on((v) => v < 0, "must be non-negative", "NEGATIVE")
			.onSuccess((v) => v)
			.evaluate();
		expect(result).toEqual(
			left({ code: "NEGATIVE", message: "must be non-negative" }),
		);
	});

	it("throws MissingSuccessHandlerError without a success handler", () => {
		expect(() => create<number, number>(1).evaluate()).toThrow(
			MissingSuccessHandlerError,
		);
	});
});

describe("chains ending in evaluate", () => {
	it("returns the transformed value after a passing notNull check", () => {
		const payload = { id: 7 };
		const result = create<{ id: number }, number>(payload)
			.notNull((p) => p.id, "id is required")
			.onSuccess((p) => p.id)
			.evaluate();
		expect(result).toEqual(right(7));
	});

	it("returns the last failure under run-all policy", () => {
		const result = create<string, string>("ab", false)
			.on((s) => s.length < 3, "too short", "SHORT")
			.on((s) => !s.includes("@"), "missing @", "FORMAT")
			.onSuccess((s) => s)
			.evaluate();
		expect(result).toEqual(left({ code: "FORMAT", message: "missing @" }));
	});

	it("returns the first failure under fail-fast policy", () => {
		const result = create<string, string>("ab", true)
			.on((s) => s.length < 3, "too short", "SHORT")
			.on((s) => !s.includes("@"), "missing @", "FORMAT")
			.onSuccess((s) => s)
			.onFailure((_, message) => message);
		expect(result).toBe("too short");
	});
});

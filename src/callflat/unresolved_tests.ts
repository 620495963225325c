import { BoolExpr, TRUE } from "./expr.js";
import { instantiate } from "./instantiate.js";
import {
	CallStack,
	FunctionSummary,
	InstantiatedConstraint,
	pushFrame,
	SourceLocation,
	TOP,
} from "./summary.js";
import { assert } from "./test.js";
import { warnAboutUnresolvedAsserts } from "./unresolved.js";

function bool(id: number): BoolExpr {
	return { tag: "bool-var", variable: { sort: "bool", id } };
}

function loc(line: number): SourceLocation {
	return { fileID: "model.src", line, column: 5 };
}

function asserted(condition: BoolExpr, location: CallStack, assuming: BoolExpr = TRUE): InstantiatedConstraint {
	return { tag: "expr", condition, assuming, origin: "asserted", location };
}

function implied(condition: BoolExpr, location: CallStack, assuming: BoolExpr = TRUE): InstantiatedConstraint {
	return { tag: "expr", condition, assuming, origin: "implied", location };
}

const MESSAGE = "Failed to parse the assert condition";

export const tests = {
	"flags-only-isolated-bare-variables"() {
		const constraints = [
			asserted(bool(1), pushFrame(loc(1), TOP)),
			asserted({ tag: "and", operands: [bool(2), bool(3)] }, pushFrame(loc(2), TOP)),
			asserted(bool(4), pushFrame(loc(3), TOP)),
			implied({
				tag: "int-compare",
				op: "=",
				left: { tag: "int-var", variable: { sort: "int", id: 0 } },
				right: { tag: "int-var", variable: { sort: "int", id: 1 } },
			}, pushFrame(loc(4), TOP), bool(4)),
		];

		assert(warnAboutUnresolvedAsserts(constraints), "is equal to", [
			{ message: MESSAGE, location: loc(1) },
		]);
	},
	"ignores-implied-constraints"() {
		assert(warnAboutUnresolvedAsserts([
			implied(bool(0), pushFrame(loc(1), TOP)),
		]), "is equal to", []);
	},
	"uses-in-the-own-assumption-count"() {
		assert(warnAboutUnresolvedAsserts([
			asserted(bool(0), pushFrame(loc(1), TOP), bool(0)),
		]), "is equal to", []);
	},
	"uses-in-call-constraints-count"() {
		assert(warnAboutUnresolvedAsserts([
			asserted(bool(0), pushFrame(loc(1), TOP)),
			{
				tag: "call",
				callee: "f",
				args: [bool(0)],
				result: null,
				assuming: TRUE,
				location: TOP,
			},
		]), "is equal to", []);
	},
	"needs-a-source-location"() {
		assert(warnAboutUnresolvedAsserts([
			asserted(bool(0), TOP),
			asserted(bool(1), pushFrame(null, pushFrame(loc(1), TOP))),
		]), "is equal to", []);
	},
	"reports-each-location-once-in-order"() {
		const constraints = [
			asserted(bool(0), pushFrame(loc(7), TOP)),
			asserted(bool(1), pushFrame(loc(3), TOP)),
			asserted(bool(2), pushFrame(loc(7), pushFrame(loc(1), TOP))),
		];

		assert(warnAboutUnresolvedAsserts(constraints), "is equal to", [
			{ message: MESSAGE, location: loc(7) },
			{ message: MESSAGE, location: loc(3) },
		]);
	},
	"an-assert-inlined-twice-is-reported-once"() {
		const env = new Map<string, FunctionSummary>([
			["f", {
				argExprs: [],
				retExpr: null,
				constraints: [
					{ tag: "call", callee: "h", args: [], result: null, assuming: TRUE, location: loc(1) },
					{ tag: "call", callee: "h", args: [], result: null, assuming: TRUE, location: loc(2) },
				],
			}],
			["h", {
				argExprs: [],
				retExpr: null,
				constraints: [
					{ tag: "expr", condition: bool(0), assuming: TRUE, origin: "asserted", location: loc(9) },
				],
			}],
		]);

		const constraints = instantiate("f", env);
		assert(constraints.length, "is equal to", 2);
		assert(warnAboutUnresolvedAsserts(constraints), "is equal to", [
			{ message: MESSAGE, location: loc(9) },
		]);
	},
};

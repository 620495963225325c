import {
	BoolExpr,
	conjoin,
	equate,
	exprOfVar,
	FALSE,
	IntExpr,
	ListExpr,
	renameVariable,
	sortOf,
	substitute,
	TRUE,
	VariableGenerator,
	varKey,
} from "./expr.js";
import { assert } from "./test.js";

function int(id: number): IntExpr {
	return { tag: "int-var", variable: { sort: "int", id } };
}

function list(id: number): ListExpr {
	return { tag: "list-var", variable: { sort: "list", id } };
}

function bool(id: number): BoolExpr {
	return { tag: "bool-var", variable: { sort: "bool", id } };
}

export const tests = {
	"varKey-distinguishes-sorts"() {
		assert(varKey({ sort: "int", id: 3 }), "is equal to", "int#3");
		assert(varKey({ sort: "bool", id: 3 }), "is equal to", "bool#3");
	},
	"sortOf"() {
		assert(sortOf({ tag: "length", list: list(0) }), "is equal to", "int");
		assert(sortOf({ tag: "broadcast", left: list(0), right: list(1) }), "is equal to", "list");
		assert(sortOf({ tag: "int-compare", op: "<", left: int(0), right: int(1) }), "is equal to", "bool");
		assert(sortOf(exprOfVar({ sort: "list", id: 7 })), "is equal to", "list");
	},
	"VariableGenerator-shares-one-counter-between-sorts"() {
		const variables = new VariableGenerator();
		assert(variables.fresh("int"), "is equal to", { sort: "int", id: 0 });
		assert(variables.fresh("bool"), "is equal to", { sort: "bool", id: 1 });
		assert(variables.fresh("int"), "is equal to", { sort: "int", id: 2 });
		assert(variables.count, "is equal to", 3);
	},
	"substitute-leaves-unmapped-variables-alone"() {
		const e: BoolExpr = {
			tag: "int-compare",
			op: "<=",
			left: { tag: "int-op", op: "+", left: int(0), right: { tag: "int-literal", value: 1 } },
			right: { tag: "length", list: list(1) },
		};

		const renamed = substitute(e, v => v.sort === "int" ? int(v.id + 10) : null);
		assert(renamed, "is equal to", {
			tag: "int-compare",
			op: "<=",
			left: { tag: "int-op", op: "+", left: int(10), right: { tag: "int-literal", value: 1 } },
			right: { tag: "length", list: list(1) },
		});
	},
	"substitute-reaches-list-literal-elements"() {
		const e: ListExpr = {
			tag: "list-literal",
			elements: [int(0), null, { tag: "element", index: -1, list: list(0) }],
		};

		const renamed = substitute(e, v => v.sort === "int" ? { tag: "int-literal", value: 4 } : list(9));
		assert(renamed, "is equal to", {
			tag: "list-literal",
			elements: [
				{ tag: "int-literal", value: 4 },
				null,
				{ tag: "element", index: -1, list: list(9) },
			],
		});
	},
	"substitute-rejects-sort-changes"() {
		assert(() => substitute(int(0), () => bool(1)), "throws error",
			/ICE: variable of sort `int` rewritten to an expression of sort `bool`/);
	},
	"renameVariable"() {
		assert(renameVariable({ sort: "bool", id: 0 }, () => bool(5)), "is equal to", { sort: "bool", id: 5 });
		assert(renameVariable({ sort: "bool", id: 0 }, () => null), "is equal to", { sort: "bool", id: 0 });
		assert(() => renameVariable({ sort: "bool", id: 0 }, () => TRUE), "throws error",
			/renamed to a non-variable `bool-literal`/);
	},
	"equate-by-sort"() {
		assert(equate(int(0), int(1)), "is equal to", { tag: "int-compare", op: "=", left: int(0), right: int(1) });
		assert(equate(list(0), list(1)), "is equal to", { tag: "list-eq", left: list(0), right: list(1) });
		assert(equate(bool(0), FALSE), "is equal to", { tag: "bool-eq", left: bool(0), right: FALSE });
	},
	"equate-absent-or-mismatched"() {
		assert(equate(int(0), null), "is equal to", null);
		assert(equate(int(0), list(0)), "is equal to", null);
		assert(equate(bool(0), int(0)), "is equal to", null);
	},
	"conjoin-drops-true"() {
		assert(conjoin(TRUE, bool(0)), "is equal to", bool(0));
		assert(conjoin(bool(0), TRUE), "is equal to", bool(0));
		assert(conjoin(TRUE, TRUE), "is equal to", TRUE);
	},
	"conjoin-flattens-in-order"() {
		const left = conjoin(bool(0), bool(1));
		assert(left, "is equal to", { tag: "and", operands: [bool(0), bool(1)] });

		const right = conjoin(bool(2), bool(3));
		assert(conjoin(left, right), "is equal to", {
			tag: "and",
			operands: [bool(0), bool(1), bool(2), bool(3)],
		});
	},
	"conjoin-keeps-false"() {
		assert(conjoin(FALSE, bool(0)), "is equal to", { tag: "and", operands: [FALSE, bool(0)] });
	},
};

import { unreachable } from "./data.js";

/// `Sort` distinguishes the kinds of symbolic values.
/// `"int"` is the sort of unbounded integers.
/// `"list"` is the sort of finite lists of integers (such as tensor shapes).
/// `"bool"` is the sort of the two truth values.
export type Sort = "int" | "list" | "bool";

/// `Var` is a symbolic variable. Two `Var`s denote the same variable exactly
/// when they have the same `sort` and `id`.
export interface Var {
	sort: Sort,
	id: number,
}

/// `varKey` identifies a variable by its sort and id, so that variables can
/// be compared by value.
export function varKey(v: Var): string {
	return v.sort + "#" + v.id;
}

export interface IntVar {
	tag: "int-var",
	variable: Var,
}

export interface IntLiteral {
	tag: "int-literal",
	value: number,
}

/// `Length` is the number of elements of a list.
export interface Length {
	tag: "length",
	list: ListExpr,
}

/// `Element` is the element at a constant position of a list. Negative
/// indexes count from the end of the list.
export interface Element {
	tag: "element",
	index: number,
	list: ListExpr,
}

export interface IntOp {
	tag: "int-op",
	op: "+" | "-" | "*" | "/",
	left: IntExpr,
	right: IntExpr,
}

export type IntExpr = IntVar | IntLiteral | Length | Element | IntOp;

export interface ListVar {
	tag: "list-var",
	variable: Var,
}

export interface ListLiteral {
	tag: "list-literal",

	/// A `null` element is a position whose value is unknown.
	elements: (IntExpr | null)[],
}

export interface Broadcast {
	tag: "broadcast",
	left: ListExpr,
	right: ListExpr,
}

export type ListExpr = ListVar | ListLiteral | Broadcast;

export interface BoolVar {
	tag: "bool-var",
	variable: Var,
}

export interface BoolLiteral {
	tag: "bool-literal",
	value: boolean,
}

export interface Not {
	tag: "not",
	operand: BoolExpr,
}

export interface And {
	tag: "and",
	operands: BoolExpr[],
}

export interface Or {
	tag: "or",
	operands: BoolExpr[],
}

export interface IntCompare {
	tag: "int-compare",
	op: "=" | "<" | "<=" | ">" | ">=",
	left: IntExpr,
	right: IntExpr,
}

export interface ListEq {
	tag: "list-eq",
	left: ListExpr,
	right: ListExpr,
}

export interface BoolEq {
	tag: "bool-eq",
	left: BoolExpr,
	right: BoolExpr,
}

export type BoolExpr = BoolVar | BoolLiteral | Not | And | Or | IntCompare | ListEq | BoolEq;

export type Expr = IntExpr | ListExpr | BoolExpr;

export const TRUE: BoolLiteral = { tag: "bool-literal", value: true };
export const FALSE: BoolLiteral = { tag: "bool-literal", value: false };

export function sortOf(e: Expr): Sort {
	if (e.tag === "int-var" || e.tag === "int-literal" || e.tag === "length"
		|| e.tag === "element" || e.tag === "int-op") {
		return "int";
	} else if (e.tag === "list-var" || e.tag === "list-literal" || e.tag === "broadcast") {
		return "list";
	} else if (e.tag === "bool-var" || e.tag === "bool-literal" || e.tag === "not"
		|| e.tag === "and" || e.tag === "or" || e.tag === "int-compare"
		|| e.tag === "list-eq" || e.tag === "bool-eq") {
		return "bool";
	}

	return unreachable(e, "sortOf");
}

export function asIntExpr(e: Expr): IntExpr | null {
	switch (e.tag) {
		case "int-var":
		case "int-literal":
		case "length":
		case "element":
		case "int-op":
			return e;
		default:
			return null;
	}
}

export function asListExpr(e: Expr): ListExpr | null {
	switch (e.tag) {
		case "list-var":
		case "list-literal":
		case "broadcast":
			return e;
		default:
			return null;
	}
}

export function asBoolExpr(e: Expr): BoolExpr | null {
	switch (e.tag) {
		case "bool-var":
		case "bool-literal":
		case "not":
		case "and":
		case "or":
		case "int-compare":
		case "list-eq":
		case "bool-eq":
			return e;
		default:
			return null;
	}
}

/// RETURNS the expression which is a reference to the given variable.
export function exprOfVar(v: Var): Expr {
	if (v.sort === "int") {
		return { tag: "int-var", variable: v };
	} else if (v.sort === "list") {
		return { tag: "list-var", variable: v };
	} else {
		return { tag: "bool-var", variable: v };
	}
}

/**
 * `VariableGenerator` hands out variables that it has never handed out
 * before. A single generator is shared by everything that must not collide.
 */
export class VariableGenerator {
	private next = 0;

	fresh(sort: Sort): Var {
		const v = { sort, id: this.next };
		this.next += 1;
		return v;
	}

	/** The number of variables generated so far. */
	get count(): number {
		return this.next;
	}
}

/**
 * A `Rewrite` maps a variable to the expression that replaces it, or to
 * `null` when no replacement is defined (the variable is then left in place).
 */
export type Rewrite = (v: Var) => Expr | null;

function rewriteVariable(v: Var, rewrite: Rewrite): Expr | null {
	const replacement = rewrite(v);
	if (replacement !== null && sortOf(replacement) !== v.sort) {
		throw new Error("ICE: variable of sort `" + v.sort + "` rewritten to an expression of sort `"
			+ sortOf(replacement) + "`");
	}
	return replacement;
}

export function substituteInt(e: IntExpr, rewrite: Rewrite): IntExpr {
	if (e.tag === "int-var") {
		const replacement = rewriteVariable(e.variable, rewrite);
		return replacement === null ? e : asIntExpr(replacement) || e;
	} else if (e.tag === "int-literal") {
		return e;
	} else if (e.tag === "length") {
		return { tag: "length", list: substituteList(e.list, rewrite) };
	} else if (e.tag === "element") {
		return { tag: "element", index: e.index, list: substituteList(e.list, rewrite) };
	} else if (e.tag === "int-op") {
		return {
			tag: "int-op",
			op: e.op,
			left: substituteInt(e.left, rewrite),
			right: substituteInt(e.right, rewrite),
		};
	}

	return unreachable(e, "substituteInt");
}

export function substituteList(e: ListExpr, rewrite: Rewrite): ListExpr {
	if (e.tag === "list-var") {
		const replacement = rewriteVariable(e.variable, rewrite);
		return replacement === null ? e : asListExpr(replacement) || e;
	} else if (e.tag === "list-literal") {
		return {
			tag: "list-literal",
			elements: e.elements.map(x => x === null ? null : substituteInt(x, rewrite)),
		};
	} else if (e.tag === "broadcast") {
		return {
			tag: "broadcast",
			left: substituteList(e.left, rewrite),
			right: substituteList(e.right, rewrite),
		};
	}

	return unreachable(e, "substituteList");
}

export function substituteBool(e: BoolExpr, rewrite: Rewrite): BoolExpr {
	if (e.tag === "bool-var") {
		const replacement = rewriteVariable(e.variable, rewrite);
		return replacement === null ? e : asBoolExpr(replacement) || e;
	} else if (e.tag === "bool-literal") {
		return e;
	} else if (e.tag === "not") {
		return { tag: "not", operand: substituteBool(e.operand, rewrite) };
	} else if (e.tag === "and" || e.tag === "or") {
		return { tag: e.tag, operands: e.operands.map(x => substituteBool(x, rewrite)) };
	} else if (e.tag === "int-compare") {
		return {
			tag: "int-compare",
			op: e.op,
			left: substituteInt(e.left, rewrite),
			right: substituteInt(e.right, rewrite),
		};
	} else if (e.tag === "list-eq") {
		return {
			tag: "list-eq",
			left: substituteList(e.left, rewrite),
			right: substituteList(e.right, rewrite),
		};
	} else if (e.tag === "bool-eq") {
		return {
			tag: "bool-eq",
			left: substituteBool(e.left, rewrite),
			right: substituteBool(e.right, rewrite),
		};
	}

	return unreachable(e, "substituteBool");
}

/// `substitute` replaces every variable in `e` for which `rewrite` defines a
/// replacement. The result has the same sort as `e`.
export function substitute(e: Expr, rewrite: Rewrite): Expr {
	const i = asIntExpr(e);
	if (i !== null) {
		return substituteInt(i, rewrite);
	}
	const l = asListExpr(e);
	if (l !== null) {
		return substituteList(l, rewrite);
	}
	const b = asBoolExpr(e);
	if (b !== null) {
		return substituteBool(b, rewrite);
	}
	throw new Error("substitute: unreachable `" + e.tag + "`");
}

/// RETURNS the variable `rewrite` renames `v` to, or `v` itself when no
/// rewrite is defined.
export function renameVariable(v: Var, rewrite: Rewrite): Var {
	const replacement = rewriteVariable(v, rewrite);
	if (replacement === null) {
		return v;
	} else if (replacement.tag === "int-var" || replacement.tag === "list-var" || replacement.tag === "bool-var") {
		return replacement.variable;
	}
	throw new Error("ICE: variable `" + varKey(v) + "` renamed to a non-variable `" + replacement.tag + "`");
}

/// `equate` builds the constraint that two expressions are equal.
/// RETURNS null when `right` is absent or when the two expressions have
/// different sorts, since no equality between them can be stated.
export function equate(left: Expr, right: Expr | null): BoolExpr | null {
	if (right === null) {
		return null;
	}

	const leftInt = asIntExpr(left);
	const rightInt = asIntExpr(right);
	if (leftInt !== null && rightInt !== null) {
		return { tag: "int-compare", op: "=", left: leftInt, right: rightInt };
	}

	const leftList = asListExpr(left);
	const rightList = asListExpr(right);
	if (leftList !== null && rightList !== null) {
		return { tag: "list-eq", left: leftList, right: rightList };
	}

	const leftBool = asBoolExpr(left);
	const rightBool = asBoolExpr(right);
	if (leftBool !== null && rightBool !== null) {
		return { tag: "bool-eq", left: leftBool, right: rightBool };
	}

	return null;
}

function isTrue(e: BoolExpr): boolean {
	return e.tag === "bool-literal" && e.value;
}

/// `conjoin` builds `a && b`. A literal `true` operand is dropped, and nested
/// conjunctions are flattened (keeping the order of their operands).
export function conjoin(a: BoolExpr, b: BoolExpr): BoolExpr {
	if (isTrue(a)) {
		return b;
	} else if (isTrue(b)) {
		return a;
	}

	const operands: BoolExpr[] = [];
	for (const e of [a, b]) {
		if (e.tag === "and") {
			operands.push(...e.operands);
		} else {
			operands.push(e);
		}
	}
	return { tag: "and", operands };
}

import { unreachable } from "./data.js";
import { BoolExpr, Expr, renameVariable, Rewrite, substitute, substituteBool, Var } from "./expr.js";

/// `SourceLocation` is a position in the source of an analyzed function.
export interface SourceLocation {
	fileID: string,

	// 1-based.
	line: number,

	// 1-based, measured in characters.
	column: number,
}

export function locationKey(location: SourceLocation): string {
	return location.fileID + ":" + location.line + ":" + location.column;
}

/// `CallStack` records the call sites between the root of an instantiation
/// and the origin of a constraint. Frames are never mutated, and are shared by
/// every constraint instantiated below the same call site.
export type CallStack = { tag: "top" } | CallFrame;

export interface CallFrame {
	tag: "frame",

	/// The location within the calling function. `null` when the abstraction
	/// pass had no debug location for it.
	location: SourceLocation | null,

	caller: CallStack,
}

export const TOP: CallStack = { tag: "top" };

export function pushFrame(location: SourceLocation | null, caller: CallStack): CallFrame {
	return { tag: "frame", location, caller };
}

/// RETURNS the location of the innermost frame of the stack, if it has one.
export function innermostLocation(stack: CallStack): SourceLocation | null {
	if (stack.tag === "top") {
		return null;
	}
	return stack.location;
}

/// RETURNS the locations of the stack, innermost first.
export function stackLocations(stack: CallStack): (SourceLocation | null)[] {
	const out: (SourceLocation | null)[] = [];
	let cursor = stack;
	while (cursor.tag === "frame") {
		out.push(cursor.location);
		cursor = cursor.caller;
	}
	return out;
}

/// `"asserted"` constraints come from an assertion in the analyzed source.
/// `"implied"` constraints are everything derived automatically.
export type Origin = "asserted" | "implied";

/// `ExprConstraint` states that `condition` holds whenever `assuming` holds.
export interface ExprConstraint<L> {
	tag: "expr",
	condition: BoolExpr,
	assuming: BoolExpr,
	origin: Origin,
	location: L,
}

/// `CallConstraint` records that `callee` is invoked under `assuming` with the
/// given arguments. A `null` argument is unconstrained. The call's result is
/// bound to `result`, when it is captured.
export interface CallConstraint<L> {
	tag: "call",
	callee: string,
	args: (Expr | null)[],
	result: Var | null,
	assuming: BoolExpr,
	location: L,
}

export type Constraint<L> = ExprConstraint<L> | CallConstraint<L>;

/// Within a summary, a constraint is located at a stable position inside the
/// summarized function.
export type SummaryConstraint = Constraint<SourceLocation | null>;

/// After instantiation, every call has been inlined and every constraint
/// carries its full call stack.
export type InstantiatedConstraint = ExprConstraint<CallStack>;

/// `FunctionSummary` is the abstraction of one function.
export interface FunctionSummary {
	/// One element per formal parameter. A `null` element is a parameter with
	/// no useful constraint.
	argExprs: (Expr | null)[],

	retExpr: Expr | null,

	constraints: SummaryConstraint[],
}

export type Environment = ReadonlyMap<string, FunctionSummary>;

export interface StructField {
	name: string,
	type: string,
}

export type StructDecl = StructField[];

export type TypeEnvironment = ReadonlyMap<string, StructDecl>;

/// `constraintSubstitute` applies `rewrite` to every expression of the
/// constraint, including the captured result of a call.
export function constraintSubstitute<L>(c: Constraint<L>, rewrite: Rewrite): Constraint<L> {
	if (c.tag === "expr") {
		return {
			tag: "expr",
			condition: substituteBool(c.condition, rewrite),
			assuming: substituteBool(c.assuming, rewrite),
			origin: c.origin,
			location: c.location,
		};
	} else if (c.tag === "call") {
		return {
			tag: "call",
			callee: c.callee,
			args: c.args.map(a => a === null ? null : substitute(a, rewrite)),
			result: c.result === null ? null : renameVariable(c.result, rewrite),
			assuming: substituteBool(c.assuming, rewrite),
			location: c.location,
		};
	}

	return unreachable(c, "constraintSubstitute");
}

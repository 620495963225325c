import { unreachable } from "./data.js";
import { BoolExpr, Expr, Var } from "./expr.js";
import {
	CallStack,
	Constraint,
	FunctionSummary,
	SourceLocation,
	stackLocations,
} from "./summary.js";

const SORT_PREFIX = {
	int: "i",
	list: "l",
	bool: "b",
};

export function displayVar(v: Var): string {
	return SORT_PREFIX[v.sort] + v.id;
}

function displayOptional(e: Expr | null): string {
	return e === null ? "*" : displayExpr(e);
}

export function displayExpr(e: Expr): string {
	if (e.tag === "int-var" || e.tag === "list-var" || e.tag === "bool-var") {
		return displayVar(e.variable);
	} else if (e.tag === "int-literal") {
		return e.value.toFixed(0);
	} else if (e.tag === "length") {
		return "len(" + displayExpr(e.list) + ")";
	} else if (e.tag === "element") {
		return displayExpr(e.list) + "[" + e.index.toFixed(0) + "]";
	} else if (e.tag === "int-op" || e.tag === "int-compare") {
		return "(" + displayExpr(e.left) + " " + e.op + " " + displayExpr(e.right) + ")";
	} else if (e.tag === "list-literal") {
		return "[" + e.elements.map(displayOptional).join(", ") + "]";
	} else if (e.tag === "broadcast") {
		return "broadcast(" + displayExpr(e.left) + ", " + displayExpr(e.right) + ")";
	} else if (e.tag === "bool-literal") {
		return e.value ? "true" : "false";
	} else if (e.tag === "not") {
		return "!" + displayExpr(e.operand);
	} else if (e.tag === "and") {
		return e.operands.length === 0 ? "true" : "(" + e.operands.map(displayExpr).join(" && ") + ")";
	} else if (e.tag === "or") {
		return e.operands.length === 0 ? "false" : "(" + e.operands.map(displayExpr).join(" || ") + ")";
	} else if (e.tag === "list-eq" || e.tag === "bool-eq") {
		return "(" + displayExpr(e.left) + " = " + displayExpr(e.right) + ")";
	}

	return unreachable(e, "displayExpr");
}

export function displayLocation(location: SourceLocation): string {
	return location.fileID + ":" + location.line + ":" + location.column;
}

/// `displayCallStack` lists the locations of a stack, innermost first.
export function displayCallStack(stack: CallStack): string {
	if (stack.tag === "top") {
		return "<top>";
	}
	return stackLocations(stack)
		.map(location => location === null ? "?" : displayLocation(location))
		.join(" <- ");
}

function displayAssuming(assuming: BoolExpr): string {
	if (assuming.tag === "bool-literal" && assuming.value) {
		return "";
	}
	return " assuming " + displayExpr(assuming);
}

export function displayConstraint<L>(c: Constraint<L>, showLocation?: (location: L) => string): string {
	let out: string;
	if (c.tag === "expr") {
		out = displayExpr(c.condition) + displayAssuming(c.assuming);
		if (c.origin === "asserted") {
			out += " [asserted]";
		}
	} else if (c.tag === "call") {
		out = (c.result === null ? "" : displayVar(c.result) + " = ")
			+ c.callee + "(" + c.args.map(displayOptional).join(", ") + ")"
			+ displayAssuming(c.assuming);
	} else {
		return unreachable(c, "displayConstraint");
	}

	if (showLocation !== undefined) {
		out += " @ " + showLocation(c.location);
	}
	return out;
}

export function displaySignature(summary: FunctionSummary): string {
	return "(" + summary.argExprs.map(displayOptional).join(", ") + ") -> " + displayOptional(summary.retExpr);
}

export function displaySummary(summary: FunctionSummary): string {
	if (summary.constraints.length === 0) {
		return displaySignature(summary);
	}
	const constraints = summary.constraints.map(c => displayConstraint(c));
	return "[" + constraints.join(", ") + "] => " + displaySignature(summary);
}

/// Like `displaySummary`, but puts each constraint on its own line once there
/// are more than four of them.
export function displaySummaryPretty(summary: FunctionSummary): string {
	if (summary.constraints.length <= 4) {
		return displaySummary(summary);
	}
	const constraints = summary.constraints.map(c => displayConstraint(c));
	return "[" + constraints.join(",\n ") + "] => " + displaySignature(summary);
}

import { DefaultMap, unreachable } from "./data.js";
import { displayExpr } from "./display.js";
import {
	BoolExpr,
	conjoin,
	equate,
	Expr,
	exprOfVar,
	substitute,
	substituteBool,
	TRUE,
	Var,
	VariableGenerator,
	varKey,
} from "./expr.js";
import {
	CallStack,
	Environment,
	FunctionSummary,
	InstantiatedConstraint,
	pushFrame,
	TOP,
} from "./summary.js";
import * as trace from "./trace.js";

/**
 * `instantiate` flattens the summary of the function `name` and of everything
 * it (transitively) calls into one constraint system.
 *
 * The parameters of `name` become free variables. Constraints are ordered
 * depth-first, following the order of the constraints within each summary.
 * An unknown `name` results in no constraints.
 *
 * Passing the same `variables` generator to several queries keeps their
 * outputs free of collisions, so that they can be merged.
 */
export function instantiate(
	name: string,
	environment: Environment,
	variables: VariableGenerator = new VariableGenerator(),
): InstantiatedConstraint[] {
	return new ConstraintInstantiator(name, environment, variables).constraints;
}

/// `Expansion` is a summary that is partway through being inlined.
interface Expansion {
	name: string,
	summary: FunctionSummary,
	subst: (v: Var) => Expr,
	stack: CallStack,
	condition: BoolExpr,

	/// The index of the next constraint of `summary` to instantiate.
	next: number,

	/// The call whose callee is currently being expanded.
	pending: { result: Var | null, condition: BoolExpr, stack: CallStack } | null,
}

/**
 * `ConstraintInstantiator` does all of its work when constructed. The result
 * is read from `constraints`.
 */
export class ConstraintInstantiator {
	readonly constraints: InstantiatedConstraint[] = [];

	/**
	 * The functions currently being expanded along the active call path. A
	 * call to one of these is not expanded again, which cuts both direct and
	 * mutual recursion.
	 */
	private expanding = new Set<string>();

	constructor(
		name: string,
		private readonly environment: Environment,
		private readonly variables: VariableGenerator,
	) {
		const summary = environment.get(name);
		if (summary === undefined) {
			trace.mark(["no summary for root function", name]);
			return;
		}

		// Nothing binds the root's parameters, so they are renamed into
		// variables of their own.
		const rootScope = this.makeSubstitution();
		const args = summary.argExprs.map(e => e === null ? null : substitute(e, rootScope));

		trace.start(["instantiate", name]);
		try {
			this.apply(name, args, TOP, TRUE);
		} finally {
			trace.stop();
		}
	}

	/**
	 * `makeSubstitution` creates a renaming scope: every variable is mapped to
	 * a fresh variable of the same sort. Repeated lookups of a variable within
	 * one scope agree, and no two scopes share a fresh variable.
	 */
	makeSubstitution(): (v: Var) => Expr {
		const renaming = new DefaultMap<Var, Expr>(v => exprOfVar(this.variables.fresh(v.sort)), varKey);
		return v => renaming.get(v);
	}

	/**
	 * `apply` inlines the summary of the function `name`, called with `args`
	 * at `stack` whenever `condition` holds.
	 *
	 * RETURNS the callee's return value, renamed into the caller's scope. It
	 * RETURNS null when the callee is unknown, when the call is recursive, or
	 * when the callee has no return value.
	 */
	apply(
		name: string,
		args: (Expr | null)[],
		stack: CallStack,
		condition: BoolExpr,
	): Expr | null {
		const root = this.enter(name, args, stack, condition);
		if (root === null) {
			return null;
		}

		// Nested calls are expanded from an explicit stack, so the depth of a
		// call chain is not limited by the JavaScript call stack.
		const expansions: Expansion[] = [root];
		try {
			while (true) {
				const top = expansions[expansions.length - 1];
				if (top.next === top.summary.constraints.length) {
					const returned = this.returnValue(top);
					expansions.pop();
					this.leave(top);
					if (expansions.length === 0) {
						return returned;
					}
					this.bindResult(expansions[expansions.length - 1], returned);
					continue;
				}

				const constraint = top.summary.constraints[top.next];
				top.next += 1;
				if (constraint.tag === "expr") {
					this.constraints.push({
						tag: "expr",
						condition: substituteBool(constraint.condition, top.subst),
						assuming: conjoin(top.condition, substituteBool(constraint.assuming, top.subst)),
						origin: constraint.origin,
						location: pushFrame(constraint.location, top.stack),
					});
				} else if (constraint.tag === "call") {
					const callCondition = conjoin(top.condition, substituteBool(constraint.assuming, top.subst));
					const callStack = pushFrame(constraint.location, top.stack);
					const callArgs = constraint.args.map(a => a === null ? null : substitute(a, top.subst));
					const callee = this.enter(constraint.callee, callArgs, callStack, callCondition);
					if (callee !== null) {
						top.pending = { result: constraint.result, condition: callCondition, stack: callStack };
						expansions.push(callee);
					}
				} else {
					return unreachable(constraint, "ConstraintInstantiator.apply");
				}
			}
		} finally {
			// Only non-empty when an error interrupted the expansion.
			for (let i = expansions.length - 1; i >= 0; i--) {
				this.leave(expansions[i]);
			}
		}
	}

	/**
	 * `enter` begins the expansion of a call, binding the callee's parameters
	 * to `args`.
	 *
	 * RETURNS null when the call is not expanded.
	 */
	private enter(
		name: string,
		args: (Expr | null)[],
		stack: CallStack,
		condition: BoolExpr,
	): Expansion | null {
		const summary = this.environment.get(name);
		if (summary === undefined) {
			trace.mark(["opaque call to", name]);
			return null;
		} else if (this.expanding.has(name)) {
			trace.mark(["recursive call to", name, "is not expanded"]);
			return null;
		} else if (summary.argExprs.length !== args.length) {
			throw new Error("ICE: `" + name + "` takes " + summary.argExprs.length
				+ " arguments but was applied to " + args.length);
		}

		const subst = this.makeSubstitution();

		// Only parameters constrained on both sides are bound to each other.
		for (let i = 0; i < summary.argExprs.length; i++) {
			const formal = summary.argExprs[i];
			const actual = args[i];
			if (formal === null || actual === null) {
				continue;
			}
			this.pushImplied(equate(substitute(formal, subst), actual), condition, stack);
		}

		this.expanding.add(name);
		trace.start(["expand", name]);
		return { name, summary, subst, stack, condition, next: 0, pending: null };
	}

	private leave(expansion: Expansion): void {
		trace.stop();
		this.expanding.delete(expansion.name);
	}

	private returnValue(expansion: Expansion): Expr | null {
		if (expansion.summary.retExpr === null) {
			return null;
		}
		const returned = substitute(expansion.summary.retExpr, expansion.subst);
		trace.mark("returns", () => displayExpr(returned));
		return returned;
	}

	/// `bindResult` binds the result variable of the call `caller` is waiting
	/// on to the value the callee returned.
	private bindResult(caller: Expansion, returned: Expr | null): void {
		const pending = caller.pending;
		caller.pending = null;
		if (pending === null) {
			throw new Error("ICE: `" + caller.name + "` is not waiting on a call");
		}
		if (returned !== null && pending.result !== null) {
			this.pushImplied(equate(caller.subst(pending.result), returned), pending.condition, pending.stack);
		}
	}

	private pushImplied(equality: BoolExpr | null, assuming: BoolExpr, location: CallStack): void {
		if (equality === null) {
			return;
		}
		this.constraints.push({
			tag: "expr",
			condition: equality,
			assuming,
			origin: "implied",
			location,
		});
	}
}

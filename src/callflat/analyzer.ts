import { Warning } from "./diagnostics.js";
import { instantiate } from "./instantiate.js";
import { FunctionSummary, InstantiatedConstraint, StructDecl, TypeEnvironment } from "./summary.js";
import * as trace from "./trace.js";
import { warnAboutUnresolvedAsserts } from "./unresolved.js";

/**
 * `Abstractor` is the per-function abstraction pass, which turns a function
 * body of type `F` into a `FunctionSummary`.
 */
export interface Abstractor<F> {
	nameOf(fn: F): string,

	/**
	 * `abstract` summarizes one function. The layouts of the structs of the
	 * module are available in `types`. Problems found while summarizing are
	 * reported through `warn`.
	 */
	abstract(fn: F, types: TypeEnvironment, warn: (warning: Warning) => void): FunctionSummary,
}

export interface CheckResult {
	constraints: InstantiatedConstraint[],
	warnings: Warning[],
}

/**
 * `Analyzer` builds the environment of a module, one function at a time, and
 * checks entry functions against it.
 */
export class Analyzer<F> {
	readonly environment = new Map<string, FunctionSummary>();
	readonly typeEnvironment = new Map<string, StructDecl>();

	/// The warnings raised while abstracting each function.
	readonly warnings = new Map<string, Warning[]>();

	constructor(private abstractor: Abstractor<F>) { }

	/// `declareStruct` makes the layout of a struct available to the
	/// functions analyzed afterwards.
	declareStruct(name: string, fields: StructDecl): void {
		this.typeEnvironment.set(name, fields);
	}

	analyzeModule(functions: Iterable<F>): void {
		for (const fn of functions) {
			this.analyze(fn);
		}
	}

	/// `analyze` replaces the summary of `fn`. When abstraction throws, `fn`
	/// is left without a summary.
	analyze(fn: F): void {
		const name = this.abstractor.nameOf(fn);
		const warnings: Warning[] = [];
		this.environment.delete(name);
		trace.start(["abstract", name]);
		try {
			const summary = this.abstractor.abstract(fn, this.typeEnvironment, w => warnings.push(w));
			this.environment.set(name, summary);
		} finally {
			trace.stop();
			this.warnings.set(name, warnings);
		}
	}

	check(entry: string): CheckResult {
		const constraints = instantiate(entry, this.environment);
		return {
			constraints,
			warnings: warnAboutUnresolvedAsserts(constraints),
		};
	}
}

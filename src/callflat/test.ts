import * as util from "util";
import * as analyzer_tests from "./analyzer_tests.js";
import * as cmd_tests from "./cmd_tests.js";
import * as data_tests from "./data_tests.js";
import * as decode_tests from "./decode_tests.js";
import * as display_tests from "./display_tests.js";
import * as expr_tests from "./expr_tests.js";
import * as instantiate_tests from "./instantiate_tests.js";
import * as trace_tests from "./trace_tests.js";
import * as unresolved_tests from "./unresolved_tests.js";

export type Run = PassRun | FailRun;

export interface PassRun {
	name: string,
	type: "pass",
	elapsedMillis: number,
}

export interface FailRun {
	name: string,
	type: "fail",
	exception: unknown,
	elapsedMillis: number,
}

export class TestRunner {
	runs: Run[] = [];

	constructor(private testNameFilter?: string) { }

	runTest(name: string, body: () => void) {
		if (name.indexOf(this.testNameFilter || "") < 0) {
			return;
		}

		const beforeMillis = Date.now();
		try {
			body();
			this.runs.push({ name, type: "pass", elapsedMillis: Date.now() - beforeMillis });
		} catch (e) {
			this.runs.push({ name, type: "fail", exception: e, elapsedMillis: Date.now() - beforeMillis });
		}
	}

	runTests(title: string, obj: { [k: string]: () => void }) {
		for (const k in obj) {
			this.runTest(title + "." + k, obj[k]);
		}
	}

	printReport(): number {
		const passed: PassRun[] = [];
		const failed: FailRun[] = [];
		for (const run of this.runs) {
			if (run.type === "pass") {
				passed.push(run);
			} else {
				failed.push(run);
			}
		}

		for (const pass of passed) {
			console.log("  pass  " + pass.name);
		}

		for (const failure of failed) {
			console.log("\u{25be}".repeat(80));
			console.log("  FAIL! " + failure.name);
			const indent = "      ";
			let exception = failure.exception instanceof Error
				? String(failure.exception.stack)
				: String(failure.exception);
			if (typeof failure.exception === "object" && failure.exception !== null) {
				exception = `(${failure.exception.constructor.name}) ${exception}`;
			}
			console.log(indent + exception.replace(/\t/g, "    ").replace(/\n/g, "\n" + indent));
			console.log("\u{25b4}".repeat(80));
		}

		console.log("");
		console.log("Passed: " + passed.length + ".");
		console.log("Failed: " + failed.length + (failed.length == 0 ? "." : "!"));

		if (this.runs.length !== 0) {
			let slowest = this.runs[0];
			for (const run of this.runs) {
				if (run.elapsedMillis > slowest.elapsedMillis) {
					slowest = run;
				}
			}
			console.log("Slowest: " + slowest.name + " took " + slowest.elapsedMillis + " ms");
		}

		if (passed.length === 0 || failed.length !== 0) {
			return 1;
		}
		return 0;
	}
}

type Comparison = { eq: true }
	| { eq: false, path: unknown[], expectedValue?: unknown, description?: string };

/**
 * `Spec` matches values by a predicate instead of by deep equality. It may
 * appear anywhere inside an expected value.
 */
export class Spec {
	constructor(readonly match: (test: unknown) => Comparison) { }
}

export function specPredicate(description: string, predicate: (test: unknown) => boolean): Spec {
	return new Spec(test => predicate(test)
		? { eq: true }
		: { eq: false, path: [], expectedValue: "<" + description + ">", description });
}

/// `specSame` matches only the very same object (by reference).
export function specSame(expected: object): Spec {
	return specPredicate("the same object", test => test === expected);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

function deepEqual(a: unknown, b: unknown): Comparison {
	if (b instanceof Spec) {
		return b.match(a);
	} else if (a === b) {
		return { eq: true };
	} else if (typeof a !== typeof b) {
		return { eq: false, path: [], expectedValue: b };
	} else if (a instanceof Set && b instanceof Set) {
		for (const v of a) {
			if (!b.has(v)) {
				return { eq: false, path: [v] };
			}
		}
		for (const v of b) {
			if (!a.has(v)) {
				return { eq: false, path: [v] };
			}
		}
		return { eq: true };
	} else if (a instanceof Set || b instanceof Set) {
		return { eq: false, path: [] };
	} else if (a instanceof Map && b instanceof Map) {
		for (const [k, v] of a) {
			if (!b.has(k)) {
				return { eq: false, path: [k] };
			}
			const cmp = deepEqual(v, b.get(k));
			if (!cmp.eq) {
				return { ...cmp, path: [k, ...cmp.path] };
			}
		}
		for (const k of b.keys()) {
			if (!a.has(k)) {
				return { eq: false, path: [k] };
			}
		}
		return { eq: true };
	} else if (a instanceof Map || b instanceof Map) {
		return { eq: false, path: [] };
	} else if (Array.isArray(a) !== Array.isArray(b)) {
		return { eq: false, path: [], expectedValue: b };
	} else if (isRecord(a) && isRecord(b)) {
		const checked = new Set<string>();
		for (const k in a) {
			const cmp = deepEqual(a[k], b[k]);
			if (!cmp.eq) {
				return { ...cmp, path: [k, ...cmp.path] };
			}
			checked.add(k);
		}
		for (const k in b) {
			if (!checked.has(k)) {
				return { eq: false, path: [k] };
			}
		}
		return { eq: true };
	}
	return { eq: false, path: [], expectedValue: b };
}

export function assert<A>(a: A | null, op: "is not null"): asserts a is A;
export function assert(a: unknown, op: "is equal to", b: unknown): void;
export function assert(a: () => unknown, op: "throws", expected: unknown): void;
export function assert(a: () => unknown, op: "throws error", pattern: RegExp): void;

export function assert(...args: [unknown, "is equal to", unknown]
	| [() => unknown, "throws", unknown]
	| [() => unknown, "throws error", RegExp]
	| [unknown, "is not null"]) {
	if (args[1] === "is equal to") {
		const [a, _, b] = args;
		const cmp = deepEqual(a, b);
		if (!cmp.eq) {
			const sa = util.inspect(a, { depth: 16, colors: true });
			const sb = util.inspect("expectedValue" in cmp ? cmp.expectedValue : b, { depth: 16, colors: true });
			const expected = cmp.description !== undefined ? " (" + cmp.description + ")" : "";
			throw new Error(`Expected \n${sa}\nto be equal to\n${sb}${expected}\nbut found difference in path \`${JSON.stringify(cmp.path)}\``);
		}
	} else if (args[1] === "throws") {
		// Diagnostics are thrown as values that are not `Error`s. An `Error`
		// is a bug, and so is rethrown.
		const [f, _, expected] = args;
		let threw = false;
		try {
			f();
		} catch (e) {
			if (e instanceof Error) {
				throw e;
			}
			assert(e, "is equal to", expected);
			threw = true;
		}
		if (!threw) {
			throw new Error(`Expected a value to be thrown.`);
		}
	} else if (args[1] === "throws error") {
		const [f, _, pattern] = args;
		let message: string | null = null;
		try {
			f();
		} catch (e) {
			if (!(e instanceof Error)) {
				throw e;
			}
			message = e.message;
		}
		if (message === null) {
			throw new Error(`Expected an error matching ${pattern} to be thrown.`);
		} else if (!pattern.test(message)) {
			throw new Error(`Expected an error matching ${pattern}, but got \`${message}\`.`);
		}
	} else if (args[1] === "is not null") {
		const a = args[0];
		if (a === null) {
			throw new Error(`Expected a value that is not null.`);
		}
	} else {
		const _: never = args;
		throw new Error("unhandled assertion type");
	}
}

const testRunner = new TestRunner(process.argv[2]);

testRunner.runTests("data_tests", data_tests.tests);
testRunner.runTests("expr_tests", expr_tests.tests);
testRunner.runTests("display_tests", display_tests.tests);
testRunner.runTests("instantiate_tests", instantiate_tests.tests);
testRunner.runTests("unresolved_tests", unresolved_tests.tests);
testRunner.runTests("decode_tests", decode_tests.tests);
testRunner.runTests("analyzer_tests", analyzer_tests.tests);
testRunner.runTests("trace_tests", trace_tests.tests);
testRunner.runTests("cmd_tests", cmd_tests.tests);
process.exitCode = testRunner.printReport();

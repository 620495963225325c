import { FunctionRedefinedErr, MalformedSummaryErr } from "./diagnostics.js";
import { BoolExpr, Expr, IntExpr, ListExpr, Sort, Var } from "./expr.js";
import { FunctionSummary, SourceLocation, StructDecl, SummaryConstraint } from "./summary.js";

/// `SummaryFile` is the content of one summary file: the summaries of some
/// functions, and the layouts of the structs they use.
export interface SummaryFile {
	fileID: string,
	functions: Map<string, FunctionSummary>,
	structs: Map<string, StructDecl>,
}

type Path = (string | number)[];

const SORTS = ["int", "list", "bool"] as const;
const INT_OPS = ["+", "-", "*", "/"] as const;
const COMPARISONS = ["=", "<", "<=", ">", ">="] as const;
const ORIGINS = ["asserted", "implied"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * `Decoder` checks the shape of a parsed summary file, throwing a
 * `MalformedSummaryErr` at the first value that does not fit.
 */
class Decoder {
	constructor(private fileID: string) { }

	private fail(path: Path, expected: string): never {
		throw new MalformedSummaryErr({ fileID: this.fileID, path, expected });
	}

	private record(value: unknown, path: Path): Record<string, unknown> {
		if (!isRecord(value)) {
			return this.fail(path, "an object");
		}
		return value;
	}

	private array(value: unknown, path: Path): unknown[] {
		if (!Array.isArray(value)) {
			return this.fail(path, "an array");
		}
		return value;
	}

	private string(value: unknown, path: Path): string {
		if (typeof value !== "string") {
			return this.fail(path, "a string");
		}
		return value;
	}

	private integer(value: unknown, path: Path): number {
		if (typeof value !== "number" || !Number.isInteger(value)) {
			return this.fail(path, "an integer");
		}
		return value;
	}

	private boolean(value: unknown, path: Path): boolean {
		if (typeof value !== "boolean") {
			return this.fail(path, "a boolean");
		}
		return value;
	}

	private oneOf<T extends string>(value: unknown, options: readonly T[], path: Path): T {
		const found = options.find(option => option === value);
		if (found === undefined) {
			return this.fail(path, "one of " + options.map(x => "`" + x + "`").join(", "));
		}
		return found;
	}

	private optional<T>(value: unknown, path: Path, decode: (value: unknown, path: Path) => T): T | null {
		if (value === null) {
			return null;
		}
		return decode(value, path);
	}

	variable(value: unknown, path: Path, sort?: Sort): Var {
		const object = this.record(value, path);
		const decodedSort = this.oneOf(object["sort"], SORTS, [...path, "sort"]);
		if (sort !== undefined && decodedSort !== sort) {
			return this.fail([...path, "sort"], "`" + sort + "`");
		}
		return { sort: decodedSort, id: this.integer(object["id"], [...path, "id"]) };
	}

	intExpr(value: unknown, path: Path): IntExpr {
		const object = this.record(value, path);
		const tag = object["tag"];
		if (tag === "int-var") {
			return { tag, variable: this.variable(object["variable"], [...path, "variable"], "int") };
		} else if (tag === "int-literal") {
			return { tag, value: this.integer(object["value"], [...path, "value"]) };
		} else if (tag === "length") {
			return { tag, list: this.listExpr(object["list"], [...path, "list"]) };
		} else if (tag === "element") {
			return {
				tag,
				index: this.integer(object["index"], [...path, "index"]),
				list: this.listExpr(object["list"], [...path, "list"]),
			};
		} else if (tag === "int-op") {
			return {
				tag,
				op: this.oneOf(object["op"], INT_OPS, [...path, "op"]),
				left: this.intExpr(object["left"], [...path, "left"]),
				right: this.intExpr(object["right"], [...path, "right"]),
			};
		}
		return this.fail([...path, "tag"], "an integer expression");
	}

	listExpr(value: unknown, path: Path): ListExpr {
		const object = this.record(value, path);
		const tag = object["tag"];
		if (tag === "list-var") {
			return { tag, variable: this.variable(object["variable"], [...path, "variable"], "list") };
		} else if (tag === "list-literal") {
			const elementsPath = [...path, "elements"];
			const elements = this.array(object["elements"], elementsPath)
				.map((e, i) => this.optional(e, [...elementsPath, i], (v, p) => this.intExpr(v, p)));
			return { tag, elements };
		} else if (tag === "broadcast") {
			return {
				tag,
				left: this.listExpr(object["left"], [...path, "left"]),
				right: this.listExpr(object["right"], [...path, "right"]),
			};
		}
		return this.fail([...path, "tag"], "a list expression");
	}

	boolExpr(value: unknown, path: Path): BoolExpr {
		const object = this.record(value, path);
		const tag = object["tag"];
		if (tag === "bool-var") {
			return { tag, variable: this.variable(object["variable"], [...path, "variable"], "bool") };
		} else if (tag === "bool-literal") {
			return { tag, value: this.boolean(object["value"], [...path, "value"]) };
		} else if (tag === "not") {
			return { tag, operand: this.boolExpr(object["operand"], [...path, "operand"]) };
		} else if (tag === "and" || tag === "or") {
			const operandsPath = [...path, "operands"];
			const operands = this.array(object["operands"], operandsPath)
				.map((e, i) => this.boolExpr(e, [...operandsPath, i]));
			return { tag, operands };
		} else if (tag === "int-compare") {
			return {
				tag,
				op: this.oneOf(object["op"], COMPARISONS, [...path, "op"]),
				left: this.intExpr(object["left"], [...path, "left"]),
				right: this.intExpr(object["right"], [...path, "right"]),
			};
		} else if (tag === "list-eq") {
			return {
				tag,
				left: this.listExpr(object["left"], [...path, "left"]),
				right: this.listExpr(object["right"], [...path, "right"]),
			};
		} else if (tag === "bool-eq") {
			return {
				tag,
				left: this.boolExpr(object["left"], [...path, "left"]),
				right: this.boolExpr(object["right"], [...path, "right"]),
			};
		}
		return this.fail([...path, "tag"], "a boolean expression");
	}

	expr(value: unknown, path: Path): Expr {
		const object = this.record(value, path);
		const tag = object["tag"];
		if (tag === "int-var" || tag === "int-literal" || tag === "length" || tag === "element" || tag === "int-op") {
			return this.intExpr(object, path);
		} else if (tag === "list-var" || tag === "list-literal" || tag === "broadcast") {
			return this.listExpr(object, path);
		} else if (tag === "bool-var" || tag === "bool-literal" || tag === "not" || tag === "and" || tag === "or"
			|| tag === "int-compare" || tag === "list-eq" || tag === "bool-eq") {
			return this.boolExpr(object, path);
		}
		return this.fail([...path, "tag"], "an expression");
	}

	location(value: unknown, path: Path): SourceLocation {
		const object = this.record(value, path);
		return {
			fileID: this.string(object["fileID"], [...path, "fileID"]),
			line: this.integer(object["line"], [...path, "line"]),
			column: this.integer(object["column"], [...path, "column"]),
		};
	}

	constraint(value: unknown, path: Path): SummaryConstraint {
		const object = this.record(value, path);
		const tag = object["tag"];
		const assuming = this.boolExpr(object["assuming"], [...path, "assuming"]);
		const location = this.optional(object["location"], [...path, "location"], (v, p) => this.location(v, p));
		if (tag === "expr") {
			return {
				tag,
				condition: this.boolExpr(object["condition"], [...path, "condition"]),
				assuming,
				origin: this.oneOf(object["origin"], ORIGINS, [...path, "origin"]),
				location,
			};
		} else if (tag === "call") {
			const argsPath = [...path, "args"];
			return {
				tag,
				callee: this.string(object["callee"], [...path, "callee"]),
				args: this.array(object["args"], argsPath)
					.map((e, i) => this.optional(e, [...argsPath, i], (v, p) => this.expr(v, p))),
				result: this.optional(object["result"], [...path, "result"], (v, p) => this.variable(v, p)),
				assuming,
				location,
			};
		}
		return this.fail([...path, "tag"], "`expr` or `call`");
	}

	summary(value: unknown, path: Path): FunctionSummary {
		const object = this.record(value, path);
		const argsPath = [...path, "argExprs"];
		const constraintsPath = [...path, "constraints"];
		return {
			argExprs: this.array(object["argExprs"], argsPath)
				.map((e, i) => this.optional(e, [...argsPath, i], (v, p) => this.expr(v, p))),
			retExpr: this.optional(object["retExpr"], [...path, "retExpr"], (v, p) => this.expr(v, p)),
			constraints: this.array(object["constraints"], constraintsPath)
				.map((e, i) => this.constraint(e, [...constraintsPath, i])),
		};
	}

	struct(value: unknown, path: Path): StructDecl {
		return this.array(value, path).map((e, i) => {
			const field = this.record(e, [...path, i]);
			return {
				name: this.string(field["name"], [...path, i, "name"]),
				type: this.string(field["type"], [...path, i, "type"]),
			};
		});
	}

	file(value: unknown): SummaryFile {
		const object = this.record(value, []);
		const functions = new Map<string, FunctionSummary>();
		const functionsObject = this.record(object["functions"], ["functions"]);
		for (const name in functionsObject) {
			functions.set(name, this.summary(functionsObject[name], ["functions", name]));
		}

		const structs = new Map<string, StructDecl>();
		if (object["structs"] !== undefined) {
			const structsObject = this.record(object["structs"], ["structs"]);
			for (const name in structsObject) {
				structs.set(name, this.struct(structsObject[name], ["structs", name]));
			}
		}
		return { fileID: this.fileID, functions, structs };
	}
}

/// `decodeSummaryFile` checks the shape of already-parsed JSON.
export function decodeSummaryFile(json: unknown, fileID: string): SummaryFile | MalformedSummaryErr {
	try {
		return new Decoder(fileID).file(json);
	} catch (e) {
		if (e instanceof MalformedSummaryErr) {
			return e;
		}
		throw e;
	}
}

export function parseSummaryFile(text: string, fileID: string): SummaryFile | MalformedSummaryErr {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (e) {
		if (e instanceof SyntaxError) {
			return new MalformedSummaryErr({ fileID, path: [], expected: "valid JSON (" + e.message + ")" });
		}
		throw e;
	}
	return decodeSummaryFile(json, fileID);
}

/// `mergeSummaryFiles` combines the functions and structs of several files.
/// A function may be summarized by only one file.
export function mergeSummaryFiles(files: SummaryFile[]): SummaryFile | FunctionRedefinedErr {
	const functions = new Map<string, FunctionSummary>();
	const structs = new Map<string, StructDecl>();
	const definedIn = new Map<string, string>();
	for (const file of files) {
		for (const [name, summary] of file.functions) {
			const firstFileID = definedIn.get(name);
			if (firstFileID !== undefined) {
				return new FunctionRedefinedErr({ name, firstFileID, secondFileID: file.fileID });
			}
			definedIn.set(name, file.fileID);
			functions.set(name, summary);
		}
		for (const [name, fields] of file.structs) {
			structs.set(name, fields);
		}
	}
	return {
		fileID: files.map(file => file.fileID).join(","),
		functions,
		structs,
	};
}

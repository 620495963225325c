import * as fs from "fs";
import { mergeSummaryFiles, parseSummaryFile, SummaryFile } from "./decode.js";
import {
	displayError,
	displayWarning,
	ErrorElement,
	FunctionRedefinedErr,
	MalformedSummaryErr,
	NoSuchFunctionErr,
} from "./diagnostics.js";
import { displayCallStack, displayConstraint, displaySummaryPretty } from "./display.js";
import { instantiate } from "./instantiate.js";
import * as trace from "./trace.js";
import { warnAboutUnresolvedAsserts } from "./unresolved.js";

/// `Output` is where commands print. It is `console` outside of tests.
export interface Output {
	log(line: string): void,
	error(line: string): void,
}

interface Options {
	entry: string | null,
	tracePath: string | null,
	verbose: boolean,
	sourcePaths: string[],
}

export function processCommands(args: string[], out: Output = console): number {
	if (args[0] === "instantiate" || args[0] === "check") {
		const options = parseOptions(args.slice(1), true, out);
		if (options === null) {
			return 1;
		}
		return args[0] === "instantiate"
			? processInstantiateCommand(options, out)
			: processCheckCommand(options, out);
	} else if (args[0] === "show") {
		const options = parseOptions(args.slice(1), false, out);
		if (options === null) {
			return 1;
		}
		return processShowCommand(options, out);
	}

	out.error("Unknown command `" + args[0] + "`");
	out.error("Supported commands:");
	out.error("\tinstantiate <entry> [--trace=<file>] [--verbose] - <summary files>");
	out.error("\tcheck <entry> [--trace=<file>] [--verbose] - <summary files>");
	out.error("\tshow - <summary files>");
	return 1;
}

function parseOptions(args: string[], takesEntry: boolean, out: Output): Options | null {
	const options: Options = { entry: null, tracePath: null, verbose: false, sourcePaths: [] };
	let i = 0;
	if (takesEntry) {
		if (args[0] === undefined || args[0] === "-" || args[0].startsWith("--")) {
			out.error("Expected an entry function name");
			return null;
		}
		options.entry = args[0];
		i = 1;
	}

	for (; i < args.length && args[i] !== "-"; i++) {
		const arg = args[i];
		if (arg.startsWith("--trace=")) {
			options.tracePath = arg.substring("--trace=".length);
		} else if (arg === "--verbose") {
			options.verbose = true;
		} else {
			out.error("Unknown option `" + arg + "`");
			return null;
		}
	}

	if (args[i] !== "-") {
		out.error("Expected `-` before the summary files");
		return null;
	}
	options.sourcePaths = args.slice(i + 1);
	if (options.sourcePaths.length === 0) {
		out.error("Expected at least one summary file");
		return null;
	}
	return options;
}

function printError(e: { message: ErrorElement[] }, out: Output): void {
	out.error(displayError(e));
}

function loadSummaryFiles(sourcePaths: string[], out: Output): SummaryFile | number {
	if (new Set(sourcePaths).size !== sourcePaths.length) {
		out.error("Do not repeat summary files");
		return 1;
	}

	const files = [];
	for (const sourcePath of sourcePaths) {
		let content: string;
		try {
			content = fs.readFileSync(sourcePath, { encoding: "utf-8" });
		} catch (e) {
			out.error("Cannot read `" + sourcePath + "`: " + (e instanceof Error ? e.message : String(e)));
			return 2;
		}
		const file = parseSummaryFile(content, sourcePath);
		if (file instanceof MalformedSummaryErr) {
			printError(file, out);
			return 2;
		}
		files.push(file);
	}

	const merged = mergeSummaryFiles(files);
	if (merged instanceof FunctionRedefinedErr) {
		printError(merged, out);
		return 3;
	}
	return merged;
}

/// `traced` runs `body` inside a fresh trace, which is written to the
/// requested file afterwards.
function traced(options: Options, title: string, body: () => number): number {
	if (options.tracePath === null) {
		return body();
	}

	trace.clear(title);
	trace.setVerbose(options.verbose);
	try {
		return body();
	} finally {
		trace.stopRecording();
		const serialized = trace.serialize(trace.publish());
		fs.writeFileSync(options.tracePath, JSON.stringify(serialized, null, "\t"));
	}
}

function processInstantiateCommand(options: Options, out: Output): number {
	const loaded = loadSummaryFiles(options.sourcePaths, out);
	if (typeof loaded === "number") {
		return loaded;
	}
	const entry = options.entry || "";
	if (!loaded.functions.has(entry)) {
		printError(new NoSuchFunctionErr({ name: entry }), out);
		return 3;
	}

	return traced(options, "instantiate " + entry, () => {
		for (const constraint of instantiate(entry, loaded.functions)) {
			out.log(displayConstraint(constraint, displayCallStack));
		}
		return 0;
	});
}

function processCheckCommand(options: Options, out: Output): number {
	const loaded = loadSummaryFiles(options.sourcePaths, out);
	if (typeof loaded === "number") {
		return loaded;
	}
	const entry = options.entry || "";
	if (!loaded.functions.has(entry)) {
		printError(new NoSuchFunctionErr({ name: entry }), out);
		return 3;
	}

	return traced(options, "check " + entry, () => {
		const warnings = warnAboutUnresolvedAsserts(instantiate(entry, loaded.functions));
		for (const warning of warnings) {
			out.error(displayWarning(warning));
		}
		return warnings.length === 0 ? 0 : 5;
	});
}

function processShowCommand(options: Options, out: Output): number {
	const loaded = loadSummaryFiles(options.sourcePaths, out);
	if (typeof loaded === "number") {
		return loaded;
	}
	for (const [name, summary] of loaded.functions) {
		out.log(name + ": " + displaySummaryPretty(summary));
	}
	return 0;
}

import { displayLocation } from "./display.js";
import { SourceLocation } from "./summary.js";

export type ErrorElement = string | SourceLocation;

/// `Warning` is a non-fatal finding about the analyzed code.
export interface Warning {
	message: string,
	location: SourceLocation,
}

export const UNPARSED_ASSERT_MESSAGE = "Failed to parse the assert condition";

export function displayWarning(warning: Warning): string {
	return displayLocation(warning.location) + ": warning: " + warning.message;
}

/// `DiagnosticErr` is a problem with the input given to the analyzer, as
/// opposed to an internal error (which is thrown as an `Error`).
export class DiagnosticErr {
	constructor(public message: ErrorElement[]) { }

	toString() {
		return JSON.stringify(this.message);
	}
}

export class MalformedSummaryErr extends DiagnosticErr {
	constructor(args: { fileID: string, path: (string | number)[], expected: string }) {
		const path = args.path.map(x => typeof x === "number" ? "[" + x + "]" : "." + x).join("");
		super([
			"The summary file `" + args.fileID + "` is malformed: expected " + args.expected
			+ " at `$" + path + "`",
		]);
	}
}

export class FunctionRedefinedErr extends DiagnosticErr {
	constructor(args: { name: string, firstFileID: string, secondFileID: string }) {
		super([
			"The function `" + args.name + "` was summarized for a second time in `" + args.secondFileID + "`",
			"The first summary was in `" + args.firstFileID + "`",
		]);
	}
}

export class NoSuchFunctionErr extends DiagnosticErr {
	constructor(args: { name: string }) {
		super([
			"The function `" + args.name + "` has no summary",
		]);
	}
}

/// `displayError` renders each element of the message on its own line.
export function displayError(e: { message: ErrorElement[] }): string {
	const lines: string[] = [];
	for (const element of e.message) {
		if (typeof element === "string") {
			lines.push(element);
		} else {
			lines.push("\tat " + displayLocation(element));
		}
	}
	return lines.join("\n");
}

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { Output, processCommands } from "./cmd.js";
import { assert, specPredicate } from "./test.js";

const TESTDATA = fileURLToPath(new URL("./testdata/", import.meta.url));
const NETWORK = path.join(TESTDATA, "network.json");
const REDEFINED = path.join(TESTDATA, "redefined.json");
const MALFORMED = path.join(TESTDATA, "malformed.json");
const CLEAN = path.join(TESTDATA, "clean.json");

class CapturedOutput implements Output {
	logs: string[] = [];
	errors: string[] = [];

	log(line: string): void {
		this.logs.push(line);
	}

	error(line: string): void {
		this.errors.push(line);
	}
}

function run(args: string[]): { code: number, logs: string[], errors: string[] } {
	const out = new CapturedOutput();
	const code = processCommands(args, out);
	return { code, logs: out.logs, errors: out.errors };
}

export const tests = {
	"instantiate-prints-constraints-with-call-stacks"() {
		assert(run(["instantiate", "forward", "-", NETWORK]), "is equal to", {
			code: 0,
			logs: [
				"(l1 = l0) @ <top>",
				"(l2 = l1) @ net.src:3:5",
				"(len(l2) = 2) [asserted] @ net.src:10:3 <- net.src:3:5",
				"b3 [asserted] @ net.src:11:3 <- net.src:3:5",
			],
			errors: [],
		});
	},
	"check-reports-unresolved-asserts"() {
		assert(run(["check", "forward", "-", NETWORK]), "is equal to", {
			code: 5,
			logs: [],
			errors: ["net.src:11:3: warning: Failed to parse the assert condition"],
		});
	},
	"check-without-findings-succeeds"() {
		assert(run(["check", "noop", "-", CLEAN]), "is equal to", { code: 0, logs: [], errors: [] });
	},
	"show-prints-every-summary"() {
		assert(run(["show", "-", NETWORK, CLEAN]), "is equal to", {
			code: 0,
			logs: [
				"forward: [check(l0)] => (l0) -> *",
				"check: [(len(l0) = 2) [asserted], b1 [asserted]] => (l0) -> *",
				"noop: () -> *",
			],
			errors: [],
		});
	},
	"unknown-entry"() {
		assert(run(["instantiate", "nothing", "-", NETWORK]), "is equal to", {
			code: 3,
			logs: [],
			errors: ["The function `nothing` has no summary"],
		});
	},
	"redefined-function"() {
		assert(run(["show", "-", NETWORK, REDEFINED]), "is equal to", {
			code: 3,
			logs: [],
			errors: [
				"The function `check` was summarized for a second time in `" + REDEFINED + "`\n"
				+ "The first summary was in `" + NETWORK + "`",
			],
		});
	},
	"malformed-file"() {
		assert(run(["check", "f", "-", MALFORMED]), "is equal to", {
			code: 2,
			logs: [],
			errors: ["The summary file `" + MALFORMED + "` is malformed: expected an array at `$.functions.f.argExprs`"],
		});
	},
	"unreadable-file"() {
		const missing = path.join(TESTDATA, "missing.json");
		const result = run(["show", "-", missing]);
		assert(result.code, "is equal to", 2);
		assert(result.errors.length, "is equal to", 1);
		assert(result.errors[0].startsWith("Cannot read `" + missing + "`: "), "is equal to", true);
	},
	"usage-errors"() {
		assert(run(["frobnicate"]).code, "is equal to", 1);
		assert(run(["frobnicate"]).errors[0], "is equal to", "Unknown command `frobnicate`");
		assert(run(["instantiate", "-", NETWORK]), "is equal to", {
			code: 1,
			logs: [],
			errors: ["Expected an entry function name"],
		});
		assert(run(["instantiate", "forward", NETWORK]).errors, "is equal to", ["Unknown option `" + NETWORK + "`"]);
		assert(run(["instantiate", "forward"]).errors, "is equal to", ["Expected `-` before the summary files"]);
		assert(run(["instantiate", "forward", "--bogus", "-", NETWORK]).errors, "is equal to", ["Unknown option `--bogus`"]);
		assert(run(["show", "-"]).errors, "is equal to", ["Expected at least one summary file"]);
		assert(run(["show", "-", NETWORK, NETWORK]), "is equal to", {
			code: 1,
			logs: [],
			errors: ["Do not repeat summary files"],
		});
	},
	"trace-is-written-on-request"() {
		const anyNumber = specPredicate("a number", x => typeof x === "number");
		const directory = fs.mkdtempSync(path.join(os.tmpdir(), "callflat-"));
		try {
			const tracePath = path.join(directory, "trace.json");
			const result = run(["instantiate", "forward", "--trace=" + tracePath, "-", NETWORK]);
			assert(result.code, "is equal to", 0);

			const written: unknown = JSON.parse(fs.readFileSync(tracePath, { encoding: "utf-8" }));
			assert(written, "is equal to", {
				title: ["instantiate forward"],
				start: anyNumber,
				end: anyNumber,
				children: [{
					title: ["instantiate", "forward"],
					start: anyNumber,
					end: anyNumber,
					children: specPredicate("a list", x => Array.isArray(x)),
				}],
			});
		} finally {
			fs.rmSync(directory, { recursive: true, force: true });
		}
	},
};

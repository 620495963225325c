import { instantiate } from "./instantiate.js";
import { FunctionSummary } from "./summary.js";
import { assert } from "./test.js";
import * as trace from "./trace.js";

/// `shape` drops the timings of a trace, which vary from run to run.
function shape(t: trace.SerializedTrace): unknown {
	if (t.children === undefined) {
		return t.details === undefined || t.details === null ? t.title : [t.title, t.details];
	}
	return [t.title, t.children.map(shape)];
}

export const tests = {
	"Stopwatch-excludes-paused-time"() {
		let now = 10;
		const stopwatch = new trace.Stopwatch(() => now);
		now = 15;
		assert(stopwatch.measureMs(), "is equal to", 5);

		stopwatch.pause();
		now = 100;
		assert(stopwatch.measureMs(), "is equal to", 5);

		stopwatch.resume();
		now = 103;
		assert(stopwatch.measureMs(), "is equal to", 8);
	},
	"records-branches-and-events"() {
		trace.clear("trace test");
		trace.setVerbose(false);
		trace.start(["expand", "f"]);
		trace.mark("returns", () => "i3");
		trace.mark(["opaque call to", "h", 2]);
		trace.stop();
		trace.stopRecording();

		const expand = [["expand", "f"], [
			[["returns"], "(details skipped; tracing is not verbose)"],
			["opaque call to", "h", "2"],
		]];
		assert(shape(trace.serialize(trace.publish())), "is equal to", [["trace test"], [expand]]);
	},
	"verbose-tracing-computes-details"() {
		trace.clear("trace test");
		trace.setVerbose(true);
		try {
			trace.mark("returns", () => "i3");
		} finally {
			trace.setVerbose(false);
			trace.stopRecording();
		}

		assert(shape(trace.serialize(trace.publish())), "is equal to", [["trace test"], [[["returns"], "i3"]]]);
	},
	"stop-checks-the-title"() {
		trace.clear("trace test");
		trace.start("a");
		assert(() => trace.stop("b"), "throws error", /mismatched trace/);
		trace.stop("a");
		assert(() => trace.stop(), "throws error", /no branch open/);
		trace.stopRecording();
	},
	"instantiation-is-traced"() {
		const env = new Map<string, FunctionSummary>([
			["f", {
				argExprs: [],
				retExpr: null,
				constraints: [{
					tag: "call",
					callee: "h",
					args: [],
					result: null,
					assuming: { tag: "bool-literal", value: true },
					location: null,
				}],
			}],
		]);

		trace.clear("trace test");
		instantiate("f", env);
		trace.stopRecording();

		const expand = [["expand", "f"], [["opaque call to", "h"]]];
		const root = [["instantiate", "f"], [expand]];
		assert(shape(trace.serialize(trace.publish())), "is equal to", [["trace test"], [root]]);
	},
	"untraced-queries-record-nothing"() {
		const env = new Map<string, FunctionSummary>([
			["f", { argExprs: [], retExpr: null, constraints: [] }],
		]);

		trace.clear("trace test");
		trace.stopRecording();
		for (let i = 0; i < 100; i++) {
			instantiate("f", env);
			instantiate("missing", env);
		}
		trace.start("ignored");
		trace.mark("ignored");
		trace.stop("unmatched");

		assert(trace.publish().children, "is equal to", []);
	},
};

export type Trace = TraceBranch | TraceEvent;

export type TraceEvent = {
	tag: "trace-event",
	title: string | unknown[],
	details: string | null,
	time: number,
};

export type TraceBranch = {
	tag: "trace-branch",
	title: string | unknown[],
	start: number,
	end: null | number,
	children: Trace[],
	parent: TraceBranch | null,
};

/**
 * `Stopwatch` measures elapsed time, excluding the time spent while paused.
 * The tracer pauses it while it computes event details, so that expensive
 * details do not distort the timings.
 */
export class Stopwatch {
	private state: { tag: "paused", runForMs: number }
		| { tag: "playing", runForMs: number, playedAtMs: number } = { tag: "paused", runForMs: 0 };

	constructor(private clock: () => number) {
		this.resume();
	}

	resume(): void {
		if (this.state.tag === "playing") {
			return;
		}
		this.state = {
			tag: "playing",
			runForMs: this.state.runForMs,
			playedAtMs: this.clock(),
		};
	}

	pause(): void {
		if (this.state.tag === "paused") {
			return;
		}
		this.state = {
			tag: "paused",
			runForMs: this.state.runForMs + this.clock() - this.state.playedAtMs,
		};
	}

	measureMs(): number {
		if (this.state.tag === "paused") {
			return this.state.runForMs;
		}
		return this.state.runForMs + this.clock() - this.state.playedAtMs;
	}
}

const stopwatch = new Stopwatch(() => performance.now());

function newRoot(title: string): TraceBranch {
	return {
		tag: "trace-branch",
		title,
		start: stopwatch.measureMs(),
		end: null,
		children: [],
		parent: null,
	};
}

let root: TraceBranch = newRoot("root");
let active: TraceBranch = root;
let verbose = false;

/// Nothing is recorded outside of a `clear` ... `stopRecording` window.
let recording = false;

/// `setVerbose` controls whether the (possibly expensive) details of events
/// are computed.
export function setVerbose(newVerbose: boolean): void {
	verbose = newVerbose;
}

/// `clear` discards everything recorded so far and starts recording into a
/// new root.
export function clear(title: string): void {
	root = newRoot(title);
	active = root;
	recording = true;
}

/// `stopRecording` makes `start`, `mark` and `stop` do nothing until the next
/// `clear`. What was recorded remains available to `publish`.
export function stopRecording(): void {
	recording = false;
}

export function start(title: string | unknown[]): void {
	if (!recording) {
		return;
	}
	const branch: TraceBranch = {
		tag: "trace-branch",
		title,
		start: stopwatch.measureMs(),
		end: null,
		children: [],
		parent: active,
	};
	active.children.push(branch);
	active = branch;
}

export function mark(title: string | unknown[], details?: () => string): void {
	if (!recording) {
		return;
	}
	stopwatch.pause();
	active.children.push({
		tag: "trace-event",
		title,
		details: details === undefined
			? null
			: (verbose ? details() : "(details skipped; tracing is not verbose)"),
		time: stopwatch.measureMs(),
	});
	stopwatch.resume();
}

/// `stop` closes the most recently started branch. When a `title` is given, it
/// must match the title of that branch.
export function stop(title?: string): void {
	if (!recording) {
		return;
	}
	if (title !== undefined && title !== active.title) {
		throw new Error("mismatched trace:\n\t" + JSON.stringify(title) + "\n\t!=\n\t" + JSON.stringify(active.title));
	}
	const parent = active.parent;
	if (parent === null) {
		throw new Error("mismatched trace:\n\tno branch open for\n\t" + JSON.stringify(title));
	}
	active.end = stopwatch.measureMs();
	active = parent;
}

/// `publish` closes the root branch and returns it.
export function publish(): TraceBranch {
	root.end = stopwatch.measureMs();
	return root;
}

function showTitle(title: string | unknown[]): string[] {
	if (typeof title === "string") {
		return [title];
	}
	return title.map(x => typeof x === "string" ? x : JSON.stringify(x));
}

function limitPrecision(n: number | null): number | null {
	if (n === null) {
		return null;
	}
	return parseFloat(n.toFixed(3));
}

export interface SerializedTrace {
	title: string[],
	start: number | null,
	end?: number | null,
	details?: string | null,
	children?: SerializedTrace[],
}

export function serialize(tree: Trace): SerializedTrace {
	if (tree.tag === "trace-branch") {
		return {
			title: showTitle(tree.title),
			start: limitPrecision(tree.start),
			end: limitPrecision(tree.end),
			children: tree.children.map(serialize),
		};
	}
	return {
		title: showTitle(tree.title),
		start: limitPrecision(tree.time),
		details: tree.details,
	};
}

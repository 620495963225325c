export type { Abstractor, CheckResult } from "./analyzer.js";
export { Analyzer } from "./analyzer.js";
export { mergeSummaryFiles, parseSummaryFile, decodeSummaryFile } from "./decode.js";
export type { SummaryFile } from "./decode.js";
export {
	DiagnosticErr,
	displayError,
	displayWarning,
	FunctionRedefinedErr,
	MalformedSummaryErr,
	NoSuchFunctionErr,
	UNPARSED_ASSERT_MESSAGE,
} from "./diagnostics.js";
export type { ErrorElement, Warning } from "./diagnostics.js";
export {
	displayCallStack,
	displayConstraint,
	displayExpr,
	displayLocation,
	displaySignature,
	displaySummary,
	displaySummaryPretty,
	displayVar,
} from "./display.js";
export {
	conjoin,
	equate,
	exprOfVar,
	FALSE,
	sortOf,
	substitute,
	TRUE,
	VariableGenerator,
	varKey,
} from "./expr.js";
export type { BoolExpr, Expr, IntExpr, ListExpr, Rewrite, Sort, Var } from "./expr.js";
export { ConstraintInstantiator, instantiate } from "./instantiate.js";
export {
	constraintSubstitute,
	innermostLocation,
	locationKey,
	pushFrame,
	stackLocations,
	TOP,
} from "./summary.js";
export type {
	CallConstraint,
	CallFrame,
	CallStack,
	Constraint,
	Environment,
	ExprConstraint,
	FunctionSummary,
	InstantiatedConstraint,
	Origin,
	SourceLocation,
	StructDecl,
	StructField,
	SummaryConstraint,
	TypeEnvironment,
} from "./summary.js";
export { warnAboutUnresolvedAsserts } from "./unresolved.js";

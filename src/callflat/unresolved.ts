import { DefaultMap } from "./data.js";
import { UNPARSED_ASSERT_MESSAGE, Warning } from "./diagnostics.js";
import { Var, varKey } from "./expr.js";
import { CallStack, Constraint, constraintSubstitute, innermostLocation, locationKey } from "./summary.js";

/**
 * `warnAboutUnresolvedAsserts` looks for asserted conditions that are nothing
 * but a boolean variable which appears nowhere else in the system. Such a
 * variable is unconstrained, which is what the abstraction pass produces when
 * it could not make sense of an assertion's condition.
 *
 * At most one warning is reported per source location.
 */
export function warnAboutUnresolvedAsserts(constraints: readonly Constraint<CallStack>[]): Warning[] {
	const uses = new DefaultMap<Var, { count: number }>(() => ({ count: 0 }), varKey);
	for (const constraint of constraints) {
		constraintSubstitute(constraint, v => {
			uses.get(v).count += 1;
			return null;
		});
	}

	const warnings: Warning[] = [];
	const seenLocations = new Set<string>();
	for (const constraint of constraints) {
		if (constraint.tag !== "expr" || constraint.origin !== "asserted") {
			continue;
		} else if (constraint.condition.tag !== "bool-var") {
			continue;
		} else if (uses.get(constraint.condition.variable).count !== 1) {
			continue;
		}

		const location = innermostLocation(constraint.location);
		if (location === null || seenLocations.has(locationKey(location))) {
			continue;
		}
		seenLocations.add(locationKey(location));
		warnings.push({ message: UNPARSED_ASSERT_MESSAGE, location });
	}
	return warnings;
}

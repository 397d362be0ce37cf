/**
 * Link and path cost arithmetic.
 *
 * A cost is a non-negative integer or the {@link UNREACHABLE} sentinel.  All
 * addition and comparison of costs goes through this module.
 */

export const UNREACHABLE: unique symbol = Symbol('unreachable');

export type Cost = number | typeof UNREACHABLE;

export function isReachable(cost: Cost): cost is number {
	return cost !== UNREACHABLE;
}

/** Path cost of two segments; unreachable if either segment is. */
export function combine(a: Cost, b: Cost): Cost {
	if (a === UNREACHABLE || b === UNREACHABLE) return UNREACHABLE;
	return a + b;
}

/** Orders costs ascending with {@link UNREACHABLE} after every finite cost. */
export function compareCost(a: Cost, b: Cost): number {
	if (a === b) return 0;
	if (a === UNREACHABLE) return 1;
	if (b === UNREACHABLE) return -1;
	return a - b;
}

export function minCost(costs: Iterable<Cost>): Cost {
	let best: Cost = UNREACHABLE;
	for (const c of costs) {
		if (compareCost(c, best) < 0) best = c;
	}
	return best;
}

export function formatCost(cost: Cost): string {
	return cost === UNREACHABLE ? 'INF' : String(cost);
}

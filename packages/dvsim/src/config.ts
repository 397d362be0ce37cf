import type { TracePredicate } from './agent/trace.js';

export type UndeclaredNodePolicy = 'ignore' | 'orphan';

export interface SimulationConfig {
	/** Exchange rounds allowed for the initial convergence. */
	initialRounds: number;
	/** Extra rounds allowed after the unconditional post-change round. */
	updateRounds: number;
	/**
	 * Links naming nodes that were never declared: 'ignore' drops them,
	 * 'orphan' adds them to the topology without an agent.
	 */
	undeclaredNodes: UndeclaredNodePolicy;
	trace?: TracePredicate;
}

export const DEFAULT_INITIAL_ROUNDS = 2;
export const DEFAULT_UPDATE_ROUNDS = 2;

export function resolveConfig(cfg?: Partial<SimulationConfig>): SimulationConfig {
	const resolved: SimulationConfig = {
		initialRounds: cfg?.initialRounds ?? DEFAULT_INITIAL_ROUNDS,
		updateRounds: cfg?.updateRounds ?? DEFAULT_UPDATE_ROUNDS,
		undeclaredNodes: cfg?.undeclaredNodes ?? 'ignore',
		trace: cfg?.trace,
	};
	assertRoundCap('initialRounds', resolved.initialRounds);
	assertRoundCap('updateRounds', resolved.updateRounds);
	if (resolved.undeclaredNodes !== 'ignore' && resolved.undeclaredNodes !== 'orphan') {
		throw new RangeError(`undeclaredNodes must be 'ignore' or 'orphan', got ${String(resolved.undeclaredNodes)}`);
	}
	return resolved;
}

function assertRoundCap(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
	}
}

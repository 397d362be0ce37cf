import type { Cost } from '../cost/cost.js';
import type { NodeId } from '../topology/node-id.js';

/** A single overwritten (destination, via) entry during a receive phase. */
export interface RelaxationEvent {
	round: number;
	node: NodeId;
	destination: NodeId;
	via: NodeId;
	previous: Cost;
	cost: Cost;
}

export type RelaxationObserver = (event: RelaxationEvent) => void;

/** Decides which relaxations are surfaced as trace output. */
export type TracePredicate = (event: RelaxationEvent) => boolean;

export interface TraceTriple {
	node: NodeId;
	destination: NodeId;
	via: NodeId;
}

export function traceTriples(triples: Iterable<TraceTriple>, fromRound = 0): TracePredicate {
	const keys = new Set<string>();
	for (const t of triples) keys.add(tripleKey(t));
	return (event) => event.round >= fromRound && keys.has(tripleKey(event));
}

export function traceAll(fromRound = 0): TracePredicate {
	return (event) => event.round >= fromRound;
}

/** Parses `node:destination:via`; undefined when the text is not three non-empty parts. */
export function parseTraceTriple(text: string): TraceTriple | undefined {
	const parts = text.split(':');
	if (parts.length !== 3 || parts.some((p) => p.length === 0)) return undefined;
	const [node, destination, via] = parts;
	if (node === undefined || destination === undefined || via === undefined) return undefined;
	return { node, destination, via };
}

function tripleKey(t: TraceTriple): string {
	return JSON.stringify([t.node, t.destination, t.via]);
}

import { UNREACHABLE, type Cost } from '../cost/cost.js';
import type { NodeId } from './node-id.js';

export interface Link {
	a: NodeId;
	b: NodeId;
	cost: number;
}

/**
 * Undirected weighted graph.  Every link is stored in both directions, so
 * `costBetween(a, b) === costBetween(b, a)` holds after any sequence of
 * operations.
 */
export class Topology {
	private readonly adjacency = new Map<NodeId, Map<NodeId, number>>();

	insertNode(id: NodeId): void {
		if (!this.adjacency.has(id)) this.adjacency.set(id, new Map());
	}

	/** Sets (or overwrites) the link cost in both directions. Self-links are ignored. */
	connect(a: NodeId, b: NodeId, cost: number): void {
		if (a === b) return;
		this.insertNode(a);
		this.insertNode(b);
		this.adjacency.get(a)?.set(b, cost);
		this.adjacency.get(b)?.set(a, cost);
	}

	/** Removes the link in both directions; no-op when there is none. */
	disconnect(a: NodeId, b: NodeId): boolean {
		const fromA = this.adjacency.get(a);
		if (!fromA?.has(b)) return false;
		fromA.delete(b);
		this.adjacency.get(b)?.delete(a);
		return true;
	}

	neighborsOf(id: NodeId): ReadonlySet<NodeId> {
		return new Set(this.adjacency.get(id)?.keys() ?? []);
	}

	costBetween(a: NodeId, b: NodeId): Cost {
		return this.adjacency.get(a)?.get(b) ?? UNREACHABLE;
	}

	has(id: NodeId): boolean {
		return this.adjacency.has(id);
	}

	nodes(): NodeId[] {
		return Array.from(this.adjacency.keys());
	}

	/** Each undirected link once, in the order its first endpoint was inserted. */
	links(): Link[] {
		const out: Link[] = [];
		const seen = new Set<NodeId>();
		for (const [a, row] of this.adjacency) {
			for (const [b, cost] of row) {
				if (!seen.has(b)) out.push({ a, b, cost });
			}
			seen.add(a);
		}
		return out;
	}
}

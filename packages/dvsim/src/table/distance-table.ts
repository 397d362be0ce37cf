import { UNREACHABLE, type Cost } from '../cost/cost.js';
import type { NodeId } from '../topology/node-id.js';

/** Immutable value copy of a distance table: destination → via → cost. */
export type DistanceRows = ReadonlyMap<NodeId, ReadonlyMap<NodeId, Cost>>;

/**
 * One node's private view of the network: the estimated cost to every other
 * node, broken down by the neighbor ("via") the estimate was learned through.
 *
 * The destination set and the via set are both "every known node except the
 * owner", fixed at construction. Costs change; the shape never does.
 */
export class DistanceTable {
	readonly owner: NodeId;
	private readonly ids: readonly NodeId[];
	private readonly rows = new Map<NodeId, Map<NodeId, Cost>>();

	constructor(owner: NodeId, allNodeIds: Iterable<NodeId>) {
		this.owner = owner;
		this.ids = Array.from(new Set(allNodeIds)).filter((id) => id !== owner);
		for (const dest of this.ids) {
			this.rows.set(dest, new Map<NodeId, Cost>(this.ids.map((via) => [via, UNREACHABLE])));
		}
	}

	/** Destinations (and vias) in declaration order. */
	nodeIds(): readonly NodeId[] {
		return this.ids;
	}

	has(id: NodeId): boolean {
		return this.rows.has(id);
	}

	get(dest: NodeId, via: NodeId): Cost {
		return this.requireRow(dest).get(via) ?? UNREACHABLE;
	}

	/** Writes one entry and reports whether the stored cost changed. */
	set(dest: NodeId, via: NodeId, cost: Cost): boolean {
		const row = this.requireRow(dest);
		if (!row.has(via)) {
			throw new Error(`distance table of ${this.owner} has no via-column ${via}`);
		}
		if (row.get(via) === cost) return false;
		row.set(via, cost);
		return true;
	}

	/** Sets every row's entry for `via`. */
	setColumn(via: NodeId, cost: Cost): boolean {
		let changed = false;
		for (const dest of this.ids) {
			if (this.set(dest, via, cost)) changed = true;
		}
		return changed;
	}

	row(dest: NodeId): ReadonlyMap<NodeId, Cost> {
		return new Map(this.requireRow(dest));
	}

	snapshot(): DistanceRows {
		const copy = new Map<NodeId, ReadonlyMap<NodeId, Cost>>();
		for (const [dest, row] of this.rows) copy.set(dest, new Map(row));
		return copy;
	}

	equals(other: DistanceRows): boolean {
		if (other.size !== this.rows.size) return false;
		for (const [dest, row] of this.rows) {
			const theirs = other.get(dest);
			if (!theirs || theirs.size !== row.size) return false;
			for (const [via, cost] of row) {
				if (!theirs.has(via) || theirs.get(via) !== cost) return false;
			}
		}
		return true;
	}

	private requireRow(dest: NodeId): Map<NodeId, Cost> {
		const row = this.rows.get(dest);
		if (!row) throw new Error(`distance table of ${this.owner} has no destination ${dest}`);
		return row;
	}
}

import { UNREACHABLE, compareCost, type Cost } from '../cost/cost.js';
import { sortNodeIds, type NodeId } from '../topology/node-id.js';
import type { DistanceRows } from './distance-table.js';

export interface RouteEntry {
	cost: Cost;
	/** null when the destination is unreachable. */
	nextHop: NodeId | null;
}

export type RoutingTable = ReadonlyMap<NodeId, RouteEntry>;

/**
 * Best route per destination. Vias are scanned in sorted order and only a
 * strictly smaller cost replaces the current best, so ties go to the smallest
 * via id.
 */
export function computeRoutingTable(rows: DistanceRows): RoutingTable {
	const table = new Map<NodeId, RouteEntry>();
	for (const [dest, row] of rows) {
		let best: RouteEntry = { cost: UNREACHABLE, nextHop: null };
		for (const via of sortNodeIds(row.keys())) {
			const cost = row.get(via) ?? UNREACHABLE;
			if (compareCost(cost, best.cost) < 0) best = { cost, nextHop: via };
		}
		table.set(dest, best);
	}
	return table;
}

import { UNREACHABLE, combine, minCost } from '../cost/cost.js';
import type { NodeId } from '../topology/node-id.js';
import type { Topology } from '../topology/topology.js';
import { DistanceTable, type DistanceRows } from '../table/distance-table.js';
import { computeRoutingTable, type RoutingTable } from '../table/routing-table.js';
import type { RelaxationObserver } from './trace.js';
import { createLogger } from '../logger.js';

const log = createLogger('agent');

/** A value snapshot of the sender's distance table at broadcast time. */
export interface UpdateMessage {
	readonly source: NodeId;
	readonly table: DistanceRows;
}

export type AgentState = 'uninitialized' | 'dirty' | 'converged' | 'disturbed';

/**
 * One router in the simulation. Owns its distance table, the routing table
 * derived from it, and an inbound mailbox that peers can only append to.
 */
export class NodeAgent {
	readonly id: NodeId;
	private table: DistanceTable | undefined;
	private routes: RoutingTable = new Map();
	private mailbox: UpdateMessage[] = [];
	private dirty = false;
	private disturbed = false;

	constructor(id: NodeId) {
		this.id = id;
	}

	/** True when the table changed since the last broadcast. */
	get needsUpdate(): boolean {
		return this.dirty;
	}

	get state(): AgentState {
		if (!this.table) return 'uninitialized';
		if (!this.dirty) return 'converged';
		return this.disturbed ? 'disturbed' : 'dirty';
	}

	get pendingMessages(): number {
		return this.mailbox.length;
	}

	setupTable(allNodeIds: Iterable<NodeId>): void {
		this.table = new DistanceTable(this.id, allNodeIds);
		this.routes = new Map();
		this.mailbox = [];
		this.dirty = false;
		this.disturbed = false;
	}

	/**
	 * Seeds the table with what the node knows locally: the cost of each direct
	 * link, and nothing through any other node. Always leaves the agent dirty
	 * so the first round broadcasts.
	 */
	initializeFromTopology(topology: Topology, allAgents: readonly NodeAgent[]): void {
		const table = this.requireTable();
		const neighbors = topology.neighborsOf(this.id);
		for (const neighbor of neighbors) {
			if (!table.has(neighbor)) {
				log('%s: neighbor %s has no agent, ignoring', this.id, neighbor);
				continue;
			}
			table.set(neighbor, neighbor, topology.costBetween(this.id, neighbor));
		}
		for (const agent of allAgents) {
			if (agent.id === this.id || neighbors.has(agent.id) || !table.has(agent.id)) continue;
			table.setColumn(agent.id, UNREACHABLE);
		}
		this.dirty = true;
	}

	/**
	 * Sends a snapshot of the current table to every agent in `neighbors`.
	 * Does nothing when the table has not changed since the last broadcast.
	 */
	broadcast(neighbors: ReadonlySet<NodeId>, allAgents: readonly NodeAgent[]): boolean {
		if (!this.dirty) return false;
		const table = this.requireTable();
		this.routes = this.computeRoutingTable();
		for (const agent of allAgents) {
			if (agent.id === this.id || !neighbors.has(agent.id)) continue;
			agent.deliver({ source: this.id, table: table.snapshot() });
		}
		this.dirty = false;
		this.disturbed = false;
		return true;
	}

	deliver(message: UpdateMessage): void {
		this.mailbox.push(message);
	}

	/**
	 * Bellman-Ford relaxation over every pending message. For each destination
	 * other than the sender, the entry via the sender becomes
	 * `cost(self → sender) + sender's best cost to destination`. There is no
	 * split horizon: a sender may advertise a route that goes back through
	 * this node.
	 */
	receive(round: number, onRelax?: RelaxationObserver): boolean {
		const table = this.requireTable();
		let changed = false;
		for (const { source, table: senderTable } of this.mailbox) {
			if (!table.has(source)) {
				log.error('%s: dropping update from unknown node %s', this.id, source);
				continue;
			}
			const costToSource = table.get(source, source);
			for (const dest of table.nodeIds()) {
				if (dest === source) continue;
				const advertised = minCost(senderTable.get(dest)?.values() ?? []);
				const candidate = combine(costToSource, advertised);
				const previous = table.get(dest, source);
				if (!table.set(dest, source, candidate)) continue;
				changed = true;
				onRelax?.({ round, node: this.id, destination: dest, via: source, previous, cost: candidate });
			}
		}
		this.mailbox = [];
		if (changed) this.dirty = true;
		return changed;
	}

	computeRoutingTable(): RoutingTable {
		return computeRoutingTable(this.requireTable().snapshot());
	}

	/**
	 * Throws away everything learned indirectly. Each via-column is reset to
	 * the live cost of the direct link to that via, or UNREACHABLE when the via
	 * is no longer a neighbor. Marks the agent dirty only if that changed
	 * anything.
	 */
	handleTopologyChange(topology: Topology): boolean {
		const table = this.requireTable();
		const prior = table.snapshot();
		this.mailbox = [];
		const neighbors = topology.neighborsOf(this.id);
		for (const via of table.nodeIds()) {
			const cost = neighbors.has(via) ? topology.costBetween(this.id, via) : UNREACHABLE;
			table.setColumn(via, cost);
		}
		if (table.equals(prior)) return false;
		this.dirty = true;
		this.disturbed = true;
		return true;
	}

	distances(): DistanceRows {
		return this.requireTable().snapshot();
	}

	/** The routing table computed at the most recent broadcast. */
	routingTable(): RoutingTable {
		return this.routes;
	}

	private requireTable(): DistanceTable {
		if (!this.table) throw new Error(`agent ${this.id} has no distance table; call setupTable first`);
		return this.table;
	}
}

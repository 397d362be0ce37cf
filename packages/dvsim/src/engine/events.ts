import type { NodeId } from '../topology/node-id.js';
import type { DistanceRows } from '../table/distance-table.js';
import type { RoutingTable } from '../table/routing-table.js';
import type { RelaxationEvent } from '../agent/trace.js';

export type Section = 'start' | 'initial' | 'update' | 'final';

export interface AgentDistances {
	node: NodeId;
	table: DistanceRows;
}

export interface AgentRoutes {
	node: NodeId;
	table: RoutingTable;
}

/** Everything a report needs, in the order it happened. */
export type SimulationEvent =
	| { type: 'section'; section: Section }
	| { type: 'distances'; t: number; agents: AgentDistances[] }
	| { type: 'routes'; agents: AgentRoutes[] }
	| { type: 'trace'; relaxation: RelaxationEvent };

export type SimulationListener = (event: SimulationEvent) => void;

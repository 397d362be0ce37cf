import { NodeAgent } from '../agent/node-agent.js';
import type { RelaxationEvent } from '../agent/trace.js';
import type { NodeId } from '../topology/node-id.js';
import type { Topology } from '../topology/topology.js';
import { resolveConfig, type SimulationConfig } from '../config.js';
import type { AgentRoutes, SimulationListener } from './events.js';
import { createLogger } from '../logger.js';

const log = createLogger('engine');

export interface PhaseResult {
	/** Rounds of broadcast + receive run in this phase. */
	rounds: number;
	/** Simulation time at the end of the phase. */
	t: number;
	/** True when no agent was left dirty. */
	converged: boolean;
}

/**
 * Drives synchronous rounds over all agents: every agent broadcasts, then
 * every agent receives, then the round's tables are reported. Agents are
 * always visited in creation order.
 *
 * The engine never mutates the topology; the caller applies a change and then
 * calls {@link reconverge}.
 */
export class ConvergenceEngine {
	readonly agents: readonly NodeAgent[];
	private readonly topology: Topology;
	private readonly cfg: SimulationConfig;
	private readonly listener: SimulationListener;
	private t = 0;
	private initialized = false;

	constructor(topology: Topology, nodeIds: readonly NodeId[], cfg?: Partial<SimulationConfig>, listener?: SimulationListener) {
		this.topology = topology;
		this.cfg = resolveConfig(cfg);
		this.listener = listener ?? (() => {});
		this.agents = Array.from(new Set(nodeIds), (id) => new NodeAgent(id));
	}

	agent(id: NodeId): NodeAgent | undefined {
		return this.agents.find((a) => a.id === id);
	}

	anyDirty(): boolean {
		return this.agents.some((a) => a.needsUpdate);
	}

	/** Allocates and seeds every agent's table, then reports t=0. */
	initialize(): void {
		const ids = this.agents.map((a) => a.id);
		for (const agent of this.agents) {
			agent.setupTable(ids);
			agent.initializeFromTopology(this.topology, this.agents);
		}
		this.t = 0;
		this.initialized = true;
		this.reportDistances();
	}

	/** Runs rounds while any agent is dirty, up to `initialRounds`. */
	converge(): PhaseResult {
		this.requireInitialized();
		let rounds = 0;
		while (this.anyDirty() && rounds < this.cfg.initialRounds) {
			this.t++;
			rounds++;
			this.exchange();
			this.reportDistances();
		}
		const converged = !this.anyDirty();
		log('initial convergence: %d rounds, t=%d, converged=%s', rounds, this.t, converged);
		return { rounds, t: this.t, converged };
	}

	/**
	 * Re-converges after the topology changed: every agent resets to its
	 * direct links, the reset tables are reported, one exchange runs
	 * unconditionally, then up to `updateRounds` more while any agent is dirty.
	 */
	reconverge(): PhaseResult {
		this.requireInitialized();
		this.t++;
		for (const agent of this.agents) agent.handleTopologyChange(this.topology);
		this.reportDistances();
		this.exchange();

		let rounds = 1;
		let extra = 0;
		while (this.anyDirty() && extra < this.cfg.updateRounds) {
			this.t++;
			extra++;
			rounds++;
			this.exchange();
			this.reportDistances();
		}
		const converged = !this.anyDirty();
		log('post-update convergence: %d rounds, t=%d, converged=%s', rounds, this.t, converged);
		return { rounds, t: this.t, converged };
	}

	routingTables(): AgentRoutes[] {
		return this.agents.map((a) => ({ node: a.id, table: a.routingTable() }));
	}

	reportRoutes(): void {
		this.listener({ type: 'routes', agents: this.routingTables() });
	}

	/** Broadcast phase for all agents, then receive phase for all agents. */
	private exchange(): void {
		for (const agent of this.agents) {
			agent.broadcast(this.topology.neighborsOf(agent.id), this.agents);
		}
		const onRelax = this.cfg.trace ? this.traceRelaxation.bind(this) : undefined;
		for (const agent of this.agents) {
			agent.receive(this.t, onRelax);
		}
	}

	private traceRelaxation(relaxation: RelaxationEvent): void {
		if (this.cfg.trace?.(relaxation)) this.listener({ type: 'trace', relaxation });
	}

	private reportDistances(): void {
		this.listener({
			type: 'distances',
			t: this.t,
			agents: this.agents.map((a) => ({ node: a.id, table: a.distances() })),
		});
	}

	private requireInitialized(): void {
		if (!this.initialized) throw new Error('engine not initialized; call initialize() first');
	}
}

import { UNREACHABLE } from '../cost/cost.js';
import { Topology } from '../topology/topology.js';
import type { NodeId } from '../topology/node-id.js';
import type { LinkSpec, Scenario } from '../input/scenario-parser.js';
import { resolveConfig, type SimulationConfig } from '../config.js';
import { ConvergenceEngine, type PhaseResult } from './convergence-engine.js';
import type { AgentRoutes, SimulationEvent, SimulationListener } from './events.js';
import { createLogger } from '../logger.js';

const log = createLogger('simulation');

export interface SimulationRun {
	events: SimulationEvent[];
	initial: PhaseResult;
	/** Present only when the scenario carried a topology change. */
	update?: PhaseResult;
	/** Routing tables held by each agent when the run ended. */
	routes: AgentRoutes[];
	topology: Topology;
}

/**
 * Applies one link declaration or change; a -1 cost removes the link. Links
 * naming an undeclared node are dropped under the 'ignore' policy.
 */
export function applyLink(
	topology: Topology,
	declared: ReadonlySet<NodeId>,
	link: LinkSpec,
	policy: SimulationConfig['undeclaredNodes']
): boolean {
	if (policy === 'ignore' && (!declared.has(link.a) || !declared.has(link.b))) {
		log('ignoring link %s-%s: undeclared node', link.a, link.b);
		return false;
	}
	if (link.cost === UNREACHABLE) return topology.disconnect(link.a, link.b);
	topology.connect(link.a, link.b, link.cost);
	return true;
}

export function buildTopology(scenario: Scenario, policy: SimulationConfig['undeclaredNodes'] = 'ignore'): Topology {
	const topology = new Topology();
	const declared = new Set(scenario.nodes);
	for (const node of scenario.nodes) topology.insertNode(node);
	for (const link of scenario.links) {
		// a -1 declaration means no link; only the change block removes links
		if (link.cost === UNREACHABLE) {
			log('declaration %s-%s has no link', link.a, link.b);
			continue;
		}
		applyLink(topology, declared, link, policy);
	}
	return topology;
}

/**
 * Runs a whole scenario: initial convergence, then (if the scenario has a
 * change block) the topology change and bounded re-convergence.
 */
export function simulate(scenario: Scenario, cfg?: Partial<SimulationConfig>, listener?: SimulationListener): SimulationRun {
	const config = resolveConfig(cfg);
	const events: SimulationEvent[] = [];
	const emit: SimulationListener = (event) => {
		events.push(event);
		listener?.(event);
	};

	const topology = buildTopology(scenario, config.undeclaredNodes);
	const engine = new ConvergenceEngine(topology, scenario.nodes, config, emit);

	emit({ type: 'section', section: 'start' });
	engine.initialize();
	emit({ type: 'section', section: 'initial' });
	const initial = engine.converge();
	engine.reportRoutes();

	let update: PhaseResult | undefined;
	if (scenario.changes.length > 0) {
		emit({ type: 'section', section: 'update' });
		const declared = new Set(scenario.nodes);
		for (const change of scenario.changes) applyLink(topology, declared, change, config.undeclaredNodes);
		update = engine.reconverge();
		emit({ type: 'section', section: 'final' });
		engine.reportRoutes();
	}

	return { events, initial, update, routes: engine.routingTables(), topology };
}

export { UNREACHABLE, combine, compareCost, minCost, formatCost, isReachable, type Cost } from './cost/cost.js';
export { compareNodeIds, sortNodeIds, type NodeId } from './topology/node-id.js';
export { Topology, type Link } from './topology/topology.js';
export { DistanceTable, type DistanceRows } from './table/distance-table.js';
export { computeRoutingTable, type RouteEntry, type RoutingTable } from './table/routing-table.js';
export { NodeAgent, type AgentState, type UpdateMessage } from './agent/node-agent.js';
export {
	traceAll,
	traceTriples,
	parseTraceTriple,
	type RelaxationEvent,
	type RelaxationObserver,
	type TracePredicate,
	type TraceTriple,
} from './agent/trace.js';
export { ConvergenceEngine, type PhaseResult } from './engine/convergence-engine.js';
export { simulate, buildTopology, applyLink, type SimulationRun } from './engine/simulation.js';
export type { Section, SimulationEvent, SimulationListener, AgentDistances, AgentRoutes } from './engine/events.js';
export {
	resolveConfig,
	DEFAULT_INITIAL_ROUNDS,
	DEFAULT_UPDATE_ROUNDS,
	type SimulationConfig,
	type UndeclaredNodePolicy,
} from './config.js';
export { parseScenario, RESERVED_WORDS, type Scenario, type LinkSpec, type SkippedLine, type SkipReason } from './input/scenario-parser.js';
export { renderReport, renderEvent, renderDistanceTable, renderRoutingTable, renderTrace } from './report/report.js';
export { runScenarioText, type RunResult } from './cli/run.js';

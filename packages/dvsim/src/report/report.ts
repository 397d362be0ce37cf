import { formatCost, UNREACHABLE } from '../cost/cost.js';
import { sortNodeIds, type NodeId } from '../topology/node-id.js';
import type { DistanceRows } from '../table/distance-table.js';
import type { RoutingTable } from '../table/routing-table.js';
import type { RelaxationEvent } from '../agent/trace.js';
import type { Section, SimulationEvent } from '../engine/events.js';

const SECTION_MARKERS: Record<Section, string> = {
	start: '#START',
	initial: '#INITIAL',
	update: '#UPDATE',
	final: '#FINAL',
};

const CELL_WIDTH = 4;
const GAP = '    ';

export function renderDistanceTable(node: NodeId, t: number, table: DistanceRows): string[] {
	const ids = sortNodeIds(table.keys());
	const lines = [`Distance Table of router ${node} at t=${t}:`, `     ${ids.join(GAP)}`];
	for (const dest of ids) {
		const row = table.get(dest);
		const cells = ids.map((via) => formatCost(row?.get(via) ?? UNREACHABLE).padEnd(CELL_WIDTH));
		lines.push(`${dest}${GAP}${cells.join(GAP)}`);
	}
	return lines;
}

export function renderRoutingTable(node: NodeId, table: RoutingTable): string[] {
	const lines = ['', `Routing Table of router ${node}:`];
	for (const dest of sortNodeIds(table.keys())) {
		const entry = table.get(dest);
		if (!entry || entry.cost === UNREACHABLE || entry.nextHop === null) {
			lines.push(`${dest},INF,INF`);
		} else {
			lines.push(`${dest},${entry.nextHop},${entry.cost}`);
		}
	}
	return lines;
}

export function renderTrace(r: RelaxationEvent): string {
	return `t=${r.round} distance from ${r.node} to ${r.destination} via ${r.via} is ${formatCost(r.cost)}`;
}

export function renderEvent(event: SimulationEvent): string[] {
	switch (event.type) {
		case 'section':
			// every marker but the first is preceded by a blank line
			return event.section === 'start' ? [SECTION_MARKERS.start] : ['', SECTION_MARKERS[event.section]];
		case 'distances':
			return event.agents.flatMap((a) => renderDistanceTable(a.node, event.t, a.table));
		case 'routes':
			return event.agents.flatMap((a) => renderRoutingTable(a.node, a.table));
		case 'trace':
			return [renderTrace(event.relaxation)];
	}
}

/** The full text report, one line per entry, newline-terminated. */
export function renderReport(events: Iterable<SimulationEvent>): string {
	const lines: string[] = [];
	for (const event of events) lines.push(...renderEvent(event));
	return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

import { UNREACHABLE, type Cost } from '../cost/cost.js';
import type { NodeId } from '../topology/node-id.js';
import { createLogger } from '../logger.js';

const log = createLogger('input:parser');

export const RESERVED_WORDS: ReadonlySet<string> = new Set(['DISTANCEVECTOR', 'UPDATE', 'END']);

/** A link declaration or change; an UNREACHABLE cost removes the link. */
export interface LinkSpec {
	a: NodeId;
	b: NodeId;
	cost: Cost;
}

export type SkipReason = 'reserved-name' | 'bad-cost' | 'bad-arity';

export interface SkippedLine {
	line: number;
	text: string;
	reason: SkipReason;
}

export interface Scenario {
	/** Declared nodes, first declaration order, without duplicates. */
	nodes: NodeId[];
	links: LinkSpec[];
	/** The single topology-change event; empty when there is none. */
	changes: LinkSpec[];
	skipped: SkippedLine[];
}

function parseCost(token: string): Cost | undefined {
	if (token === '-1') return UNREACHABLE;
	if (!/^\d+$/.test(token)) return undefined;
	const cost = Number.parseInt(token, 10);
	return Number.isSafeInteger(cost) ? cost : undefined;
}

/**
 * Parses the line-oriented scenario format. Malformed lines never fail the
 * parse; they are returned in `skipped`.
 */
export function parseScenario(text: string): Scenario {
	const nodes: NodeId[] = [];
	const declared = new Set<NodeId>();
	const links: LinkSpec[] = [];
	const changes: LinkSpec[] = [];
	const skipped: SkippedLine[] = [];
	let inUpdate = false;

	const skip = (line: number, raw: string, reason: SkipReason): void => {
		log('line %d skipped (%s): %s', line, reason, raw);
		skipped.push({ line, text: raw, reason });
	};

	const lines = text.split(/\r?\n/);
	for (const [index, rawLine] of lines.entries()) {
		const lineNo = index + 1;
		const line = rawLine.trim();
		if (line.length === 0 || line.startsWith('#')) continue;
		if (line === 'UPDATE') { inUpdate = true; continue; }
		if (line === 'END') { inUpdate = false; continue; }

		const parts = line.split(/\s+/);
		if (parts.length === 1 && !inUpdate) {
			const name = parts[0] ?? '';
			if (RESERVED_WORDS.has(name)) { skip(lineNo, line, 'reserved-name'); continue; }
			if (!declared.has(name)) {
				declared.add(name);
				nodes.push(name);
			}
			continue;
		}
		if (parts.length !== 3) { skip(lineNo, line, 'bad-arity'); continue; }

		const [a = '', b = '', costToken = ''] = parts;
		const cost = parseCost(costToken);
		if (cost === undefined) { skip(lineNo, line, 'bad-cost'); continue; }
		if (RESERVED_WORDS.has(a) || RESERVED_WORDS.has(b)) { skip(lineNo, line, 'reserved-name'); continue; }
		(inUpdate ? changes : links).push({ a, b, cost });
	}

	return { nodes, links, changes, skipped };
}

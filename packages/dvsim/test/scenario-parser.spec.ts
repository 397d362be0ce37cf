import { describe, it } from 'mocha'
import { expect } from 'chai'
import { parseScenario } from '../src/input/scenario-parser.js'
import { UNREACHABLE } from '../src/cost/cost.js'

describe('Scenario parser', () => {
	it('reads nodes, links and a change block', () => {
		const scenario = parseScenario([
			'DISTANCEVECTOR',
			'X',
			'Y',
			'Z',
			'X Y 2',
			'Y Z 1',
			'UPDATE',
			'X Z 7',
			'Y Z -1',
			'END',
		].join('\n'))

		expect(scenario.nodes).to.deep.equal(['X', 'Y', 'Z'])
		expect(scenario.links).to.deep.equal([{ a: 'X', b: 'Y', cost: 2 }, { a: 'Y', b: 'Z', cost: 1 }])
		expect(scenario.changes).to.deep.equal([{ a: 'X', b: 'Z', cost: 7 }, { a: 'Y', b: 'Z', cost: UNREACHABLE }])
		expect(scenario.skipped).to.deep.equal([{ line: 1, text: 'DISTANCEVECTOR', reason: 'reserved-name' }])
	})

	it('ignores blank lines, comments and surrounding whitespace', () => {
		const scenario = parseScenario('# a comment\r\n\r\n   A   \r\n\tB\r\n  A   B    3  \r\n')
		expect(scenario.nodes).to.deep.equal(['A', 'B'])
		expect(scenario.links).to.deep.equal([{ a: 'A', b: 'B', cost: 3 }])
		expect(scenario.skipped).to.deep.equal([])
	})

	it('skips malformed lines and keeps going', () => {
		const scenario = parseScenario([
			'A',
			'B',
			'A B x',
			'A B 2.5',
			'A B -3',
			'A B',
			'A B 1 extra',
			'END B 1',
			'A B 4',
		].join('\n'))
		expect(scenario.links).to.deep.equal([{ a: 'A', b: 'B', cost: 4 }])
		expect(scenario.skipped.map((s) => [s.line, s.reason])).to.deep.equal([
			[3, 'bad-cost'],
			[4, 'bad-cost'],
			[5, 'bad-cost'],
			[6, 'bad-arity'],
			[7, 'bad-arity'],
			[8, 'reserved-name'],
		])
	})

	it('collapses repeated node declarations', () => {
		expect(parseScenario('B\nA\nB\n').nodes).to.deep.equal(['B', 'A'])
	})

	it('accepts only link lines inside the change block', () => {
		const scenario = parseScenario('A\nB\nUPDATE\nC\nA B 5\nEND\nC\n')
		expect(scenario.nodes).to.deep.equal(['A', 'B', 'C'])
		expect(scenario.changes).to.deep.equal([{ a: 'A', b: 'B', cost: 5 }])
		expect(scenario.skipped).to.deep.equal([{ line: 4, text: 'C', reason: 'bad-arity' }])
	})

	it('keeps a -1 declaration as an unreachable link', () => {
		expect(parseScenario('A\nB\nA B -1\n').links).to.deep.equal([{ a: 'A', b: 'B', cost: UNREACHABLE }])
	})

	it('rejects costs beyond the safe integer range', () => {
		const scenario = parseScenario('A\nB\nA B 99999999999999999999\nA B 9007199254740991\n')
		expect(scenario.links).to.deep.equal([{ a: 'A', b: 'B', cost: 9007199254740991 }])
		expect(scenario.skipped).to.deep.equal([{ line: 3, text: 'A B 99999999999999999999', reason: 'bad-cost' }])
	})

	it('returns an empty scenario for empty input', () => {
		expect(parseScenario('')).to.deep.equal({ nodes: [], links: [], changes: [], skipped: [] })
	})
})

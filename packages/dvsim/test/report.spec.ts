import { describe, it } from 'mocha'
import { expect } from 'chai'
import { renderDistanceTable, renderReport, renderRoutingTable, renderTrace } from '../src/report/report.js'
import { runScenarioText } from '../src/cli/run.js'
import { UNREACHABLE } from '../src/cost/cost.js'
import type { RouteEntry } from '../src/table/routing-table.js'
import { rows } from './helpers/tables.js'

describe('Report rendering', () => {
	it('renders a distance table with sorted, width-4 cells', () => {
		const lines = renderDistanceTable('X', 3, rows({
			Z: { Z: UNREACHABLE, Y: 3 },
			Y: { Z: 12, Y: 2 },
		}))
		expect(lines).to.deep.equal([
			'Distance Table of router X at t=3:',
			'     Y    Z',
			'Y    2       12  ',
			'Z    3       INF ',
		])
	})

	it('renders a routing table sorted by destination', () => {
		const lines = renderRoutingTable('Y', new Map<string, RouteEntry>([
			['Z', { cost: 1, nextHop: 'Z' }],
			['W', { cost: UNREACHABLE, nextHop: null }],
			['X', { cost: 3, nextHop: 'Z' }],
		]))
		expect(lines).to.deep.equal(['', 'Routing Table of router Y:', 'W,INF,INF', 'X,Z,3', 'Z,Z,1'])
	})

	it('renders trace lines', () => {
		expect(renderTrace({ round: 4, node: 'Y', destination: 'X', via: 'Z', previous: 2, cost: 3 }))
			.to.equal('t=4 distance from Y to X via Z is 3')
		expect(renderTrace({ round: 4, node: 'Y', destination: 'X', via: 'Z', previous: 2, cost: UNREACHABLE }))
			.to.equal('t=4 distance from Y to X via Z is INF')
	})

	it('renders an empty report for no events', () => {
		expect(renderReport([])).to.equal('')
	})

	it('renders a whole run with an update', () => {
		const { report } = runScenarioText('A\nB\nA B 1\nUPDATE\nA B 5\nEND\n')
		expect(report).to.equal([
			'#START',
			'Distance Table of router A at t=0:',
			'     B',
			'B    1   ',
			'Distance Table of router B at t=0:',
			'     A',
			'A    1   ',
			'',
			'#INITIAL',
			'Distance Table of router A at t=1:',
			'     B',
			'B    1   ',
			'Distance Table of router B at t=1:',
			'     A',
			'A    1   ',
			'',
			'Routing Table of router A:',
			'B,B,1',
			'',
			'Routing Table of router B:',
			'A,A,1',
			'',
			'#UPDATE',
			'Distance Table of router A at t=2:',
			'     B',
			'B    5   ',
			'Distance Table of router B at t=2:',
			'     A',
			'A    5   ',
			'',
			'#FINAL',
			'',
			'Routing Table of router A:',
			'B,B,5',
			'',
			'Routing Table of router B:',
			'A,A,5',
			'',
		].join('\n'))
	})

	it('places trace lines before the round they happened in', () => {
		const { report } = runScenarioText('X\nY\nZ\nX Y 2\nY Z 1\n', { trace: (e) => e.node === 'X' })
		const lines = report.split('\n')
		const traceAt = lines.indexOf('t=1 distance from X to Z via Y is 3')
		expect(traceAt).to.be.greaterThan(lines.indexOf('#INITIAL'))
		expect(lines[traceAt + 1]).to.equal('Distance Table of router X at t=1:')
	})
})

import { describe, it } from 'mocha'
import { expect } from 'chai'
import { parseTraceTriple, traceAll, traceTriples, type RelaxationEvent } from '../src/agent/trace.js'

function relaxation(round: number, node: string, destination: string, via: string): RelaxationEvent {
	return { round, node, destination, via, previous: 1, cost: 2 }
}

describe('Relaxation trace predicates', () => {
	it('matches listed triples from a given round', () => {
		const trace = traceTriples([{ node: 'X', destination: 'Z', via: 'Z' }], 3)
		expect(trace(relaxation(3, 'X', 'Z', 'Z'))).to.equal(true)
		expect(trace(relaxation(2, 'X', 'Z', 'Z'))).to.equal(false)
		expect(trace(relaxation(4, 'X', 'Z', 'Y'))).to.equal(false)
	})

	it('does not confuse names that contain separators', () => {
		const trace = traceTriples([{ node: 'a:b', destination: 'c', via: 'd' }])
		expect(trace(relaxation(1, 'a', 'b:c', 'd'))).to.equal(false)
		expect(trace(relaxation(1, 'a:b', 'c', 'd'))).to.equal(true)
	})

	it('traces everything from a round', () => {
		const trace = traceAll(2)
		expect(trace(relaxation(1, 'A', 'B', 'C'))).to.equal(false)
		expect(trace(relaxation(2, 'A', 'B', 'C'))).to.equal(true)
	})

	it('parses node:destination:via', () => {
		expect(parseTraceTriple('X:Z:Y')).to.deep.equal({ node: 'X', destination: 'Z', via: 'Y' })
		expect(parseTraceTriple('X:Z')).to.equal(undefined)
		expect(parseTraceTriple('X::Y')).to.equal(undefined)
		expect(parseTraceTriple('X:Z:Y:W')).to.equal(undefined)
	})
})

import { Command, InvalidArgumentError, Option } from 'commander';
import { parseTraceTriple, traceAll, traceTriples, type TraceTriple } from '../agent/trace.js';
import { DEFAULT_INITIAL_ROUNDS, DEFAULT_UPDATE_ROUNDS, type SimulationConfig, type UndeclaredNodePolicy } from '../config.js';
import { runScenarioText } from './run.js';
import { createLogger } from '../logger.js';

const log = createLogger('cli');

/** Side effects the command needs; swapped out in tests. */
export interface CliIo {
	/** Reads the named file, or standard input when no path is given. */
	readInput(path: string | undefined): Promise<string>;
	writeOutput(text: string): void;
	writeFile(path: string, text: string): Promise<void>;
}

export interface CliOptions {
	initialRounds: number;
	updateRounds: number;
	trace: TraceTriple[];
	traceFrom: number;
	traceAll?: boolean;
	undeclared: UndeclaredNodePolicy;
	out?: string;
}

function parseNonNegativeInt(value: string): number {
	if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Expected a non-negative integer.');
	return Number.parseInt(value, 10);
}

function collectTriple(value: string, previous: TraceTriple[]): TraceTriple[] {
	const triple = parseTraceTriple(value);
	if (!triple) throw new InvalidArgumentError('Expected node:destination:via.');
	return [...previous, triple];
}

export function toSimulationConfig(opts: CliOptions): Partial<SimulationConfig> {
	const cfg: Partial<SimulationConfig> = {
		initialRounds: opts.initialRounds,
		updateRounds: opts.updateRounds,
		undeclaredNodes: opts.undeclared,
	};
	if (opts.traceAll) cfg.trace = traceAll(opts.traceFrom);
	else if (opts.trace.length > 0) cfg.trace = traceTriples(opts.trace, opts.traceFrom);
	return cfg;
}

export function buildProgram(io: CliIo): Command {
	const program = new Command();

	program
		.name('dvsim')
		.description('Simulate distance-vector routing convergence over a static topology')
		.argument('[file]', 'scenario file (defaults to standard input)')
		.option('--initial-rounds <n>', 'round cap for the initial convergence', parseNonNegativeInt, DEFAULT_INITIAL_ROUNDS)
		.option('--update-rounds <n>', 'extra round cap after a topology change', parseNonNegativeInt, DEFAULT_UPDATE_ROUNDS)
		.option('--trace <node:dest:via>', 'trace changes to one distance entry (repeatable)', collectTriple, [])
		.option('--trace-from <round>', 'first round to trace', parseNonNegativeInt, 0)
		.option('--trace-all', 'trace every distance entry change')
		.addOption(new Option('--undeclared <policy>', 'links naming undeclared nodes').choices(['ignore', 'orphan']).default('ignore'))
		.option('-o, --out <path>', 'write the report to a file instead of standard output')
		.action(async (file: string | undefined, opts: CliOptions) => {
			const text = await io.readInput(file);
			const { report, run } = runScenarioText(text, toSimulationConfig(opts));
			if (!run.initial.converged) log('initial convergence stopped at the round cap');
			if (run.update && !run.update.converged) log('post-update convergence stopped at the round cap');
			if (opts.out) {
				await io.writeFile(opts.out, report);
			} else {
				io.writeOutput(report);
			}
		});

	return program;
}

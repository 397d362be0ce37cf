import { parseScenario } from '../input/scenario-parser.js';
import { simulate, type SimulationRun } from '../engine/simulation.js';
import { renderReport } from '../report/report.js';
import type { SimulationConfig } from '../config.js';

export interface RunResult {
	report: string;
	run: SimulationRun;
}

/** Parses scenario text, runs it, and renders the report. */
export function runScenarioText(text: string, cfg?: Partial<SimulationConfig>): RunResult {
	const scenario = parseScenario(text);
	const run = simulate(scenario, cfg);
	return { report: renderReport(run.events), run };
}

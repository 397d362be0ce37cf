#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { buildProgram, type CliIo } from './program.js';
import { createLogger } from '../logger.js';

const log = createLogger('cli');

async function readStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString('utf8');
}

const io: CliIo = {
	readInput: async (path) => path === undefined ? await readStdin() : await readFile(path, 'utf8'),
	writeOutput: (text) => { process.stdout.write(text); },
	writeFile: async (path, text) => {
		await mkdir(dirname(path), { recursive: true });
		await writeFile(path, text, 'utf8');
	},
};

buildProgram(io).parseAsync(process.argv).catch((err: unknown) => {
	log.error('dvsim failed - %e', err);
	process.stderr.write(`dvsim: ${err instanceof Error ? err.message : String(err)}\n`);
	process.exitCode = 1;
});

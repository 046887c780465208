// CHANGE: Console output service
// WHY: APP prints through an interface so it never touches console directly and tests can capture lines
// PURITY: SHELL (console I/O)
// INVARIANT: raw forwards utility output byte-for-byte, without added newlines
// COMPLEXITY: O(n) where n = text length

import type { OutputSink } from "../diskpart/runner.js";

export interface Output {
	readonly info: (line: string) => void;
	readonly warn: (line: string) => void;
	readonly error: (line: string) => void;
	readonly raw: OutputSink;
}

export const consoleOutput: Output = {
	info: (line) => {
		console.log(line);
	},
	warn: (line) => {
		console.warn(line);
	},
	error: (line) => {
		console.error(line);
	},
	raw: {
		stdout: (chunk) => {
			process.stdout.write(chunk);
		},
		stderr: (chunk) => {
			process.stderr.write(chunk);
		},
	},
};

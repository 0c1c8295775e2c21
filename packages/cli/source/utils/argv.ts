import { CliUsageError } from "@sixdegrees/core";

const PATH_FLAGS = new Set(["-l", "--path"]);
const PASSTHROUGH_FLAGS = new Set(["-h", "--help", "-v", "--version"]);

/**
 * Reject command lines the command parser would silently accept: a second
 * dataset path or a repeated `-l`. Help and version requests are left alone.
 *
 * @param argv - arguments after the executable and script path
 */
export function assertValidArgv(argv: readonly string[]): void {
	if (argv.some((arg) => PASSTHROUGH_FLAGS.has(arg))) return;

	let pathFlags = 0;
	let datasets = 0;

	for (const arg of argv) {
		if (PATH_FLAGS.has(arg)) {
			pathFlags++;
			if (pathFlags > 1) {
				throw new CliUsageError("Too many optional arguments.", argv);
			}
		} else if (arg === "-" || !arg.startsWith("-")) {
			datasets++;
			if (datasets > 1) {
				throw new CliUsageError("Too many files were given.", argv);
			}
		}
	}

	if (datasets === 0) {
		throw new CliUsageError("Missing dataset file.", argv);
	}
}

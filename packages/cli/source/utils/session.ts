import { createInterface } from "node:readline";
import {
	SeparationService,
	cfg,
	createModuleLogger,
	loadDataset,
	logError,
	wrapError,
} from "@sixdegrees/core";
import { formatOutcome } from "./score.js";

const logger = createModuleLogger("cli");

export interface TextSink {
	write(text: string): unknown;
}

export interface SessionOptions {
	datasetPath: string;
	includePath?: boolean;
	input: NodeJS.ReadableStream;
	stdout: TextSink;
	stderr: TextSink;
}

/**
 * Load the dataset, then answer one query per input line until the input
 * ends. Scores go to `stdout` as plain lines, unknown names and fatal errors
 * to `stderr`.
 *
 * @returns the process exit status
 */
export async function runSession(options: SessionOptions): Promise<0 | 1> {
	const { datasetPath, includePath = false, stdout, stderr } = options;

	try {
		const store = await loadDataset(datasetPath, {
			mergeDuplicateMovies: cfg.MERGE_DUPLICATE_MOVIES,
		});
		const service = new SeparationService(store, {
			referenceActor: cfg.REFERENCE_ACTOR,
		});

		const lines = createInterface({ input: options.input, crlfDelay: Infinity });
		for await (const name of lines) {
			const outcome = service.score(name, { includePath });
			if (outcome.kind === "not-found") {
				stderr.write(`${outcome.error.message}\n`);
				continue;
			}
			for (const line of formatOutcome(outcome)) {
				stdout.write(`${line}\n`);
			}
		}

		return service.exitCode;
	} catch (error) {
		const failure = wrapError(error, "cli", "runSession", { dataset: datasetPath });
		logError(logger, failure);
		stderr.write(`${failure.message}\n`);
		return 1;
	}
}

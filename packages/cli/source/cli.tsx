#!/usr/bin/env node

// Set CLI mode before any imports to ensure proper logging configuration
process.env["CLI_MODE"] = "true";

const { assertValidArgv } = await import("./utils/argv.js");
const { isSixDegreesError } = await import("@sixdegrees/core");
const { default: Pastel } = await import("pastel");

try {
	assertValidArgv(process.argv.slice(2));
} catch (error) {
	if (!isSixDegreesError(error)) throw error;
	process.stderr.write(`${error.message}\n`);
	process.exit(1);
}

const app = new Pastel({
	importMeta: import.meta,
	name: "sixdegrees",
	version: "0.1.0",
	description: "Bacon Numbers from a movie/cast dataset",
});

await app.run();

import { argument, option } from "pastel";
import { useEffect } from "react";
import zod from "zod";
import { runSession } from "../utils/session.js";

export const description =
	"Read actor names from stdin, one per line, and print each actor's Bacon Number against the dataset.";

export const args = zod.tuple([
	zod.string().describe(
		argument({
			name: "dataset",
			description: "Movie/cast dataset file",
		}),
	),
]);

// Pastel reads the alias from the option's inner type, so describe before default.
export const options = zod.object({
	path: zod
		.boolean()
		.describe(
			option({
				description: "Also print the chain of movies linking each actor",
				alias: "l",
			}),
		)
		.default(false),
});

type Props = {
	args: zod.infer<typeof args>;
	options: zod.infer<typeof options>;
};

export default function Index({ args, options }: Props) {
	useEffect(() => {
		const [datasetPath] = args;

		void runSession({
			datasetPath,
			includePath: options.path,
			input: process.stdin,
			stdout: process.stdout,
			stderr: process.stderr,
		}).then((exitCode) => {
			// Exit before Ink unmounts; in CI it would print its (empty) last frame.
			process.stdout.write("", () => process.exit(exitCode));
		});
	}, []);

	return null;
}

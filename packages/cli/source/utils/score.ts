import type { ScoreOutcome } from "@sixdegrees/core";

export const NO_BACON = "No Bacon!";

/**
 * Lines printed on stdout for one query. Unknown actors print nothing here;
 * they are reported on stderr.
 */
export function formatOutcome(outcome: ScoreOutcome): string[] {
	switch (outcome.kind) {
		case "not-found":
			return [];
		case "unreachable":
			return [`Score: ${NO_BACON}`];
		case "scored": {
			const lines = [`Score: ${outcome.distance}`];
			// Hops run from the reference actor outwards; print them from the queried actor back.
			const hops = outcome.path?.hops ?? [];
			for (let i = hops.length - 1; i >= 0; i--) {
				const hop = hops[i];
				if (hop) {
					lines.push(`${hop.to.name} was in ${hop.movie.name} with ${hop.from.name}`);
				}
			}
			return lines;
		}
	}
}

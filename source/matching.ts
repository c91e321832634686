// Query matching against simulator records
import type {Simulator} from './types.ts';

function haystack(sim: Simulator, includeState: boolean): string {
	const fields = [sim.udid, sim.name, sim.os];
	if (includeState) fields.push(sim.state);
	return fields.join(' ').toLowerCase();
}

/**
 * Case-insensitive substring filter over UDID, name, OS and state.
 * An empty or missing term keeps everything.
 */
export function filterSimulators(
	simulators: Simulator[],
	term?: string,
): Simulator[] {
	if (!term) return simulators;
	const needle = term.toLowerCase();
	return simulators.filter(sim => haystack(sim, true).includes(needle));
}

/**
 * Resolve a user query to a single simulator.
 * A UDID prefix match wins over a substring match on UDID, name or OS;
 * within each pass the first record in list order is returned.
 */
export function findSimulator(
	simulators: Simulator[],
	query: string,
): Simulator | undefined {
	const needle = query.toLowerCase();

	const byUdid = simulators.find(sim =>
		sim.udid.toLowerCase().startsWith(needle),
	);
	if (byUdid) return byUdid;

	return simulators.find(sim => haystack(sim, false).includes(needle));
}

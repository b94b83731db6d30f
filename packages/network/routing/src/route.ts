import { type NodeId, type Topology, linkIndex } from "@linkgym/topology";
import { shortestPath } from "./path.js";

/** Traffic volume per ordered node pair, `demand[from][to]` */
export type DemandMatrix = readonly (readonly number[])[];

export interface RouteResult {
	/** Aggregated demand per link, in link order */
	usage: Float64Array;
	/** Demand with no open path between its endpoints */
	droppedDemand: number;
}

export const openAdjacency = (
	topology: Topology,
	linkState: ArrayLike<number>,
): NodeId[][] => {
	const adjacency: NodeId[][] = Array.from(
		{ length: topology.numNodes },
		() => [],
	);
	for (const link of topology.links) {
		if (!linkState[link.index]) continue;
		adjacency[link.u].push(link.v);
		adjacency[link.v].push(link.u);
	}
	for (const list of adjacency) list.sort((a, b) => a - b);
	return adjacency;
};

/**
 * Route every positive demand as one unsplit flow over the fewest-hop path
 * through open links. Usage is rebuilt from zero on every call.
 */
export const route = (
	topology: Topology,
	linkState: ArrayLike<number>,
	demand: DemandMatrix,
): RouteResult => {
	const n = topology.numNodes;
	if (linkState.length !== topology.links.length) {
		throw new RangeError(
			`Expecting ${topology.links.length} link states, got ${linkState.length}`,
		);
	}
	if (demand.length !== n || demand.some((row) => row.length !== n)) {
		throw new RangeError(`Expecting a ${n}x${n} demand matrix`);
	}

	const usage = new Float64Array(topology.links.length);
	const adjacency = openAdjacency(topology, linkState);
	let droppedDemand = 0;

	for (let i = 0; i < n; i++) {
		for (let j = 0; j < n; j++) {
			const amount = demand[i][j];
			if (i === j || !(amount > 0)) continue;

			const path = shortestPath(adjacency, i, j);
			if (!path) {
				droppedDemand += amount;
				continue;
			}
			for (let k = 0; k < path.length - 1; k++) {
				const index = linkIndex(topology, path[k], path[k + 1]);
				if (index == null) {
					throw new Error(`Missing link between: ${path[k]} - ${path[k + 1]}`);
				}
				usage[index] += amount;
			}
		}
	}

	return { usage, droppedDemand };
};

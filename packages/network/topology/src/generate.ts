import { type Random, shuffle } from "@linkgym/random";
import { type LinkSpec, type Topology, createTopology, linkKey } from "./topology.js";

export type GenerateTopologyOptions = {
	numNodes: number;
	/** Maximum number of links any node may have */
	maxInterfaces: number;
	/** Capacity assigned to every generated link */
	capacity: number;
};

/**
 * Random topology under a per-node interface cap.
 *
 * A shuffled spanning path is laid down first so the graph is always
 * connected, then the remaining pairs are tried in random order and kept
 * only while both endpoints are below `maxInterfaces`. The resulting link
 * list is ordered by (u, v).
 */
export const generateTopology = (
	options: GenerateTopologyOptions,
	random: Random,
): Topology => {
	const { numNodes, maxInterfaces, capacity } = options;
	if (!Number.isInteger(numNodes) || numNodes <= 0) {
		throw new RangeError(`numNodes must be a positive integer, got ${numNodes}`);
	}
	if (!Number.isInteger(maxInterfaces) || maxInterfaces <= 0) {
		throw new RangeError(
			`maxInterfaces must be a positive integer, got ${maxInterfaces}`,
		);
	}

	const linked = new Set<string>();
	const degree = new Uint32Array(numNodes);
	const specs: LinkSpec[] = [];

	const connect = (a: number, b: number) => {
		linked.add(linkKey(a, b));
		degree[a] += 1;
		degree[b] += 1;
		specs.push({ u: Math.min(a, b), v: Math.max(a, b), capacity });
	};

	// Seed connectivity.
	const order = shuffle(
		random,
		Array.from({ length: numNodes }, (_, i) => i),
	);
	for (let i = 0; i < order.length - 1; i++) {
		connect(order[i], order[i + 1]);
	}

	const candidates: [number, number][] = [];
	for (let i = 0; i < numNodes; i++) {
		for (let j = i + 1; j < numNodes; j++) {
			if (!linked.has(linkKey(i, j))) candidates.push([i, j]);
		}
	}
	shuffle(random, candidates);
	for (const [a, b] of candidates) {
		if (degree[a] < maxInterfaces && degree[b] < maxInterfaces) {
			connect(a, b);
		}
	}

	specs.sort((x, y) => x.u - y.u || x.v - y.v);
	return createTopology(numNodes, specs);
};

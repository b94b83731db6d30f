export type NodeId = number;

export interface Link {
	/** Position in the topology's link list, fixed at construction */
	readonly index: number;
	readonly u: NodeId;
	readonly v: NodeId;
	readonly capacity: number;
}

export interface LinkSpec {
	u: NodeId;
	v: NodeId;
	capacity: number;
}

export interface Topology {
	readonly numNodes: number;
	readonly links: readonly Link[];
	/** Neighbours of every node, ascending by node id */
	readonly adjacency: readonly (readonly NodeId[])[];
	/** Canonical "u:v" key to link index */
	readonly lookup: ReadonlyMap<string, number>;
}

export const linkKey = (a: NodeId, b: NodeId) =>
	a < b ? `${a}:${b}` : `${b}:${a}`;

const isNode = (numNodes: number, n: NodeId) =>
	Number.isInteger(n) && n >= 0 && n < numNodes;

/**
 * Build an immutable topology from an explicit link list. Endpoints are
 * stored in canonical order (u < v) and links keep the order they are given in.
 */
export const createTopology = (
	numNodes: number,
	specs: readonly LinkSpec[],
): Topology => {
	if (!Number.isInteger(numNodes) || numNodes <= 0) {
		throw new RangeError(`numNodes must be a positive integer, got ${numNodes}`);
	}

	const lookup = new Map<string, number>();
	const neighbours: NodeId[][] = Array.from({ length: numNodes }, () => []);
	const links: Link[] = [];

	for (const spec of specs) {
		if (!isNode(numNodes, spec.u) || !isNode(numNodes, spec.v)) {
			throw new RangeError(
				`Link ${spec.u}-${spec.v} references a node outside [0, ${numNodes})`,
			);
		}
		if (spec.u === spec.v) {
			throw new RangeError(`Self loop on node ${spec.u}`);
		}
		if (!Number.isFinite(spec.capacity) || spec.capacity < 0) {
			throw new RangeError(
				`Link ${spec.u}-${spec.v} has invalid capacity ${spec.capacity}`,
			);
		}
		const key = linkKey(spec.u, spec.v);
		if (lookup.has(key)) {
			throw new RangeError(`Duplicate link ${key.replace(":", "-")}`);
		}

		const link: Link = Object.freeze({
			index: links.length,
			u: Math.min(spec.u, spec.v),
			v: Math.max(spec.u, spec.v),
			capacity: spec.capacity,
		});
		lookup.set(key, link.index);
		links.push(link);
		neighbours[link.u].push(link.v);
		neighbours[link.v].push(link.u);
	}

	for (const list of neighbours) {
		list.sort((a, b) => a - b);
		Object.freeze(list);
	}

	return Object.freeze({
		numNodes,
		links: Object.freeze(links),
		adjacency: Object.freeze(neighbours),
		lookup,
	});
};

export const linkIndex = (
	topology: Topology,
	a: NodeId,
	b: NodeId,
): number | undefined => topology.lookup.get(linkKey(a, b));

export const degrees = (topology: Topology): number[] =>
	topology.adjacency.map((list) => list.length);

/**
 * Whether every node can reach every other node when only the given links
 * are used (all links when no state is passed)
 */
export const isConnected = (
	topology: Topology,
	open?: ArrayLike<number>,
): boolean => {
	const visited = new Uint8Array(topology.numNodes);
	const stack: NodeId[] = [0];
	visited[0] = 1;
	let seen = 1;
	while (stack.length > 0) {
		const node = stack.pop();
		if (node == null) break;
		for (const neighbour of topology.adjacency[node]) {
			if (visited[neighbour]) continue;
			if (open && !open[linkIndex(topology, node, neighbour) ?? -1]) continue;
			visited[neighbour] = 1;
			seen++;
			stack.push(neighbour);
		}
	}
	return seen === topology.numNodes;
};

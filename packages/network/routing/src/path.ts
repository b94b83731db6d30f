import type { NodeId } from "@linkgym/topology";

/**
 * Fewest-hop path between two nodes, breadth first.
 *
 * Neighbours are expanded in the order the adjacency lists them (ascending
 * node id for topologies), and a node's parent is fixed on first discovery,
 * so ties between equally short paths always resolve the same way.
 *
 * @returns the visited nodes from `from` to `to`, or undefined when `to` is unreachable
 */
export const shortestPath = (
	adjacency: readonly (readonly NodeId[])[],
	from: NodeId,
	to: NodeId,
): NodeId[] | undefined => {
	if (from === to) return [from];

	const parent = new Int32Array(adjacency.length).fill(-1);
	parent[from] = from;
	const queue: NodeId[] = [from];
	let head = 0;

	while (head < queue.length) {
		const node = queue[head++];
		for (const neighbour of adjacency[node]) {
			if (parent[neighbour] !== -1) continue;
			parent[neighbour] = node;
			if (neighbour === to) {
				const path: NodeId[] = [to];
				let current = to;
				while (current !== from) {
					current = parent[current];
					path.push(current);
				}
				return path.reverse();
			}
			queue.push(neighbour);
		}
	}
	return undefined;
};

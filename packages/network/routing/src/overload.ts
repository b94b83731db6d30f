import type { Topology } from "@linkgym/topology";

/** Number of links carrying strictly more than their capacity */
export const countOverloaded = (
	topology: Topology,
	usage: ArrayLike<number>,
): number => {
	let overloaded = 0;
	for (const link of topology.links) {
		if (usage[link.index] > link.capacity) overloaded++;
	}
	return overloaded;
};

/** Total usage above capacity, summed over all links */
export const overloadMagnitude = (
	topology: Topology,
	usage: ArrayLike<number>,
): number => {
	let excess = 0;
	for (const link of topology.links) {
		excess += Math.max(0, usage[link.index] - link.capacity);
	}
	return excess;
};

export const usageRatio = (usage: number, capacity: number) =>
	capacity > 0 ? usage / capacity : 0;

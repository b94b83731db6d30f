import { type Random, int } from "@linkgym/random";
import type { DemandMatrix } from "@linkgym/routing";

export interface TrafficDemandGenerator {
	generate(numNodes: number, random: Random): DemandMatrix;
}

/**
 * Independent uniform integer demand in [0, maxDemand) for every ordered
 * pair of distinct nodes, drawn row by row. The diagonal is always zero.
 */
export class UniformDemandGenerator implements TrafficDemandGenerator {
	constructor(readonly maxDemand: number = 50) {
		if (!Number.isInteger(maxDemand) || maxDemand <= 0) {
			throw new RangeError(
				`maxDemand must be a positive integer, got ${maxDemand}`,
			);
		}
	}

	generate(numNodes: number, random: Random): number[][] {
		const demand: number[][] = [];
		for (let i = 0; i < numNodes; i++) {
			const row = new Array<number>(numNodes).fill(0);
			for (let j = 0; j < numNodes; j++) {
				if (i !== j) row[j] = int(random, this.maxDemand);
			}
			demand.push(row);
		}
		return demand;
	}
}

export const copyDemand = (demand: DemandMatrix): number[][] =>
	demand.map((row) => [...row]);

/** Returns a copy of the same matrix on every reset */
export class FixedDemandGenerator implements TrafficDemandGenerator {
	private readonly demand: DemandMatrix;

	constructor(demand: DemandMatrix) {
		const n = demand.length;
		demand.forEach((row, i) => {
			if (row.length !== n) {
				throw new RangeError(
					`Expecting a ${n}x${n} demand matrix, row ${i} has ${row.length} entries`,
				);
			}
			row.forEach((value, j) => {
				if (i === j && value !== 0) {
					throw new RangeError(
						`Demand from node ${i} to itself must be 0, got ${value}`,
					);
				}
				if (!Number.isInteger(value) || value < 0) {
					throw new RangeError(
						`Demand from node ${i} to ${j} must be a non-negative integer, got ${value}`,
					);
				}
			});
		});
		this.demand = copyDemand(demand);
	}

	generate(numNodes: number): number[][] {
		if (this.demand.length !== numNodes) {
			throw new RangeError(
				`Fixed demand covers ${this.demand.length} nodes, expecting ${numNodes}`,
			);
		}
		return copyDemand(this.demand);
	}
}

import { int, mulberry32 } from "@linkgym/random";
import { createTopology, generateTopology } from "@linkgym/topology";
import { expect } from "chai";
import {
	type DemandMatrix,
	countOverloaded,
	openAdjacency,
	overloadMagnitude,
	route,
	shortestPath,
	usageRatio,
} from "../src/index.js";

const matrix = (n: number, entries: [number, number, number][]): number[][] => {
	const out = Array.from({ length: n }, () => new Array<number>(n).fill(0));
	for (const [from, to, amount] of entries) out[from][to] = amount;
	return out;
};

const randomDemand = (n: number, seed: number): DemandMatrix => {
	const random = mulberry32(seed);
	return Array.from({ length: n }, (_, i) =>
		Array.from({ length: n }, (_, j) => (i === j ? 0 : int(random, 50))),
	);
};

const triangle = () =>
	createTopology(3, [
		{ u: 0, v: 1, capacity: 10 },
		{ u: 1, v: 2, capacity: 10 },
		{ u: 0, v: 2, capacity: 10 },
	]);

describe("routing", () => {
	describe("shortestPath", () => {
		const adjacency = [[1, 2], [0, 3], [0, 3], [1, 2], []];

		it("prefers the lowest node id on ties", () => {
			expect(shortestPath(adjacency, 0, 3)).to.deep.equal([0, 1, 3]);
			expect(shortestPath(adjacency, 3, 0)).to.deep.equal([3, 1, 0]);
		});

		it("returns a single node path to itself", () => {
			expect(shortestPath(adjacency, 2, 2)).to.deep.equal([2]);
		});

		it("returns undefined when unreachable", () => {
			expect(shortestPath(adjacency, 0, 4)).to.be.undefined;
		});

		it("counts hops, not adjacency order", () => {
			// 0 -> 1 -> 2 -> 3 and a direct 0 -> 3 listed last
			expect(shortestPath([[1, 3], [0, 2], [1, 3], [0, 2]], 0, 3)).to.deep.equal([
				0, 3,
			]);
		});
	});

	it("open adjacency only keeps open links", () => {
		expect(openAdjacency(triangle(), [1, 0, 1])).to.deep.equal([[1, 2], [0], [0]]);
	});

	describe("route", () => {
		it("sends demand over the direct link when everything is open", () => {
			const topology = triangle();
			const { usage, droppedDemand } = route(
				topology,
				[1, 1, 1],
				matrix(3, [[0, 2, 15]]),
			);
			expect([...usage]).to.deep.equal([0, 0, 15]);
			expect(droppedDemand).to.equal(0);
			expect(countOverloaded(topology, usage)).to.equal(1);
		});

		it("reroutes around a closed link", () => {
			const topology = triangle();
			const { usage } = route(topology, [1, 1, 0], matrix(3, [[0, 2, 15]]));
			expect([...usage]).to.deep.equal([15, 15, 0]);
			expect(countOverloaded(topology, usage)).to.equal(2);
			expect(overloadMagnitude(topology, usage)).to.equal(10);
		});

		it("drops demand with no open path", () => {
			const topology = triangle();
			const { usage, droppedDemand } = route(
				topology,
				[0, 1, 0],
				matrix(3, [[0, 2, 5]]),
			);
			expect([...usage]).to.deep.equal([0, 0, 0]);
			expect(droppedDemand).to.equal(5);
			expect(countOverloaded(topology, usage)).to.equal(0);
		});

		it("keeps demand under capacity unflagged", () => {
			const topology = triangle();
			const { usage } = route(topology, [1, 1, 1], matrix(3, [[0, 2, 5]]));
			expect([...usage]).to.deep.equal([0, 0, 5]);
			expect(countOverloaded(topology, usage)).to.equal(0);
		});

		it("aggregates every demand on a shared link", () => {
			const line = createTopology(3, [
				{ u: 0, v: 1, capacity: 12 },
				{ u: 1, v: 2, capacity: 12 },
			]);
			const { usage } = route(
				line,
				[1, 1],
				matrix(3, [
					[0, 2, 3],
					[2, 0, 4],
					[0, 1, 5],
					[1, 2, 6],
				]),
			);
			expect([...usage]).to.deep.equal([12, 13]);
			// usage equal to capacity is not an overload
			expect(countOverloaded(line, usage)).to.equal(1);
		});

		it("breaks ties towards lower node ids", () => {
			const square = createTopology(4, [
				{ u: 0, v: 1, capacity: 100 },
				{ u: 0, v: 2, capacity: 100 },
				{ u: 1, v: 3, capacity: 100 },
				{ u: 2, v: 3, capacity: 100 },
			]);
			const { usage } = route(
				square,
				[1, 1, 1, 1],
				matrix(4, [
					[0, 3, 7],
					[3, 0, 4],
				]),
			);
			expect([...usage]).to.deep.equal([11, 0, 11, 0]);
		});

		it("ignores the diagonal", () => {
			const { usage } = route(triangle(), [1, 1, 1], matrix(3, [[1, 1, 40]]));
			expect([...usage]).to.deep.equal([0, 0, 0]);
		});

		it("carries nothing when every link is closed", () => {
			for (let seed = 0; seed < 20; seed++) {
				const topology = generateTopology(
					{ numNodes: 8, maxInterfaces: 3, capacity: 10 },
					mulberry32(seed),
				);
				const closed = new Array<number>(topology.links.length).fill(0);
				const demand = randomDemand(8, seed + 100);
				const { usage } = route(topology, closed, demand);
				expect([...usage].every((u) => u === 0)).to.be.true;
				expect(countOverloaded(topology, usage)).to.equal(0);
			}
		});

		it("never overloads links larger than the total demand", () => {
			for (let seed = 0; seed < 20; seed++) {
				const demand = randomDemand(7, seed);
				const total = demand.flat().reduce((a, b) => a + b, 0);
				const topology = generateTopology(
					{ numNodes: 7, maxInterfaces: 3, capacity: total + 1 },
					mulberry32(seed),
				);
				const open = new Array<number>(topology.links.length).fill(1);
				const { usage, droppedDemand } = route(topology, open, demand);
				expect(droppedDemand).to.equal(0);
				expect(countOverloaded(topology, usage)).to.equal(0);
			}
		});

		it("is deterministic", () => {
			const topology = generateTopology(
				{ numNodes: 10, maxInterfaces: 4, capacity: 100 },
				mulberry32(8),
			);
			const random = mulberry32(9);
			const state = topology.links.map(() => (random() < 0.7 ? 1 : 0));
			const demand = randomDemand(10, 10);
			const a = route(topology, state, demand);
			const b = route(topology, state, demand);
			expect(a.usage).to.deep.equal(b.usage);
			expect(a.droppedDemand).to.equal(b.droppedDemand);
		});

		it("rejects mismatched inputs", () => {
			expect(() => route(triangle(), [1, 1], matrix(3, []))).to.throw(
				RangeError,
				"Expecting 3 link states, got 2",
			);
			expect(() => route(triangle(), [1, 1, 1], matrix(2, []))).to.throw(
				RangeError,
				"Expecting a 3x3 demand matrix",
			);
		});
	});

	it("usage ratio is zero without capacity", () => {
		expect(usageRatio(5, 0)).to.equal(0);
		expect(usageRatio(15, 10)).to.equal(1.5);
	});
});

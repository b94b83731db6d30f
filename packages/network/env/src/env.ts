import { logger } from "@linkgym/logger";
import { type Random, mulberry32, randomSeed } from "@linkgym/random";
import {
	type DemandMatrix,
	countOverloaded,
	overloadMagnitude,
	route,
	usageRatio,
} from "@linkgym/routing";
import { type Topology, generateTopology } from "@linkgym/topology";
import { type NetworkEnvOptions, resolveNetworkEnvOptions } from "./config.js";
import {
	InvalidActionError,
	InvalidConfigError,
	NotResetError,
} from "./errors.js";
import {
	type TrafficDemandGenerator,
	UniformDemandGenerator,
	copyDemand,
} from "./traffic.js";

const log = logger({ module: "linkgym:env" });

/** `[ratio, open]` per link, flattened in link order */
export type Observation = Float32Array;

/** One flag per link in link order, 1 (or true) keeps the link open */
export type Action = ArrayLike<number | boolean>;

export interface StepInfo {
	overloadedLinks: number;
	droppedDemand: number;
	overloadMagnitude: number;
	step: number;
}

export interface StepResult<O, I> {
	observation: O;
	reward: number;
	done: boolean;
	info: I;
}

export interface Environment<O, A, I> {
	reset(): O;
	step(action: A): StepResult<O, I>;
}

export interface EnvSpaces {
	observation: { size: number; low: Float32Array; high: Float32Array };
	action: { size: number };
}

export interface NetworkEnvComponents {
	/** Random source for topology and demand generation, replaces `seed` */
	random?: Random;
	/** Use this topology instead of generating one */
	topology?: Topology;
	/** Replaces uniform demand generation (and with it `maxDemand`) */
	traffic?: TrafficDemandGenerator;
}

interface EpisodeState {
	demand: DemandMatrix;
	linkState: Uint8Array;
	usage: Float64Array;
}

const toLinkState = (action: Action, numLinks: number): Uint8Array => {
	if (action == null || typeof action.length !== "number") {
		throw new InvalidActionError("Action must be a sequence of link flags");
	}
	if (action.length !== numLinks) {
		throw new InvalidActionError(
			`Expecting ${numLinks} link flags, got ${action.length}`,
		);
	}
	const state = new Uint8Array(numLinks);
	for (let i = 0; i < numLinks; i++) {
		const flag = action[i];
		if (flag === 1 || flag === true) {
			state[i] = 1;
		} else if (flag !== 0 && flag !== false) {
			throw new InvalidActionError(
				`Link flag at ${i} must be 0 or 1, got ${String(flag)}`,
			);
		}
	}
	return state;
};

/**
 * Link failure environment. The controller picks which links stay open,
 * every demand is rerouted over the open links and the reward is the
 * negated number of overloaded links.
 */
export class NetworkEnv
	implements Environment<Observation, Action, StepInfo>
{
	readonly options: NetworkEnvOptions;
	readonly topology: Topology;
	/** Seed of the random source, undefined when one was injected */
	readonly seed?: number;

	private readonly random: Random;
	private readonly traffic: TrafficDemandGenerator;
	private state?: EpisodeState;
	private _step = 0;

	constructor(
		options: Partial<NetworkEnvOptions> = {},
		components: NetworkEnvComponents = {},
	) {
		this.options = resolveNetworkEnvOptions(options);

		if (components.random) {
			if (this.options.seed != null) {
				throw new InvalidConfigError(
					"seed",
					"cannot be combined with an injected random source",
				);
			}
			this.random = components.random;
		} else {
			this.seed = this.options.seed ?? randomSeed();
			this.random = mulberry32(this.seed);
		}

		if (components.topology) {
			if (components.topology.numNodes !== this.options.numNodes) {
				throw new InvalidConfigError(
					"numNodes",
					`topology has ${components.topology.numNodes} nodes, expecting ${this.options.numNodes}`,
				);
			}
			this.topology = components.topology;
		} else {
			this.topology = generateTopology(
				{
					numNodes: this.options.numNodes,
					maxInterfaces: this.options.maxInterfaces,
					capacity: this.options.maxCapacity,
				},
				this.random,
			);
		}

		this.traffic =
			components.traffic ?? new UniformDemandGenerator(this.options.maxDemand);

		log.debug(
			{
				seed: this.seed,
				numNodes: this.topology.numNodes,
				links: this.topology.links.length,
			},
			"topology ready",
		);
	}

	get numLinks(): number {
		return this.topology.links.length;
	}

	get currentStep(): number {
		return this._step;
	}

	get done(): boolean {
		return this._step >= this.options.maxSteps;
	}

	get demand(): DemandMatrix {
		return copyDemand(this.current().demand);
	}

	get usage(): Float64Array {
		return Float64Array.from(this.current().usage);
	}

	get linkState(): Uint8Array {
		return Uint8Array.from(this.current().linkState);
	}

	get spaces(): EnvSpaces {
		const size = 2 * this.numLinks;
		const high = new Float32Array(size);
		for (let i = 0; i < this.numLinks; i++) {
			high[2 * i] = Infinity;
			high[2 * i + 1] = 1;
		}
		return {
			observation: { size, low: new Float32Array(size), high },
			action: { size: this.numLinks },
		};
	}

	reset(): Observation {
		this._step = 0;
		// generators may return a matrix they keep a reference to
		const demand = copyDemand(
			this.traffic.generate(this.topology.numNodes, this.random),
		);
		const linkState = new Uint8Array(this.numLinks).fill(1);
		const { usage, droppedDemand } = route(this.topology, linkState, demand);
		this.state = { demand, linkState, usage };
		log.debug({ droppedDemand }, "reset");
		return this.observe();
	}

	step(action: Action): StepResult<Observation, StepInfo> {
		const state = this.current();
		const linkState = toLinkState(action, this.numLinks);

		const { usage, droppedDemand } = route(
			this.topology,
			linkState,
			state.demand,
		);
		this.state = { demand: state.demand, linkState, usage };

		const overloadedLinks = countOverloaded(this.topology, usage);
		this._step += 1;

		const info: StepInfo = {
			overloadedLinks,
			droppedDemand,
			overloadMagnitude: overloadMagnitude(this.topology, usage),
			step: this._step,
		};
		log.trace(info, "step");

		return {
			observation: this.observe(),
			reward: 0 - overloadedLinks,
			done: this.done,
			info,
		};
	}

	render(): string {
		const { linkState, usage } = this.current();
		const lines = [`step: ${this._step}`];
		for (const link of this.topology.links) {
			lines.push(
				`link ${link.u}-${link.v} | open=${linkState[link.index]} | usage=${usage[link.index].toFixed(2)} / ${link.capacity}`,
			);
		}
		return lines.join("\n");
	}

	private current(): EpisodeState {
		if (!this.state) {
			throw new NotResetError();
		}
		return this.state;
	}

	private observe(): Observation {
		const { linkState, usage } = this.current();
		const observation = new Float32Array(2 * this.numLinks);
		for (const link of this.topology.links) {
			observation[2 * link.index] = usageRatio(usage[link.index], link.capacity);
			observation[2 * link.index + 1] = linkState[link.index];
		}
		return observation;
	}
}

import { type Random, mulberry32 } from "@linkgym/random";
import { type NetworkEnvOptions, resolveNetworkEnvOptions } from "./config.js";
import { type Action, NetworkEnv, type Observation } from "./env.js";

export type Policy = (observation: Observation, env: NetworkEnv) => Action;

export const policyNames = ["open", "random"] as const;

export type PolicyName = (typeof policyNames)[number];

export const policies: Record<PolicyName, (random: Random) => Policy> = {
	open: () => (_observation, env) => new Array<number>(env.numLinks).fill(1),
	random: (random) => (_observation, env) =>
		Array.from({ length: env.numLinks }, () => (random() < 0.5 ? 1 : 0)),
};

export const isPolicyName = (value: string): value is PolicyName =>
	policyNames.some((name) => name === value);

export type EpisodeRunParams = NetworkEnvOptions & {
	seed: number;
	episodes: number;
	policy: PolicyName;
	/** Collect a rendered dump after every step */
	render: boolean;
};

export type EpisodeResult = {
	episode: number;
	steps: number;
	totalReward: number;
	lastOverloadedLinks: number;
	maxOverloadedLinks: number;
	droppedDemand: number;
	frames: string[];
};

export type EpisodeRunResult = {
	params: EpisodeRunParams;
	numLinks: number;
	episodes: EpisodeResult[];
	meanReward: number;
};

export const resolveEpisodeRunParams = (
	input: Partial<EpisodeRunParams>,
): EpisodeRunParams => {
	const episodes = input.episodes ?? 1;
	if (!Number.isInteger(episodes) || episodes <= 0) {
		throw new RangeError(`episodes must be a positive integer, got ${episodes}`);
	}
	const policy = input.policy ?? "open";
	if (!isPolicyName(policy)) {
		throw new RangeError(
			`Unknown policy: ${policy}. Expecting one of: ${JSON.stringify(policyNames)}`,
		);
	}
	const seed = input.seed ?? 1;
	return {
		...resolveNetworkEnvOptions({ ...input, seed }),
		seed,
		episodes,
		policy,
		render: input.render ?? false,
	};
};

/**
 * Run whole episodes against a baseline policy. The policy draws from its
 * own stream (seed + 1) so it never shifts the environment's demand.
 */
export const runEpisodes = (
	input: Partial<EpisodeRunParams>,
): EpisodeRunResult => {
	const params = resolveEpisodeRunParams(input);
	const env = new NetworkEnv(params);
	const policy = policies[params.policy](mulberry32(params.seed + 1));

	const episodes: EpisodeResult[] = [];
	for (let episode = 0; episode < params.episodes; episode++) {
		let observation = env.reset();
		const result: EpisodeResult = {
			episode,
			steps: 0,
			totalReward: 0,
			lastOverloadedLinks: 0,
			maxOverloadedLinks: 0,
			droppedDemand: 0,
			frames: [],
		};
		for (;;) {
			const step = env.step(policy(observation, env));
			observation = step.observation;
			result.steps++;
			result.totalReward += step.reward;
			result.lastOverloadedLinks = step.info.overloadedLinks;
			result.maxOverloadedLinks = Math.max(
				result.maxOverloadedLinks,
				step.info.overloadedLinks,
			);
			result.droppedDemand += step.info.droppedDemand;
			if (params.render) result.frames.push(env.render());
			if (step.done) break;
		}
		episodes.push(result);
	}

	return {
		params,
		numLinks: env.numLinks,
		episodes,
		meanReward:
			episodes.reduce((sum, e) => sum + e.totalReward, 0) / episodes.length,
	};
};

export const formatEpisodeRunResult = (r: EpisodeRunResult) => {
	const p = r.params;
	const lines: string[] = [];
	lines.push("linkgym episode results");
	lines.push(
		`- nodes: ${p.numNodes}, maxInterfaces: ${p.maxInterfaces}, links: ${r.numLinks}, capacity: ${p.maxCapacity}`,
	);
	lines.push(
		`- policy: ${p.policy}, episodes: ${p.episodes}, maxSteps: ${p.maxSteps}, maxDemand: ${p.maxDemand}, seed: ${p.seed}`,
	);
	for (const e of r.episodes) {
		lines.push(
			`- episode ${e.episode}: steps=${e.steps}, reward=${e.totalReward}, overloaded(last)=${e.lastOverloadedLinks}, overloaded(max)=${e.maxOverloadedLinks}, dropped=${e.droppedDemand}`,
		);
		for (const frame of e.frames) lines.push(frame);
	}
	lines.push(`- mean reward: ${r.meanReward.toFixed(2)}`);
	return lines.join("\n");
};

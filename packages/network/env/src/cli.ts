import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { DEFAULT_OPTIONS } from "./config.js";
import { NetworkEnv } from "./env.js";
import { formatEpisodeRunResult, policyNames, runEpisodes } from "./runner.js";

export const cli = async (
	args: string[] = hideBin(process.argv),
	print: (text: string) => void = console.log,
) => {
	return yargs(args)
		.scriptName("linkgym")
		.option("nodes", {
			describe: "Number of nodes",
			type: "number",
			alias: "n",
			default: DEFAULT_OPTIONS.numNodes,
		})
		.option("max-interfaces", {
			describe: "Maximum number of links per node",
			type: "number",
			default: DEFAULT_OPTIONS.maxInterfaces,
		})
		.option("capacity", {
			describe: "Capacity of every link",
			type: "number",
			default: DEFAULT_OPTIONS.maxCapacity,
		})
		.option("seed", {
			describe: "RNG seed",
			type: "number",
			default: 1,
		})
		.command({
			command: "run",
			describe: "Run episodes against a baseline policy",
			builder: (yargs) =>
				yargs
					.option("episodes", {
						describe: "Number of episodes",
						type: "number",
						alias: "e",
						default: 1,
					})
					.option("max-steps", {
						describe: "Steps per episode",
						type: "number",
						default: DEFAULT_OPTIONS.maxSteps,
					})
					.option("max-demand", {
						describe: "Exclusive upper bound of each demand",
						type: "number",
						default: DEFAULT_OPTIONS.maxDemand,
					})
					.option("policy", {
						describe: "Which links to keep open",
						choices: policyNames,
						default: "open" as const,
					})
					.option("render", {
						describe: "Print link usage after every step",
						type: "boolean",
						default: false,
					}),
			handler: (args) => {
				const result = runEpisodes({
					numNodes: args.nodes,
					maxInterfaces: args["max-interfaces"],
					maxCapacity: args.capacity,
					maxSteps: args["max-steps"],
					maxDemand: args["max-demand"],
					seed: args.seed,
					episodes: args.episodes,
					policy: args.policy,
					render: args.render,
				});
				print(formatEpisodeRunResult(result));
			},
		})
		.command({
			command: "topology",
			describe: "Print the generated link list",
			handler: (args) => {
				const { topology } = new NetworkEnv({
					numNodes: args.nodes,
					maxInterfaces: args["max-interfaces"],
					maxCapacity: args.capacity,
					seed: args.seed,
				});
				print(
					topology.links
						.map((l) => `${l.index}: ${l.u}-${l.v} capacity=${l.capacity}`)
						.join("\n"),
				);
			},
		})
		.demandCommand(1)
		.strict()
		.help()
		.parseAsync();
};

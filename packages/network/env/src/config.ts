import { InvalidConfigError } from "./errors.js";

export type NetworkEnvOptions = {
	numNodes: number;
	/** Maximum number of links per node */
	maxInterfaces: number;
	/** Capacity of every generated link */
	maxCapacity: number;
	/** Episode horizon */
	maxSteps: number;
	/** Exclusive upper bound of every generated demand */
	maxDemand: number;
	/** Seeds both topology and demand generation when set */
	seed?: number;
};

export const DEFAULT_OPTIONS: Readonly<Omit<NetworkEnvOptions, "seed">> = {
	numNodes: 6,
	maxInterfaces: 4,
	maxCapacity: 100,
	maxSteps: 10,
	maxDemand: 50,
};

/** Seeds are 32 bit, larger values would alias smaller ones */
export const MAX_SEED = 0xffff_ffff;

const positiveInt = (option: string, value: number) => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new InvalidConfigError(
			option,
			`expecting a positive integer, got ${value}`,
		);
	}
	return value;
};

export const resolveNetworkEnvOptions = (
	input: Partial<NetworkEnvOptions> = {},
): NetworkEnvOptions => {
	const maxCapacity = input.maxCapacity ?? DEFAULT_OPTIONS.maxCapacity;
	if (!Number.isFinite(maxCapacity) || maxCapacity < 0) {
		throw new InvalidConfigError(
			"maxCapacity",
			`expecting a finite number >= 0, got ${maxCapacity}`,
		);
	}
	if (
		input.seed != null &&
		(!Number.isInteger(input.seed) || input.seed < 0 || input.seed > MAX_SEED)
	) {
		throw new InvalidConfigError(
			"seed",
			`expecting an integer in [0, ${MAX_SEED}], got ${input.seed}`,
		);
	}

	return {
		numNodes: positiveInt("numNodes", input.numNodes ?? DEFAULT_OPTIONS.numNodes),
		maxInterfaces: positiveInt(
			"maxInterfaces",
			input.maxInterfaces ?? DEFAULT_OPTIONS.maxInterfaces,
		),
		maxCapacity,
		maxSteps: positiveInt("maxSteps", input.maxSteps ?? DEFAULT_OPTIONS.maxSteps),
		maxDemand: positiveInt(
			"maxDemand",
			input.maxDemand ?? DEFAULT_OPTIONS.maxDemand,
		),
		seed: input.seed,
	};
};

/**
 * A source of uniformly distributed numbers in [0, 1).
 */
export type Random = () => number;

/**
 * Small seeded generator with 32 bits of state. Every call advances the
 * stream, so one instance yields a reproducible sequence for a given seed.
 */
export const mulberry32 = (seed: number): Random => {
	let t = seed >>> 0;
	return () => {
		t += 0x6d2b79f5;
		let x = t;
		x = Math.imul(x ^ (x >>> 15), x | 1);
		x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	};
};

export const int = (random: Random, maxExclusive: number) =>
	Math.floor(random() * maxExclusive);

/**
 * In-place Fisher–Yates shuffle
 */
export const shuffle = <T>(random: Random, values: T[]): T[] => {
	for (let i = values.length - 1; i > 0; i--) {
		const j = int(random, i + 1);
		const tmp = values[i];
		values[i] = values[j];
		values[j] = tmp;
	}
	return values;
};

export const randomSeed = () => int(Math.random, 0x1_0000_0000);

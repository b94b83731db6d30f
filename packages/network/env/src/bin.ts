#!/usr/bin/env node
import { cli } from "./cli.js";

try {
	await cli();
} catch (e) {
	console.error(e instanceof Error ? e.message : e);
	process.exit(1);
}

export class InvalidActionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvalidActionError";
	}
}

export class InvalidConfigError extends Error {
	constructor(
		readonly option: string,
		message: string,
	) {
		super(`Invalid option '${option}': ${message}`);
		this.name = "InvalidConfigError";
	}
}

export class NotResetError extends Error {
	constructor(
		message: string = "Not reset. Please invoke 'env.reset()' before calling this method",
	) {
		super(message);
		this.name = "NotResetError";
	}
}

export type TemplateErrorCode =
	| "MalformedInput"
	| "AmountExceeded"
	| "AmountMismatch"
	| "EmptyOutputSet"
	| "AlreadyFinalized"
	| "InvariantViolation";

export abstract class TemplateError extends Error {
	public abstract readonly code: TemplateErrorCode;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** A negative, fractional, non-finite or otherwise unusable value reached an entry point. */
export class MalformedInput extends TemplateError {
	public readonly code = "MalformedInput";
}

export class AmountExceeded extends TemplateError {
	public readonly code = "AmountExceeded";

	constructor(public readonly total: bigint, public readonly max: bigint) {
		super(`outputs total ${total} sats, above the maximum of ${max} sats`);
	}
}

/** Strict builders require the outputs to spend exactly `max`. */
export class AmountMismatch extends TemplateError {
	public readonly code = "AmountMismatch";

	constructor(public readonly total: bigint, public readonly max: bigint) {
		super(`outputs total ${total} sats, strict template requires exactly ${max} sats`);
	}
}

export class EmptyOutputSet extends TemplateError {
	public readonly code = "EmptyOutputSet";

	constructor() {
		super("a template needs at least one output");
	}
}

export class AlreadyFinalized extends TemplateError {
	public readonly code = "AlreadyFinalized";

	constructor(operation: string) {
		super(`cannot ${operation}: builder was already finalized`);
	}
}

/** A claimed value disagrees with what the template content actually commits to. */
export class InvariantViolation extends TemplateError {
	public readonly code = "InvariantViolation";
}

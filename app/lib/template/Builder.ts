import { bytesToHex } from "@noble/hashes/utils";
import { MAX_MONEY, MAX_TX_BYTES, TEMPLATE_TX_VERSION } from "~/lib/constants.ts";
import { log } from "~/lib/logging/log.ts";
import { Tx, type TxIn, type TxOut } from "~/lib/primitives/Tx.ts";
import { AbsoluteLock } from "~/lib/primitives/weirdness/AbsoluteLock.ts";
import { SequenceLock } from "~/lib/primitives/weirdness/SequenceLock.ts";
import { Amount } from "~/lib/template/Amount.ts";
import { Clause } from "~/lib/template/Clause.ts";
import {
	AlreadyFinalized,
	AmountExceeded,
	AmountMismatch,
	EmptyOutputSet,
	MalformedInput,
} from "~/lib/template/errors.ts";
import { type JsonValue, TemplateMetadata } from "~/lib/template/Metadata.ts";
import { LockingCondition, type Output } from "~/lib/template/Output.ts";
import { TEMPLATE_CONSTRUCTOR_TOKEN, Template } from "~/lib/template/Template.ts";
import { templateHash } from "~/lib/template/templateHash.ts";

export type BuilderState = "accumulating" | "finalized";

export type BuilderOptions = {
	/** Require the outputs to add up to exactly `max` instead of at most. */
	strict?: boolean;
	max?: bigint | number;
};

// Template inputs spend an outpoint nobody knows yet; the hash does not commit to it.
const NULL_TXID = new Uint8Array(32);
const NULL_VOUT = 0xffffffff;

/**
 * Assembles a template output by output and guard by guard.
 *
 * `finalize()` validates, builds the transaction and computes its template
 * hash once. A failed `finalize()` leaves everything as it was so the
 * caller can correct it and try again; a successful one ends the builder.
 */
export class Builder {
	#state: BuilderState = "accumulating";
	#outputs: Output[] = [];
	#guards: Clause[] = [];
	#max: Amount | undefined;
	#minFeerate: Amount | undefined;
	#lockTime: AbsoluteLock = { kind: "none" };
	#sequences: (SequenceLock | undefined)[] = [undefined];
	#metadata: TemplateMetadata = TemplateMetadata.empty();

	public readonly strict: boolean;

	constructor(options: BuilderOptions = {}) {
		this.strict = options.strict ?? false;
		if (options.max !== undefined) this.#max = Amount.from(options.max, "max");
	}

	public get state(): BuilderState {
		return this.#state;
	}

	public pendingTotal(): Amount {
		return Amount.sum(this.#outputs.map((output) => output.amount));
	}

	public pendingOutputs(): number {
		return this.#outputs.length;
	}

	public addOutput(amount: bigint | number, script: Uint8Array, metadata = TemplateMetadata.empty()): this {
		this.#assertAccumulating("add an output");
		const value = Amount.from(amount);
		if (!(script instanceof Uint8Array) || script.length > MAX_TX_BYTES) {
			throw new MalformedInput("output script must be a byte array no larger than a transaction");
		}
		this.#outputs.push(Object.freeze({ amount: value, script: script.slice(), metadata: ownMetadata(metadata) }));
		return this;
	}

	/** Pays `amount` to an output that can only be spent by `child`'s transaction. */
	public addTemplateOutput(amount: bigint | number, child: Template, metadata = TemplateMetadata.empty()): this {
		this.#assertAccumulating("add an output");
		const value = Amount.from(amount);
		const needed = child.totalAmount();
		if (value < needed) throw new AmountExceeded(needed, value);
		return this.addOutput(value, LockingCondition.ctv(child.hash()), metadata);
	}

	public removeOutput(index: number): Output {
		this.#assertAccumulating("remove an output");
		const [removed] = Number.isInteger(index) && index >= 0 ? this.#outputs.splice(index, 1) : [];
		if (removed === undefined) {
			throw new MalformedInput(`no pending output at index ${index} (have ${this.#outputs.length})`);
		}
		return removed;
	}

	public addGuard(guard: Clause): this {
		this.#assertAccumulating("add a guard");
		this.#guards.push(Clause.copy(guard));
		return this;
	}

	public setMax(amount: bigint | number): this {
		this.#assertAccumulating("set the maximum");
		this.#max = Amount.from(amount, "max");
		return this;
	}

	public setMinFeerate(satsPerVbyte: bigint | number): this {
		this.#assertAccumulating("set the minimum feerate");
		this.#minFeerate = Amount.from(satsPerVbyte, "min feerate");
		return this;
	}

	public setLockTime(lock: AbsoluteLock): this {
		this.#assertAccumulating("set the lock time");
		try {
			AbsoluteLock.encode(lock);
		} catch (cause) {
			throw new MalformedInput(`invalid lock time: ${String(cause)}`, { cause });
		}
		this.#lockTime = Object.freeze({ ...lock });
		return this;
	}

	/** Adds another input and returns its index. Unset sequences get a default at finalize. */
	public addInput(sequence?: SequenceLock): number {
		this.#assertAccumulating("add an input");
		this.#sequences.push(sequence === undefined ? undefined : ownSequence(sequence));
		return this.#sequences.length - 1;
	}

	public setSequence(index: number, sequence: SequenceLock): this {
		this.#assertAccumulating("set a sequence");
		if (!Number.isInteger(index) || index < 0 || index >= this.#sequences.length) {
			throw new MalformedInput(`no input at index ${index} (have ${this.#sequences.length})`);
		}
		this.#sequences[index] = ownSequence(sequence);
		return this;
	}

	public setLabel(label: string): this {
		this.#assertAccumulating("set the label");
		this.#metadata = TemplateMetadata.update(this.#metadata, { label });
		return this;
	}

	public setColor(color: string): this {
		this.#assertAccumulating("set the color");
		this.#metadata = TemplateMetadata.update(this.#metadata, { color });
		return this;
	}

	public setExtra(key: string, value: JsonValue): this {
		this.#assertAccumulating("set metadata");
		this.#metadata = TemplateMetadata.withExtra(this.#metadata, key, value);
		return this;
	}

	public setMetadata(metadata: TemplateMetadata): this {
		this.#assertAccumulating("set metadata");
		this.#metadata = ownMetadata(metadata);
		return this;
	}

	public finalize(ctvIndex = 0): Template {
		this.#assertAccumulating("finalize");

		if (this.#outputs.length === 0) throw new EmptyOutputSet();
		if (!Number.isInteger(ctvIndex) || ctvIndex < 0 || ctvIndex >= this.#sequences.length) {
			throw new MalformedInput(`template hash index ${ctvIndex} is not one of the ${this.#sequences.length} inputs`);
		}

		const total = this.pendingTotal();
		if (total > MAX_MONEY) throw new AmountExceeded(total, MAX_MONEY);
		const max = this.#max ?? total;
		if (total > max) throw new AmountExceeded(total, max);
		if (this.strict && total < max) throw new AmountMismatch(total, max);

		const tx = this.#buildTx();
		const txBytes = Tx.encode(tx);
		const ctv = templateHash(tx, ctvIndex);

		const template = new Template(TEMPLATE_CONSTRUCTOR_TOKEN, {
			guards: this.#guards,
			ctv,
			ctvIndex,
			max,
			minFeerateSatsVbyte: this.#minFeerate,
			metadata: this.#metadata,
			txBytes,
			outputs: this.#outputs,
		});

		this.#state = "finalized";
		log.debug("template finalized", {
			hash: bytesToHex(ctv),
			outputs: this.#outputs.length,
			total,
			max,
			label: this.#metadata.label,
		});
		return template;
	}

	#buildTx(): Tx {
		// with every input final the lock time would not be enforced
		const defaultSequence = this.#lockTime.kind === "none" ? SequenceLock.final() : SequenceLock.lockTimeEnabled();

		const vin: TxIn[] = this.#sequences.map((sequence) => ({
			txId: NULL_TXID.slice(),
			vout: NULL_VOUT,
			scriptSig: new Uint8Array(),
			sequenceLock: sequence ?? defaultSequence,
			witness: [],
		}));
		const vout: TxOut[] = this.#outputs.map((output) => ({ value: output.amount, scriptPubKey: output.script }));

		return { version: TEMPLATE_TX_VERSION, vin, vout, absoluteLock: this.#lockTime, witness: false };
	}

	#assertAccumulating(operation: string): void {
		if (this.#state === "finalized") throw new AlreadyFinalized(operation);
	}
}

function ownMetadata(metadata: TemplateMetadata): TemplateMetadata {
	return TemplateMetadata.create({ label: metadata.label, color: metadata.color, extra: metadata.extra });
}

function ownSequence(sequence: SequenceLock): SequenceLock {
	try {
		return SequenceLock.from(sequence);
	} catch (cause) {
		throw new MalformedInput(`invalid sequence: ${String(cause)}`, { cause });
	}
}

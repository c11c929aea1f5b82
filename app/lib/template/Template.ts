import { bytesToHex } from "@noble/hashes/utils";
import { bytes32 } from "~/lib/primitives/Bytes32.ts";
import { Tx } from "~/lib/primitives/Tx.ts";
import { Amount } from "~/lib/template/Amount.ts";
import { Clause } from "~/lib/template/Clause.ts";
import { InvariantViolation } from "~/lib/template/errors.ts";
import { type JsonValue, TemplateMetadata, type TemplateMetadataRecord } from "~/lib/template/Metadata.ts";
import { Output } from "~/lib/template/Output.ts";
import { templateHash } from "~/lib/template/templateHash.ts";

/** Only holders of this token construct templates; it is not exported from the package. */
export const TEMPLATE_CONSTRUCTOR_TOKEN: unique symbol = Symbol("Template");

export type TemplateFields = {
	guards: readonly Clause[];
	ctv: Uint8Array;
	ctvIndex: number;
	max: Amount;
	minFeerateSatsVbyte: Amount | undefined;
	metadata: TemplateMetadata;
	txBytes: Uint8Array;
	outputs: readonly Output[];
};

export type OutputRecord = {
	amount_sats: number;
	metadata_map_s2s?: TemplateMetadataRecord;
};

export type TemplateRecord = {
	additional_preconditions: JsonValue[];
	precomputed_template_hash: string;
	precomputed_template_hash_idx: number;
	max_amount_sats: number;
	min_feerate_sats_vbyte?: number;
	metadata_map_s2s?: TemplateMetadataRecord;
	transaction_literal: string;
	outputs_info: OutputRecord[];
};

/**
 * A committed transaction template. Instances come out of `Builder.finalize()`
 * and never change afterwards: byte-valued accessors hand out copies, the
 * transaction is decoded fresh from the bytes the hash was computed over.
 */
export class Template {
	readonly #ctv: Uint8Array;
	readonly #txBytes: Uint8Array;
	readonly #outputs: readonly Output[];

	/** ANDed together. */
	public readonly guards: readonly Clause[];
	public readonly ctvIndex: number;
	public readonly max: Amount;
	public readonly minFeerateSatsVbyte: Amount | undefined;
	public readonly metadata: TemplateMetadata;

	constructor(token: typeof TEMPLATE_CONSTRUCTOR_TOKEN, fields: TemplateFields) {
		if (token !== TEMPLATE_CONSTRUCTOR_TOKEN) {
			throw new TypeError("templates are created with Builder.finalize()");
		}
		this.#ctv = bytes32.encode(fields.ctv);
		this.#txBytes = fields.txBytes.slice();
		this.#outputs = Object.freeze(fields.outputs.map(Output.copy));
		this.guards = Object.freeze([...fields.guards]);
		this.ctvIndex = fields.ctvIndex;
		this.max = fields.max;
		this.minFeerateSatsVbyte = fields.minFeerateSatsVbyte;
		this.metadata = fields.metadata;
		Object.freeze(this);
	}

	public get ctv(): Uint8Array {
		return this.#ctv.slice();
	}

	public hash(): Uint8Array {
		return this.ctv;
	}

	public hashHex(): string {
		return bytesToHex(this.#ctv);
	}

	public get tx(): Tx {
		return Tx.decode(this.#txBytes);
	}

	public txBytes(): Uint8Array {
		return this.#txBytes.slice();
	}

	public get outputs(): Output[] {
		return this.#outputs.map(Output.copy);
	}

	/** What has to be sent to this template for its transaction to be fully funded, fees aside. */
	public totalAmount(): Amount {
		return Amount.sum(this.#outputs.map((output) => output.amount));
	}

	public guard(): Clause {
		return Clause.all(this.guards);
	}

	/** Recomputes everything the cached hash and bounds claim. */
	public verify(): void {
		const tx = this.tx;
		const recomputed = templateHash(tx, this.ctvIndex);
		if (bytesToHex(recomputed) !== this.hashHex()) {
			throw new InvariantViolation(
				`cached template hash ${this.hashHex()} does not match recomputed ${bytesToHex(recomputed)}`,
			);
		}
		if (tx.vout.length !== this.#outputs.length) {
			throw new InvariantViolation(
				`transaction has ${tx.vout.length} outputs but ${this.#outputs.length} are described`,
			);
		}
		tx.vout.forEach((vout, i) => {
			const output = this.#outputs[i];
			if (output === undefined || output.amount !== vout.value) {
				throw new InvariantViolation(`output ${i} amount ${output?.amount} does not match transaction value ${vout.value}`);
			}
			if (bytesToHex(output.script) !== bytesToHex(vout.scriptPubKey)) {
				throw new InvariantViolation(`output ${i} script does not match the transaction`);
			}
		});
		const total = this.totalAmount();
		if (total > this.max) {
			throw new InvariantViolation(`outputs total ${total} sats, above the maximum of ${this.max} sats`);
		}
	}

	public toJSON(): TemplateRecord {
		const record: TemplateRecord = {
			additional_preconditions: this.guards.map((guard) => Clause.toJSON(guard)),
			precomputed_template_hash: this.hashHex(),
			precomputed_template_hash_idx: this.ctvIndex,
			max_amount_sats: Number(this.max),
			transaction_literal: bytesToHex(this.#txBytes),
			outputs_info: this.#outputs.map((output) => {
				const info: OutputRecord = { amount_sats: Number(output.amount) };
				if (!TemplateMetadata.isEmpty(output.metadata)) {
					info.metadata_map_s2s = TemplateMetadata.toJSON(output.metadata);
				}
				return info;
			}),
		};
		if (this.minFeerateSatsVbyte !== undefined) {
			record.min_feerate_sats_vbyte = Number(this.minFeerateSatsVbyte);
		}
		if (!TemplateMetadata.isEmpty(this.metadata)) {
			record.metadata_map_s2s = TemplateMetadata.toJSON(this.metadata);
		}
		return record;
	}
}

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { z } from "zod";
import { log } from "~/lib/logging/log.ts";
import { Tx } from "~/lib/primitives/Tx.ts";
import { Builder } from "~/lib/template/Builder.ts";
import { Clause } from "~/lib/template/Clause.ts";
import { InvariantViolation, MalformedInput } from "~/lib/template/errors.ts";
import { TemplateMetadata } from "~/lib/template/Metadata.ts";
import type { Template } from "~/lib/template/Template.ts";

const Sats = z.number().int().nonnegative();
const Hex = z.string().regex(/^([0-9a-fA-F]{2})*$/, "expected an even-length hex string");

export const OutputRecordSchema = z.object({
	amount_sats: Sats,
	metadata_map_s2s: z.unknown().optional(),
});

export const TemplateRecordSchema = z.object({
	additional_preconditions: z.array(z.unknown()).default([]),
	precomputed_template_hash: Hex.length(64),
	precomputed_template_hash_idx: z.number().int().nonnegative().max(0xffffffff),
	max_amount_sats: Sats,
	min_feerate_sats_vbyte: Sats.optional(),
	metadata_map_s2s: z.unknown().optional(),
	transaction_literal: Hex,
	outputs_info: z.array(OutputRecordSchema),
});

/**
 * Reads a template record written by `Template.toJSON()`.
 *
 * The record is replayed through a `Builder`, so the result satisfies every
 * template invariant; a record whose hash, transaction or output amounts
 * claim something the rebuilt template does not is an `InvariantViolation`.
 */
export function parseTemplate(value: unknown): Template {
	const parsed = TemplateRecordSchema.safeParse(value);
	if (!parsed.success) {
		throw new MalformedInput("not a template record", { cause: parsed.error });
	}
	const record = parsed.data;

	let tx: Tx;
	try {
		tx = Tx.decode(hexToBytes(record.transaction_literal));
	} catch (cause) {
		throw new MalformedInput(`transaction_literal does not decode: ${String(cause)}`, { cause });
	}

	if (tx.vout.length !== record.outputs_info.length) {
		throw reject(`transaction has ${tx.vout.length} outputs but outputs_info lists ${record.outputs_info.length}`);
	}

	const builder = new Builder({ max: record.max_amount_sats });
	builder.setLockTime(tx.absoluteLock);
	tx.vin.forEach((vin, i) => {
		if (i === 0) builder.setSequence(0, vin.sequenceLock);
		else builder.addInput(vin.sequenceLock);
	});
	tx.vout.forEach((vout, i) => {
		const info = record.outputs_info[i];
		if (info === undefined || BigInt(info.amount_sats) !== vout.value) {
			throw reject(`output ${i} is described as ${info?.amount_sats} sats but the transaction pays ${vout.value}`);
		}
		builder.addOutput(vout.value, vout.scriptPubKey, optionalMetadata(info.metadata_map_s2s));
	});
	for (const guard of record.additional_preconditions) {
		builder.addGuard(Clause.fromJSON(guard));
	}
	if (record.min_feerate_sats_vbyte !== undefined) builder.setMinFeerate(record.min_feerate_sats_vbyte);
	builder.setMetadata(optionalMetadata(record.metadata_map_s2s));

	let template: Template;
	try {
		template = builder.finalize(record.precomputed_template_hash_idx);
	} catch (cause) {
		throw reject(`record does not describe a valid template: ${String(cause)}`, cause);
	}

	if (bytesToHex(template.txBytes()) !== record.transaction_literal.toLowerCase()) {
		throw reject("transaction_literal is not the canonical template transaction for its outputs");
	}
	if (template.hashHex() !== record.precomputed_template_hash.toLowerCase()) {
		throw reject(
			`claimed template hash ${record.precomputed_template_hash} does not match recomputed ${template.hashHex()}`,
		);
	}

	log.debug("template record accepted", { hash: template.hashHex() });
	return template;
}

function optionalMetadata(value: unknown): TemplateMetadata {
	return value === undefined ? TemplateMetadata.empty() : TemplateMetadata.fromJSON(value);
}

function reject(message: string, cause?: unknown): InvariantViolation {
	log.warn("rejected template record", { reason: message });
	return new InvariantViolation(message, cause === undefined ? undefined : { cause });
}

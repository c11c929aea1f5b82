import { beforeAll, describe, expect, it } from "vitest";
import { log } from "~/lib/logging/log.ts";
import { Builder } from "~/lib/template/Builder.ts";
import { Clause } from "~/lib/template/Clause.ts";
import { InvariantViolation, MalformedInput } from "~/lib/template/errors.ts";
import { TemplateMetadata } from "~/lib/template/Metadata.ts";
import { parseTemplate } from "~/lib/template/record.ts";
import type { TemplateRecord } from "~/lib/template/Template.ts";

const OP_1 = Uint8Array.of(0x51);
const OP_2 = Uint8Array.of(0x52);

const BASE = "7e9ee948c59735ed8cc7ca1c00053a07f7b7c5d4191580e47be3d1311ff0ffdf";
const BASE_TX =
	"02000000010000000000000000000000000000000000000000000000000000000000000000ffffffff00ffffffff02" +
	"2c01000000000000015190010000000000000152" +
	"00000000";

function record(): TemplateRecord {
	return new Builder().setMax(1000).addOutput(300, OP_1).addOutput(400, OP_2).finalize().toJSON();
}

describe("template records", () => {
	beforeAll(() => {
		log.setLevel("silent");
	});

	it("omits empty metadata and unset feerates", () => {
		expect(record()).toEqual({
			additional_preconditions: [],
			precomputed_template_hash: BASE,
			precomputed_template_hash_idx: 0,
			max_amount_sats: 1000,
			transaction_literal: BASE_TX,
			outputs_info: [{ amount_sats: 300 }, { amount_sats: 400 }],
		});
	});

	it("writes metadata, guards and feerate when present", () => {
		const template = new Builder()
			.setMax(1000)
			.addOutput(300, OP_1, TemplateMetadata.create({ color: "green" }))
			.addGuard(Clause.after({ kind: "block", height: 800_000 }))
			.setMinFeerate(2)
			.setLabel("vault")
			.setExtra("step", 3)
			.finalize();

		const json = template.toJSON();
		expect(json.metadata_map_s2s).toEqual({ label: "vault", step: 3 });
		expect(json.min_feerate_sats_vbyte).toBe(2);
		expect(json.additional_preconditions).toEqual([{ kind: "after", lock: { kind: "block", height: 800_000 } }]);
		expect(json.outputs_info).toEqual([{ amount_sats: 300, metadata_map_s2s: { color: "green" } }]);
	});

	it("reads back what it writes", () => {
		const original = new Builder()
			.setMax(1000)
			.addOutput(300, OP_1)
			.addGuard(Clause.sha256("22".repeat(32)))
			.setLockTime({ kind: "time", timestamp: 1_700_000_000 })
			.setLabel("vault")
			.finalize();

		const restored = parseTemplate(JSON.parse(JSON.stringify(original)));
		expect(restored.hashHex()).toBe(original.hashHex());
		expect(restored.toJSON()).toEqual(original.toJSON());
		expect(restored.metadata.label).toBe("vault");
	});

	it("rejects a forged template hash", () => {
		const forged = { ...record(), precomputed_template_hash: "00".repeat(32) };
		expect(() => parseTemplate(forged)).toThrow(InvariantViolation);
	});

	it("rejects output amounts the transaction does not pay", () => {
		const forged = { ...record(), outputs_info: [{ amount_sats: 301 }, { amount_sats: 400 }] };
		expect(() => parseTemplate(forged)).toThrow(InvariantViolation);
	});

	it("rejects a transaction that is not the canonical template transaction", () => {
		const forged = { ...record(), transaction_literal: "01" + BASE_TX.slice(2) };
		expect(() => parseTemplate(forged)).toThrow(InvariantViolation);
	});

	it("rejects a maximum below the output total", () => {
		const forged = { ...record(), max_amount_sats: 600 };
		expect(() => parseTemplate(forged)).toThrow(InvariantViolation);
	});

	it("rejects records of the wrong shape", () => {
		expect(() => parseTemplate({})).toThrow(MalformedInput);
		expect(() => parseTemplate({ ...record(), transaction_literal: "zz" })).toThrow(MalformedInput);
		expect(() => parseTemplate({ ...record(), transaction_literal: "0200" })).toThrow(MalformedInput);
		expect(() => parseTemplate({ ...record(), max_amount_sats: -1 })).toThrow(MalformedInput);
	});
});

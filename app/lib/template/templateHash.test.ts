import { bytesToHex } from "@noble/hashes/utils";
import { describe, expect, it } from "vitest";
import type { Tx, TxIn } from "~/lib/primitives/Tx.ts";
import { SequenceLock } from "~/lib/primitives/weirdness/SequenceLock.ts";
import { outputsHash, sequencesHash, templateHash } from "~/lib/template/templateHash.ts";

const OP_1 = Uint8Array.of(0x51);
const OP_2 = Uint8Array.of(0x52);

function input(sequence = 0xffffffff): TxIn {
	return {
		txId: new Uint8Array(32),
		vout: 0xffffffff,
		scriptSig: new Uint8Array(),
		sequenceLock: SequenceLock.decode(sequence),
		witness: [],
	};
}

function makeTx(overrides: Partial<Tx> = {}): Tx {
	return {
		version: 2,
		vin: [input()],
		vout: [
			{ value: 300n, scriptPubKey: OP_1 },
			{ value: 400n, scriptPubKey: OP_2 },
		],
		absoluteLock: { kind: "none" },
		witness: false,
		...overrides,
	};
}

const BASE = "7e9ee948c59735ed8cc7ca1c00053a07f7b7c5d4191580e47be3d1311ff0ffdf";

describe("templateHash", () => {
	it("hashes the committed fields", () => {
		expect(bytesToHex(sequencesHash(makeTx()))).toBe("ad95131bc0b799c0b1af477fb14fcf26a6a9f76079e48bf090acb7e8367bfd0e");
		expect(bytesToHex(outputsHash(makeTx()))).toBe("bc6feb508298e53b27eaba1555e6866a9a226f1217c50ca5f099adb06dc108e4");
		expect(bytesToHex(templateHash(makeTx(), 0))).toBe(BASE);
	});

	it("is deterministic across independently built transactions", () => {
		const a = templateHash(makeTx(), 0);
		const b = templateHash(makeTx(), 0);
		expect(a).toEqual(b);
		expect(a.length).toBe(32);
	});

	it("changes with every committed field", () => {
		const variants: [string, Tx, number][] = [
			["version", makeTx({ version: 1 }), 0],
			["locktime", makeTx({ absoluteLock: { kind: "block", height: 800_000 }, vin: [input(0xfffffffe)] }), 0],
			["sequence", makeTx({ vin: [input(10)] }), 0],
			["value", makeTx({ vout: [{ value: 301n, scriptPubKey: OP_1 }, { value: 400n, scriptPubKey: OP_2 }] }), 0],
			["order", makeTx({ vout: [{ value: 400n, scriptPubKey: OP_2 }, { value: 300n, scriptPubKey: OP_1 }] }), 0],
			["index", makeTx(), 1],
		];
		const expected: Record<string, string> = {
			version: "7465f89534ba5125f544695a0ef71729d38c8d98a235f355b140a6158fd5fb10",
			locktime: "4dea9a672e014a2db2e6237f6e691591b85d3d011e90b0ae3da56bf4825c789e",
			sequence: "fdb8764c5d4cf5703994a86a6c52133b3a59b57dc18f4209605da6fe697b60ff",
			value: "7e64c9d638e8184de733809f5e135fa2554afa12ad67bf358705ebd0b3b5a98e",
			order: "90fbe1880a3db63920f368099829fe7325cd2bcb266b40d0d63b566f5801c91c",
			index: "9ac6c02705b074d4adafeb53c87c126498fcaaaf2c14e524928181fa8e9ae010",
		};
		for (const [field, tx, index] of variants) {
			expect(bytesToHex(templateHash(tx, index)), field).toBe(expected[field]);
		}
	});

	it("changes when an output script changes", () => {
		const tx = makeTx({ vout: [{ value: 300n, scriptPubKey: OP_2 }, { value: 400n, scriptPubKey: OP_2 }] });
		expect(bytesToHex(templateHash(tx, 0))).not.toBe(BASE);
	});

	it("ignores outpoints, scriptSigs and witnesses", () => {
		const spent: TxIn = {
			...input(),
			txId: new Uint8Array(32).fill(0xab),
			vout: 3,
			scriptSig: Uint8Array.of(0x00, 0x51),
			witness: [Uint8Array.of(0x01, 0x02)],
		};
		expect(bytesToHex(templateHash(makeTx({ vin: [spent], witness: true }), 0))).toBe(BASE);
	});

	it("rejects an index that is not a uint32", () => {
		expect(() => templateHash(makeTx(), -1)).toThrow(RangeError);
		expect(() => templateHash(makeTx(), 0x1_0000_0000)).toThrow(RangeError);
		expect(() => templateHash(makeTx(), 0.5)).toThrow(RangeError);
	});
});

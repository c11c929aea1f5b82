import { describe, expect, it } from "vitest";
import { Clause } from "~/lib/template/Clause.ts";
import { MalformedInput } from "~/lib/template/errors.ts";

const G = "0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798";
const G_X = G.slice(2);
const HASH = "11".repeat(32);

describe("Clause", () => {
	it("accepts compressed and x-only keys on the curve", () => {
		expect(Clause.signature(G.toUpperCase())).toEqual({ kind: "signature", pubkey: G });
		expect(Clause.signature(G_X)).toEqual({ kind: "signature", pubkey: G_X });
	});

	it("rejects keys off the curve or of the wrong size", () => {
		expect(() => Clause.signature("02" + "ff".repeat(32))).toThrow(MalformedInput);
		expect(() => Clause.signature("02abcd")).toThrow(MalformedInput);
	});

	it("validates hashes and locks", () => {
		expect(() => Clause.sha256("abc")).toThrow(MalformedInput);
		expect(() => Clause.after({ kind: "none" })).toThrow(MalformedInput);
		expect(() => Clause.older({ kind: "time", seconds: 100 })).toThrow(MalformedInput);
		expect(Clause.older({ kind: "blocks", blocks: 144 })).toEqual({ kind: "older", lock: { kind: "blocks", blocks: 144 } });
	});

	it("folds a list with and", () => {
		const a = Clause.sha256(HASH);
		const b = Clause.after({ kind: "block", height: 800_000 });
		expect(Clause.all([])).toEqual({ kind: "satisfied" });
		expect(Clause.all([a])).toBe(a);
		expect(Clause.all([a, b])).toEqual({ kind: "and", a, b });
	});

	it("flattens into disjunctive normal form", () => {
		const a = Clause.signature(G);
		const b = Clause.sha256(HASH);
		const c = Clause.ctv(HASH);
		const d = Clause.older({ kind: "blocks", blocks: 6 });
		expect(Clause.flatten(Clause.or(Clause.or(a, b), Clause.and(c, d)))).toEqual([[a], [b], [c, d]]);
		expect(Clause.flatten(Clause.satisfied())).toEqual([[]]);
		expect(Clause.flatten(Clause.and(Clause.satisfied(), a))).toEqual([[a]]);
	});

	it("refuses to flatten or below and", () => {
		const sat = Clause.satisfied();
		expect(() => Clause.flatten(Clause.and(Clause.or(sat, sat), Clause.or(sat, sat)))).toThrow(MalformedInput);
	});

	it("reads back what it writes", () => {
		const clause = Clause.or(
			Clause.and(Clause.signature(G), Clause.after({ kind: "time", timestamp: 1_700_000_000 })),
			Clause.ctv(HASH),
		);
		const json = JSON.parse(JSON.stringify(Clause.toJSON(clause)));
		expect(Clause.fromJSON(json)).toEqual(clause);
	});

	it("validates leaves when reading", () => {
		expect(() => Clause.fromJSON({ kind: "ctv", hash: "zz" })).toThrow(MalformedInput);
		expect(() => Clause.fromJSON({ kind: "nand" })).toThrow(MalformedInput);
	});
});

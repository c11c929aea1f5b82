import { secp256k1 } from "@noble/curves/secp256k1";
import { z } from "zod";
import { AbsoluteLock } from "~/lib/primitives/weirdness/AbsoluteLock.ts";
import { type RelativeLock, SequenceLock } from "~/lib/primitives/weirdness/SequenceLock.ts";
import { MalformedInput } from "~/lib/template/errors.ts";
import type { JsonValue } from "~/lib/template/Metadata.ts";

/**
 * Spending condition attached to a template as a guard.
 *
 * Byte strings are kept as lowercase hex so a clause is plain, freezable JSON.
 */
export type Clause =
	| Readonly<{ kind: "satisfied" }>
	| Readonly<{ kind: "signature"; pubkey: string }>
	| Readonly<{ kind: "sha256"; hash: string }>
	| Readonly<{ kind: "ctv"; hash: string }>
	| Readonly<{ kind: "after"; lock: AbsoluteLock }>
	| Readonly<{ kind: "older"; lock: RelativeLock }>
	| Readonly<{ kind: "and"; a: Clause; b: Clause }>
	| Readonly<{ kind: "or"; a: Clause; b: Clause }>;

export type ClauseLeaf = Exclude<Clause, { kind: "satisfied" | "and" | "or" }>;

/** Disjunctive normal form: any one of the conjunctions satisfies the clause. */
export type DNF = ClauseLeaf[][];

const HEX_32 = /^[0-9a-f]{64}$/;
const HEX_33 = /^[0-9a-f]{66}$/;

const AbsoluteLockSchema: z.ZodType<AbsoluteLock> = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("none") }),
	z.object({ kind: z.literal("block"), height: z.number().int() }),
	z.object({ kind: z.literal("time"), timestamp: z.number().int() }),
]);

const RelativeLockSchema: z.ZodType<RelativeLock> = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("none") }),
	z.object({ kind: z.literal("blocks"), blocks: z.number().int() }),
	z.object({ kind: z.literal("time"), seconds: z.number().int() }),
]);

const ClauseSchema: z.ZodType<Clause> = z.lazy(() =>
	z.discriminatedUnion("kind", [
		z.object({ kind: z.literal("satisfied") }),
		z.object({ kind: z.literal("signature"), pubkey: z.string() }),
		z.object({ kind: z.literal("sha256"), hash: z.string() }),
		z.object({ kind: z.literal("ctv"), hash: z.string() }),
		z.object({ kind: z.literal("after"), lock: AbsoluteLockSchema }),
		z.object({ kind: z.literal("older"), lock: RelativeLockSchema }),
		z.object({ kind: z.literal("and"), a: ClauseSchema, b: ClauseSchema }),
		z.object({ kind: z.literal("or"), a: ClauseSchema, b: ClauseSchema }),
	])
);

export namespace Clause {
	const SATISFIED: Clause = Object.freeze({ kind: "satisfied" });

	export function satisfied(): Clause {
		return SATISFIED;
	}

	/** 33-byte compressed or 32-byte x-only secp256k1 key, as hex. */
	export function signature(pubkey: string): Clause {
		const key = pubkey.toLowerCase();
		if (!HEX_32.test(key) && !HEX_33.test(key)) {
			throw new MalformedInput(`signature key must be 32 or 33 bytes of hex, got "${pubkey}"`);
		}
		try {
			secp256k1.ProjectivePoint.fromHex(key.length === 64 ? `02${key}` : key);
		} catch (cause) {
			throw new MalformedInput(`signature key ${key} is not a point on secp256k1`, { cause });
		}
		return Object.freeze({ kind: "signature", pubkey: key });
	}

	export function sha256(hash: string): Clause {
		return Object.freeze({ kind: "sha256", hash: hash32(hash, "preimage hash") });
	}

	export function ctv(hash: string): Clause {
		return Object.freeze({ kind: "ctv", hash: hash32(hash, "template hash") });
	}

	export function after(lock: AbsoluteLock): Clause {
		if (lock.kind === "none") throw new MalformedInput("after() needs a block height or timestamp");
		try {
			AbsoluteLock.encode(lock);
		} catch (cause) {
			throw new MalformedInput(`invalid absolute lock: ${String(cause)}`, { cause });
		}
		return Object.freeze({ kind: "after", lock: Object.freeze({ ...lock }) });
	}

	export function older(lock: RelativeLock): Clause {
		if (lock.kind === "none") throw new MalformedInput("older() needs a block count or duration");
		try {
			SequenceLock.fromRelative(lock);
		} catch (cause) {
			throw new MalformedInput(`invalid relative lock: ${String(cause)}`, { cause });
		}
		return Object.freeze({ kind: "older", lock: Object.freeze({ ...lock }) });
	}

	export function and(a: Clause, b: Clause): Clause {
		return Object.freeze({ kind: "and", a, b });
	}

	export function or(a: Clause, b: Clause): Clause {
		return Object.freeze({ kind: "or", a, b });
	}

	/** AND of every clause; an empty list is trivially satisfied. */
	export function all(clauses: readonly Clause[]): Clause {
		const [first, ...rest] = clauses;
		if (first === undefined) return SATISFIED;
		return rest.reduce(and, first);
	}

	/**
	 * Flattens `or`s of `and`s of leaves, e.g. `or(or(a, b), and(c, d))` is `[[a], [b], [c, d]]`.
	 * An `or` below an `and` would only flatten shallowly and is rejected.
	 */
	export function flatten(clause: Clause, orAllowed = true): DNF {
		switch (clause.kind) {
			case "satisfied":
				return [[]];

			case "and": {
				const [left] = flatten(clause.a, false);
				const [right] = flatten(clause.b, false);
				return [[...(left ?? []), ...(right ?? [])]];
			}

			case "or":
				if (!orAllowed) throw new MalformedInput("or() nested inside and() cannot be flattened");
				return [...flatten(clause.a, true), ...flatten(clause.b, true)];

			default:
				return [[clause]];
		}
	}

	export function toJSON(clause: Clause): JsonValue {
		switch (clause.kind) {
			case "and":
			case "or":
				return { kind: clause.kind, a: toJSON(clause.a), b: toJSON(clause.b) };
			case "after":
			case "older":
				return { kind: clause.kind, lock: { ...clause.lock } };
			default:
				return { ...clause };
		}
	}

	/** Parses and re-validates through the constructors, so keys and hashes are checked too. */
	export function fromJSON(value: unknown): Clause {
		const parsed = ClauseSchema.safeParse(value);
		if (!parsed.success) throw new MalformedInput("not a valid clause", { cause: parsed.error });
		return rebuild(parsed.data);
	}

	/** Frozen copy of a caller-built clause, checked as strictly as `fromJSON`. */
	export function copy(clause: Clause): Clause {
		return fromJSON(toJSON(clause));
	}

	function rebuild(clause: Clause): Clause {
		switch (clause.kind) {
			case "satisfied":
				return SATISFIED;
			case "signature":
				return signature(clause.pubkey);
			case "sha256":
				return sha256(clause.hash);
			case "ctv":
				return ctv(clause.hash);
			case "after":
				return after(clause.lock);
			case "older":
				return older(clause.lock);
			case "and":
				return and(rebuild(clause.a), rebuild(clause.b));
			case "or":
				return or(rebuild(clause.a), rebuild(clause.b));
		}
	}

	function hash32(hash: string, what: string): string {
		const hex = hash.toLowerCase();
		if (!HEX_32.test(hex)) throw new MalformedInput(`${what} must be 32 bytes of hex, got "${hash}"`);
		return hex;
	}
}

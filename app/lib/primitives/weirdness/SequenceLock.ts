import { SEQUENCE_FINAL, SEQUENCE_LOCKTIME_ENABLED } from "~/lib/constants.ts";

// per-input relative lock (nSequence, BIP-68/112)
export type RelativeLock =
	| { kind: "none" }
	| { kind: "blocks"; blocks: number }
	| { kind: "time"; seconds: number };

export type SequenceLock = Readonly<{
	relative: RelativeLock;
	raw: number; // original raw nSequence value
}>;

export namespace SequenceLock {
	const DISABLE_FLAG = 1 << 31;
	const TYPE_FLAG = 1 << 22;
	const VALUE_MASK = 0xffff;
	const TIME_GRANULARITY = 512;

	export function decode(sequence: number): SequenceLock {
		sequence >>>= 0;
		let relative: RelativeLock = { kind: "none" };

		if (sequence !== SEQUENCE_FINAL && sequence !== SEQUENCE_LOCKTIME_ENABLED) {
			const disable = (sequence & DISABLE_FLAG) !== 0;
			const isTime = (sequence & TYPE_FLAG) !== 0;
			const value = sequence & VALUE_MASK;

			if (!disable) {
				relative = isTime ? { kind: "time", seconds: value * TIME_GRANULARITY } : { kind: "blocks", blocks: value };
			}
		}

		return Object.freeze({ relative: Object.freeze(relative), raw: sequence });
	}

	export function encode(sequenceLock: SequenceLock): number {
		return assertRaw(sequenceLock.raw);
	}

	/** Rebuilds a lock from its raw value; `relative` is derived, never trusted. */
	export function from(sequenceLock: SequenceLock): SequenceLock {
		return decode(assertRaw(sequenceLock.raw));
	}

	function assertRaw(raw: number): number {
		if (!Number.isInteger(raw) || raw < 0 || raw > 0xffffffff) {
			throw new RangeError(`nSequence must be a uint32, got ${raw}`);
		}
		return raw;
	}

	export function final(): SequenceLock {
		return decode(SEQUENCE_FINAL);
	}

	/** `0xfffffffe`: no relative lock, but lets the transaction's absolute lock take effect. */
	export function lockTimeEnabled(): SequenceLock {
		return decode(SEQUENCE_LOCKTIME_ENABLED);
	}

	export function fromRelative(relative: RelativeLock): SequenceLock {
		switch (relative.kind) {
			case "none":
				return final();

			case "blocks":
				if (!Number.isInteger(relative.blocks) || relative.blocks < 0 || relative.blocks > VALUE_MASK) {
					throw new RangeError("relative block lock must be 0 … 65,535");
				}
				return decode(relative.blocks);

			case "time": {
				const units = relative.seconds / TIME_GRANULARITY;
				if (!Number.isInteger(units) || units < 0 || units > VALUE_MASK) {
					throw new RangeError("relative time lock must be a multiple of 512 seconds below 2^16 units");
				}
				return decode((TYPE_FLAG | units) >>> 0);
			}
		}
	}
}

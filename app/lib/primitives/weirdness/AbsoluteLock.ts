import { LOCKTIME_THRESHOLD } from "~/lib/constants.ts";

export type AbsoluteLock =
	| { kind: "none" } // locktime = 0
	| { kind: "block"; height: number } // block height
	| { kind: "time"; timestamp: number }; // unix timestamp

export namespace AbsoluteLock {
	export function decode(locktime: number): AbsoluteLock {
		locktime >>>= 0; // force unsigned 32-bit

		if (locktime === 0) return { kind: "none" };
		if (locktime < LOCKTIME_THRESHOLD) return { kind: "block", height: locktime };
		return { kind: "time", timestamp: locktime };
	}

	export function encode(abs: AbsoluteLock): number {
		switch (abs.kind) {
			case "none":
				return 0;

			case "block":
				if (!Number.isInteger(abs.height) || abs.height < 0 || abs.height >= LOCKTIME_THRESHOLD) {
					throw new RangeError("block height must be 0 … 499,999,999");
				}
				return abs.height >>> 0;

			case "time":
				if (!Number.isInteger(abs.timestamp) || abs.timestamp < LOCKTIME_THRESHOLD || abs.timestamp > 0xffffffff) {
					throw new RangeError("timestamp must be ≥ 500,000,000 and fit in 32 bits");
				}
				return abs.timestamp >>> 0;
		}
	}
}

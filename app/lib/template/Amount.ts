import { MAX_MONEY } from "~/lib/constants.ts";
import { MalformedInput } from "~/lib/template/errors.ts";

/** Value in sats. */
export type Amount = bigint;

export namespace Amount {
	export function from(value: bigint | number, what = "amount"): Amount {
		if (typeof value === "number") {
			if (!Number.isFinite(value) || !Number.isInteger(value)) {
				throw new MalformedInput(`${what} must be a whole number of sats, got ${value}`);
			}
			value = BigInt(value);
		}
		if (value < 0n) throw new MalformedInput(`${what} must not be negative, got ${value}`);
		if (value > MAX_MONEY) throw new MalformedInput(`${what} ${value} is above the ${MAX_MONEY} sats money supply`);
		return value;
	}

	export function sum(amounts: Iterable<Amount>): Amount {
		let total = 0n;
		for (const amount of amounts) total += amount;
		return total;
	}
}

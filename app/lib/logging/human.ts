import { bytesToHex } from "@noble/hashes/utils";

/** Turns log details into something `console` prints readably: bytes as hex, bigints as decimal strings. */
export function humanize(value: unknown): unknown {
	if (value instanceof Uint8Array) {
		return bytesToHex(value);
	}

	if (typeof value === "bigint") {
		return value.toString();
	}

	if (Array.isArray(value)) {
		return value.map(humanize);
	}

	if (value && typeof value === "object") {
		const obj: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			obj[k] = humanize(v);
		}
		return obj;
	}
	return value;
}

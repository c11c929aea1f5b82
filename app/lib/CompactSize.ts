import { BytesView } from "~/lib/BytesView.ts";
import { MAX_TX_BYTES } from "~/lib/constants.ts";

/*
    Nothing we encode is larger than a transaction, so the number type is enough here.
*/

export namespace CompactSize {
	export function encode(n: number): Uint8Array {
		if (!Number.isSafeInteger(n) || n < 0) throw new RangeError(`CompactSize out of range: ${n}`);
		if (n < 0xfd) return Uint8Array.of(n);
		if (n <= 0xffff) {
			const buf = new Uint8Array(3);
			buf[0] = 0xfd;
			new BytesView(buf).setUint16(1, n, true);
			return buf;
		}
		if (n <= 0xffffffff) {
			const buf = new Uint8Array(5);
			buf[0] = 0xfe;
			new BytesView(buf).setUint32(1, n, true);
			return buf;
		}
		const buf = new Uint8Array(9);
		buf[0] = 0xff;
		new BytesView(buf).setBigUint64(1, BigInt(n), true);
		return buf;
	}

	export function decode(bytes: Uint8Array, offset: number): [value: number, offset: number] {
		const first = bytes[offset];
		if (first === undefined) throw new RangeError("CompactSize past end of input");
		if (first < 0xfd) return [first, offset + 1];
		if (first === 0xfd) {
			const val = new BytesView(bytes, offset + 1, 2).getUint16(0, true);
			if (val < 0xfd) throw new Error("non-canonical CompactSize");
			return [val, offset + 3];
		}
		if (first === 0xfe) {
			const val = new BytesView(bytes, offset + 1, 4).getUint32(0, true);
			if (val < 0x10000) throw new Error("non-canonical CompactSize");
			return [val, offset + 5];
		}
		const val = new BytesView(bytes, offset + 1, 8).getBigUint64(0, true);
		if (val < 0x100000000n) throw new Error("non-canonical CompactSize");
		if (val > BigInt(MAX_TX_BYTES)) throw new Error("CompactSize too large");
		return [Number(val), offset + 9];
	}
}

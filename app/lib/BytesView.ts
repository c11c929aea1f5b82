/** `DataView` over the window a `Uint8Array` covers, not its whole backing buffer. */
export class BytesView extends DataView {
	constructor(bytes: Uint8Array, byteOffset = 0, byteLength?: number) {
		if (byteOffset < 0 || byteOffset + (byteLength ?? 0) > bytes.byteLength) {
			throw new RangeError(`view [${byteOffset}, +${byteLength ?? 0}) is outside of ${bytes.byteLength} bytes`);
		}
		super(bytes.buffer, bytes.byteOffset + byteOffset, byteLength ?? bytes.byteLength - byteOffset);
	}
}

export function u32le(value: number): Uint8Array {
	const buf = new Uint8Array(4);
	new BytesView(buf).setUint32(0, value, true);
	return buf;
}

export function i32le(value: number): Uint8Array {
	const buf = new Uint8Array(4);
	new BytesView(buf).setInt32(0, value, true);
	return buf;
}

export function u64le(value: bigint): Uint8Array {
	const buf = new Uint8Array(8);
	new BytesView(buf).setBigUint64(0, value, true);
	return buf;
}

/**
 * Fixed or variable width binary codec. `stride` is the encoded width in
 * bytes, or -1 when it depends on the value.
 */
export abstract class Codec<T> {
	public abstract readonly stride: number;
	public abstract encode(value: T): Uint8Array;
	public abstract decode(bytes: Uint8Array): T;
}

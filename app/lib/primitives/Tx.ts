import { concatBytes } from "@noble/hashes/utils";
import { Codec } from "~/lib/Codec.ts";
import { CompactSize } from "~/lib/CompactSize.ts";
import { BytesView, i32le, u32le, u64le } from "~/lib/BytesView.ts";
import { SequenceLock } from "~/lib/primitives/weirdness/SequenceLock.ts";
import { AbsoluteLock } from "~/lib/primitives/weirdness/AbsoluteLock.ts";

export type Tx = Readonly<{
	version: number;
	vin: readonly TxIn[];
	vout: readonly TxOut[];
	absoluteLock: AbsoluteLock;
	witness: boolean;
}>;

export type TxIn = Readonly<{
	txId: Uint8Array; // 32 bytes, LE on wire
	vout: number;
	scriptSig: Uint8Array;
	sequenceLock: SequenceLock;
	witness: readonly Uint8Array[];
}>;

export type TxOut = Readonly<{
	value: bigint; // 8 bytes, LE
	scriptPubKey: Uint8Array;
}>;

export class TxOutCodec extends Codec<TxOut> {
	public readonly stride = -1;

	public encode(out: TxOut): Uint8Array {
		return concatBytes(u64le(out.value), CompactSize.encode(out.scriptPubKey.length), out.scriptPubKey);
	}

	public decode(bytes: Uint8Array): TxOut {
		const value = new BytesView(bytes, 0, 8).getBigUint64(0, true);
		const [length, offset] = CompactSize.decode(bytes, 8);
		if (offset + length !== bytes.length) throw new Error("output script length does not match its prefix");
		return { value, scriptPubKey: bytes.slice(offset) };
	}
}

export const TxOut = new TxOutCodec();

export class TxCodec extends Codec<Tx> {
	public readonly stride = -1;

	public encode(tx: Tx): Uint8Array {
		const chunks: Uint8Array[] = [];

		// version (int32 LE)
		chunks.push(i32le(tx.version));

		// segwit marker+flags per BIP-144
		const hasWitness = tx.witness && tx.vin.some((v) => v.witness.length > 0);
		if (hasWitness) {
			chunks.push(Uint8Array.of(0x00, 0x01)); // marker=0x00, flags=0x01 (only bit 0 used)
		}

		// vin
		chunks.push(CompactSize.encode(tx.vin.length));
		for (const vin of tx.vin) {
			chunks.push(vin.txId); // already LE on wire
			chunks.push(u32le(vin.vout));
			chunks.push(CompactSize.encode(vin.scriptSig.length));
			chunks.push(vin.scriptSig);
			chunks.push(u32le(SequenceLock.encode(vin.sequenceLock)));
		}

		// vout
		chunks.push(CompactSize.encode(tx.vout.length));
		for (const vout of tx.vout) {
			chunks.push(TxOut.encode(vout));
		}

		if (hasWitness) {
			for (const vin of tx.vin) {
				chunks.push(CompactSize.encode(vin.witness.length));
				for (const item of vin.witness) {
					chunks.push(CompactSize.encode(item.length));
					chunks.push(item);
				}
			}
		}

		// locktime (uint32 LE)
		chunks.push(u32le(AbsoluteLock.encode(tx.absoluteLock)));

		return concatBytes(...chunks);
	}

	public decode(bytes: Uint8Array): Tx {
		let offset = 0;

		const take = (length: number): Uint8Array => {
			if (offset + length > bytes.length) {
				throw new RangeError(`transaction truncated: need ${length} bytes at offset ${offset}`);
			}
			// copy slices to avoid aliasing the original buffer
			const slice = bytes.slice(offset, offset + length);
			offset += length;
			return slice;
		};
		const readSize = (): number => {
			const [value, next] = CompactSize.decode(bytes, offset);
			offset = next;
			return value;
		};

		const version = new BytesView(take(4)).getInt32(0, true);

		// ---- BIP-144 marker/flags handling ----
		let hasWitness = false;
		let vinCount = readSize();

		if (vinCount === 0) {
			// possible segwit marker (marker is always 0x00, we've just read vinCount==0)
			const flags = take(1)[0] ?? 0;
			if (flags !== 1) throw new Error(`unsupported witness flags 0x${flags.toString(16)}`);
			vinCount = readSize();
			hasWitness = true;
		}

		const vin: TxIn[] = [];
		for (let i = 0; i < vinCount; i++) {
			const txId = take(32);
			const vout = new BytesView(take(4)).getUint32(0, true);
			const scriptSig = take(readSize());
			const sequence = new BytesView(take(4)).getUint32(0, true);
			vin.push({ txId, vout, scriptSig, sequenceLock: SequenceLock.decode(sequence), witness: [] });
		}

		const voutCount = readSize();
		const vout: TxOut[] = [];
		for (let i = 0; i < voutCount; i++) {
			const start = offset;
			take(8);
			take(readSize());
			vout.push(TxOut.decode(bytes.subarray(start, offset)));
		}

		// witness stacks (present iff hasWitness == true)
		const withWitness = vin.map((input) => {
			if (!hasWitness) return input;
			const items: Uint8Array[] = [];
			const nItems = readSize();
			for (let j = 0; j < nItems; j++) {
				items.push(take(readSize()));
			}
			return { ...input, witness: items };
		});

		const locktime = new BytesView(take(4)).getUint32(0, true);

		if (offset !== bytes.length) {
			throw new Error(`${bytes.length - offset} trailing bytes after transaction`);
		}

		return {
			version,
			vin: withWitness,
			vout,
			absoluteLock: AbsoluteLock.decode(locktime),
			witness: hasWitness,
		};
	}
}

export const Tx = new TxCodec();

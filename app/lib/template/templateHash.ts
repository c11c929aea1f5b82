import { sha256 } from "@noble/hashes/sha2";
import { concatBytes } from "@noble/hashes/utils";
import { i32le, u32le } from "~/lib/BytesView.ts";
import { Tx, TxOut } from "~/lib/primitives/Tx.ts";
import { SequenceLock } from "~/lib/primitives/weirdness/SequenceLock.ts";
import { AbsoluteLock } from "~/lib/primitives/weirdness/AbsoluteLock.ts";

/*
    Template hash of BIP-119 (OP_CHECKTEMPLATEVERIFY), single SHA-256:

        version         int32 LE
        locktime        uint32 LE
        input count     uint32 LE
        sequences hash  sha256(sequence[0] || ... ), each uint32 LE
        output count    uint32 LE
        outputs hash    sha256(value uint64 LE || CompactSize(script length) || script, ...)
        input index     uint32 LE

    Input outpoints, scriptSigs and witnesses are not committed to.
*/

export function sequencesHash(tx: Tx): Uint8Array {
	return sha256(concatBytes(...tx.vin.map((vin) => u32le(SequenceLock.encode(vin.sequenceLock)))));
}

export function outputsHash(tx: Tx): Uint8Array {
	return sha256(concatBytes(...tx.vout.map((vout) => TxOut.encode(vout))));
}

export function templateHash(tx: Tx, inputIndex: number): Uint8Array {
	if (!Number.isInteger(inputIndex) || inputIndex < 0 || inputIndex > 0xffffffff) {
		throw new RangeError(`input index must be a uint32, got ${inputIndex}`);
	}

	return sha256(concatBytes(
		i32le(tx.version),
		u32le(AbsoluteLock.encode(tx.absoluteLock)),
		u32le(tx.vin.length),
		sequencesHash(tx),
		u32le(tx.vout.length),
		outputsHash(tx),
		u32le(inputIndex),
	));
}

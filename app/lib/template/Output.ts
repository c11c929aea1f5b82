import { bytesToHex } from "@noble/hashes/utils";
import { TEMPLATE_HASH_BYTES } from "~/lib/constants.ts";
import { bytes32 } from "~/lib/primitives/Bytes32.ts";
import { TemplateMetadata } from "~/lib/template/Metadata.ts";
import type { Amount } from "~/lib/template/Amount.ts";

export const OP_PUSHBYTES_32 = 0x20;
export const OP_CHECKTEMPLATEVERIFY = 0xb3; // OP_NOP4

export type Output = Readonly<{
	amount: Amount;
	script: Uint8Array;
	metadata: TemplateMetadata;
}>;

export namespace Output {
	export function copy(output: Output): Output {
		return Object.freeze({ amount: output.amount, script: output.script.slice(), metadata: output.metadata });
	}
}

export namespace LockingCondition {
	/** Bare template commitment: `<32-byte hash> OP_CHECKTEMPLATEVERIFY`. */
	export function ctv(hash: Uint8Array): Uint8Array {
		const script = new Uint8Array(TEMPLATE_HASH_BYTES + 2);
		script[0] = OP_PUSHBYTES_32;
		script.set(bytes32.encode(hash), 1);
		script[TEMPLATE_HASH_BYTES + 1] = OP_CHECKTEMPLATEVERIFY;
		return script;
	}

	export function embeddedTemplateHash(script: Uint8Array): Uint8Array | undefined {
		if (
			script.length !== TEMPLATE_HASH_BYTES + 2 ||
			script[0] !== OP_PUSHBYTES_32 ||
			script[TEMPLATE_HASH_BYTES + 1] !== OP_CHECKTEMPLATEVERIFY
		) {
			return undefined;
		}
		return script.slice(1, TEMPLATE_HASH_BYTES + 1);
	}

	export function embeddedTemplateHashHex(script: Uint8Array): string | undefined {
		const hash = embeddedTemplateHash(script);
		return hash && bytesToHex(hash);
	}
}

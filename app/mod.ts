export { Amount } from "~/lib/template/Amount.ts";
export { Builder, type BuilderOptions, type BuilderState } from "~/lib/template/Builder.ts";
export { Clause, type ClauseLeaf, type DNF } from "~/lib/template/Clause.ts";
export {
	AlreadyFinalized,
	AmountExceeded,
	AmountMismatch,
	EmptyOutputSet,
	InvariantViolation,
	MalformedInput,
	TemplateError,
	type TemplateErrorCode,
} from "~/lib/template/errors.ts";
export { JsonValue, TemplateMetadata, type TemplateMetadataRecord } from "~/lib/template/Metadata.ts";
export { LockingCondition, OP_CHECKTEMPLATEVERIFY, Output } from "~/lib/template/Output.ts";
export { parseTemplate, TemplateRecordSchema } from "~/lib/template/record.ts";
export { Template, type OutputRecord, type TemplateRecord } from "~/lib/template/Template.ts";
export { outputsHash, sequencesHash, templateHash } from "~/lib/template/templateHash.ts";
export { TemplateGraph } from "~/lib/graph/TemplateGraph.ts";
export { Tx, type TxIn, TxOut } from "~/lib/primitives/Tx.ts";
export { AbsoluteLock } from "~/lib/primitives/weirdness/AbsoluteLock.ts";
export { type RelativeLock, SequenceLock } from "~/lib/primitives/weirdness/SequenceLock.ts";
export { log } from "~/lib/logging/log.ts";

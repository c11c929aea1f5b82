import { z } from "zod";
import { MalformedInput } from "~/lib/template/errors.ts";

export type JsonValue = null | boolean | number | string | JsonValue[] | { readonly [key: string]: JsonValue };

export const JsonValue: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([
		z.null(),
		z.boolean(),
		z.number().finite(),
		z.string(),
		z.array(JsonValue),
		z.record(z.string(), JsonValue),
	])
);

/**
 * Descriptive sidecar of a template or output. Never part of the template hash.
 *
 * `extra` is an open extension map; it is flattened next to `label` and
 * `color` when serialized, so those two keys are reserved.
 */
export type TemplateMetadata = Readonly<{
	label?: string;
	color?: string;
	extra: Readonly<Record<string, JsonValue>>;
}>;

export type TemplateMetadataRecord = { [key: string]: JsonValue };

export namespace TemplateMetadata {
	export const RESERVED_KEYS: readonly string[] = ["label", "color"];

	export function empty(): TemplateMetadata {
		return Object.freeze({ extra: Object.freeze({}) });
	}

	export function isEmpty(metadata: TemplateMetadata): boolean {
		return equals(metadata, empty());
	}

	export function equals(a: TemplateMetadata, b: TemplateMetadata): boolean {
		return a.label === b.label && a.color === b.color && jsonEquals(a.extra, b.extra);
	}

	export function update(
		metadata: TemplateMetadata,
		patch: { label?: string | undefined; color?: string | undefined },
	): TemplateMetadata {
		return create({ ...metadata, ...patch });
	}

	export function withExtra(metadata: TemplateMetadata, key: string, value: JsonValue): TemplateMetadata {
		if (RESERVED_KEYS.includes(key)) {
			throw new MalformedInput(`"${key}" is a reserved metadata key`);
		}
		const parsed = JsonValue.safeParse(value);
		if (!parsed.success) {
			throw new MalformedInput(`metadata "${key}" is not a JSON value`, { cause: parsed.error });
		}
		return create({ ...metadata, extra: { ...metadata.extra, [key]: parsed.data } });
	}

	const CreateSchema = z.object({
		label: z.string().optional(),
		color: z.string().optional(),
		extra: z.record(z.string(), JsonValue).optional(),
	});

	/** Validates and deep-copies `fields`; the result shares nothing with the caller. */
	export function create(fields: {
		label?: string | undefined;
		color?: string | undefined;
		extra?: Readonly<Record<string, JsonValue>>;
	}): TemplateMetadata {
		const parsed = CreateSchema.safeParse(fields);
		if (!parsed.success) {
			throw new MalformedInput("metadata is not of the expected shape", { cause: parsed.error });
		}
		const extra = parsed.data.extra ?? {};
		for (const key of RESERVED_KEYS) {
			if (Object.hasOwn(extra, key)) throw new MalformedInput(`"${key}" is a reserved metadata key`);
		}
		const metadata: { label?: string; color?: string; extra: Readonly<Record<string, JsonValue>> } = {
			extra: deepFreeze(structuredClone(extra)),
		};
		if (fields.label !== undefined) metadata.label = fields.label;
		if (fields.color !== undefined) metadata.color = fields.color;
		return Object.freeze(metadata);
	}

	export function toJSON(metadata: TemplateMetadata): TemplateMetadataRecord {
		const record: TemplateMetadataRecord = {};
		if (metadata.label !== undefined) record.label = metadata.label;
		for (const [key, value] of Object.entries(metadata.extra)) record[key] = value;
		if (metadata.color !== undefined) record.color = metadata.color;
		return record;
	}

	const MetadataRecordSchema = z.record(z.string(), JsonValue).superRefine((record, ctx) => {
		for (const key of RESERVED_KEYS) {
			if (record[key] !== undefined && typeof record[key] !== "string") {
				ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `${key} must be a string` });
			}
		}
	});

	export function fromJSON(value: unknown): TemplateMetadata {
		const parsed = MetadataRecordSchema.safeParse(value);
		if (!parsed.success) {
			throw new MalformedInput("metadata is not a JSON object of the expected shape", { cause: parsed.error });
		}
		const { label, color, ...extra } = parsed.data;
		return create({
			label: typeof label === "string" ? label : undefined,
			color: typeof color === "string" ? color : undefined,
			extra,
		});
	}
}

function jsonEquals(a: JsonValue, b: JsonValue): boolean {
	if (a === b) return true;
	if (a === null || b === null || typeof a !== "object" || typeof b !== "object") return false;
	if (Array.isArray(a) || Array.isArray(b)) {
		if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
		return a.every((item, i) => jsonEquals(item, b[i] ?? null));
	}
	const aKeys = Object.keys(a);
	if (aKeys.length !== Object.keys(b).length) return false;
	return aKeys.every((key) => Object.hasOwn(b, key) && jsonEquals(a[key] ?? null, b[key] ?? null));
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object") {
		for (const child of Object.values(value)) deepFreeze(child);
		Object.freeze(value);
	}
	return value;
}

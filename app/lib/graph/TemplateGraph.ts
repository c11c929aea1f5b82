import { log } from "~/lib/logging/log.ts";
import { InvariantViolation } from "~/lib/template/errors.ts";
import { TemplateMetadata } from "~/lib/template/Metadata.ts";
import { LockingCondition } from "~/lib/template/Output.ts";
import type { Template, TemplateRecord } from "~/lib/template/Template.ts";

type Node = {
	template: Template;
	children: string[];
};

/**
 * Templates of a compiled contract, addressed by template hash (hex).
 *
 * An edge runs from a template to every template one of its outputs commits
 * to. A parent's hash covers its children's hashes, so the graph cannot
 * contain a cycle; children may be registered before or after their parents.
 */
export class TemplateGraph {
	private readonly nodes = new Map<string, Node>();

	public get size(): number {
		return this.nodes.size;
	}

	public add(template: Template): string {
		const hash = template.hashHex();
		const existing = this.nodes.get(hash);
		if (existing) {
			if (!sameContent(existing.template, template)) {
				throw new InvariantViolation(`a different template is already registered under ${hash}`);
			}
			return hash;
		}

		template.verify();
		const children = template.outputs.flatMap((output) => {
			const child = LockingCondition.embeddedTemplateHashHex(output.script);
			return child === undefined ? [] : [child];
		});
		this.nodes.set(hash, { template, children: [...new Set(children)] });
		log.debug("template registered", { hash, children });
		return hash;
	}

	public has(hash: string): boolean {
		return this.nodes.has(hash.toLowerCase());
	}

	public get(hash: string): Template | undefined {
		return this.nodes.get(hash.toLowerCase())?.template;
	}

	/** Hashes committed to by `hash`'s outputs, registered or not. */
	public children(hash: string): string[] {
		return [...(this.nodes.get(hash.toLowerCase())?.children ?? [])];
	}

	public parents(hash: string): string[] {
		const target = hash.toLowerCase();
		const parents: string[] = [];
		for (const [parent, node] of this.nodes) {
			if (node.children.includes(target)) parents.push(parent);
		}
		return parents;
	}

	/** Templates nothing registered commits to. */
	public roots(): string[] {
		const referenced = new Set([...this.nodes.values()].flatMap((node) => node.children));
		return [...this.nodes.keys()].filter((hash) => !referenced.has(hash));
	}

	/** Hashes some output commits to that have no registered template. */
	public missing(): string[] {
		const missing = new Set<string>();
		for (const node of this.nodes.values()) {
			for (const child of node.children) {
				if (!this.nodes.has(child)) missing.add(child);
			}
		}
		return [...missing];
	}

	/** Registered hashes, every child before its parents, otherwise in registration order. */
	public topologicalOrder(): string[] {
		const order: string[] = [];
		const visited = new Set<string>();
		const visit = (hash: string): void => {
			if (visited.has(hash)) return;
			visited.add(hash);
			const node = this.nodes.get(hash);
			if (node === undefined) return;
			for (const child of node.children) visit(child);
			order.push(hash);
		};
		for (const hash of this.nodes.keys()) visit(hash);
		return order;
	}

	public toJSON(): Record<string, TemplateRecord> {
		const out: Record<string, TemplateRecord> = {};
		for (const hash of this.topologicalOrder()) {
			const node = this.nodes.get(hash);
			if (node) out[hash] = node.template.toJSON();
		}
		return out;
	}
}

function sameContent(a: Template, b: Template): boolean {
	const aOutputs = a.outputs;
	const bOutputs = b.outputs;
	return a.max === b.max &&
		a.minFeerateSatsVbyte === b.minFeerateSatsVbyte &&
		TemplateMetadata.equals(a.metadata, b.metadata) &&
		JSON.stringify(a.guards) === JSON.stringify(b.guards) &&
		aOutputs.every((output, i) => {
			const other = bOutputs[i];
			return other !== undefined && TemplateMetadata.equals(output.metadata, other.metadata);
		});
}

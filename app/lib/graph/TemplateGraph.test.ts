import { beforeAll, describe, expect, it } from "vitest";
import { TemplateGraph } from "~/lib/graph/TemplateGraph.ts";
import { log } from "~/lib/logging/log.ts";
import { Builder } from "~/lib/template/Builder.ts";
import { InvariantViolation } from "~/lib/template/errors.ts";

const OP_1 = Uint8Array.of(0x51);
const OP_2 = Uint8Array.of(0x52);

const CHILD = "5bcfbf32cbc5fe2413782727fa8941832f86d8bc17aa7e6ecabc7d9cbdf89a9a";
const PARENT = "6795f603518e541030004c815d82b28ea1714f884ac275a5bcbecc03237686d3";

function vault() {
	const child = new Builder().addOutput(700, OP_1).finalize();
	const parent = new Builder().addTemplateOutput(1000, child).finalize();
	return { child, parent };
}

describe("TemplateGraph", () => {
	beforeAll(() => {
		log.setLevel("silent");
	});

	it("links outputs to the templates they commit to", () => {
		const { child, parent } = vault();
		const graph = new TemplateGraph();
		expect(graph.add(parent)).toBe(PARENT);

		expect(graph.children(PARENT)).toEqual([CHILD]);
		expect(graph.missing()).toEqual([CHILD]);

		graph.add(child);
		expect(graph.missing()).toEqual([]);
		expect(graph.parents(CHILD)).toEqual([PARENT]);
		expect(graph.roots()).toEqual([PARENT]);
		expect(graph.get(CHILD.toUpperCase())).toBe(child);
	});

	it("orders children before parents", () => {
		const { child, parent } = vault();
		const other = new Builder().addOutput(5, OP_2).finalize();
		const graph = new TemplateGraph();
		graph.add(parent);
		graph.add(other);
		graph.add(child);

		expect(graph.topologicalOrder()).toEqual([CHILD, PARENT, other.hashHex()]);
		expect(Object.keys(graph.toJSON())).toEqual([CHILD, PARENT, other.hashHex()]);
	});

	it("accepts the same template twice", () => {
		const graph = new TemplateGraph();
		graph.add(vault().child);
		graph.add(vault().child);
		expect(graph.size).toBe(1);
	});

	it("refuses different content under one hash", () => {
		const graph = new TemplateGraph();
		graph.add(new Builder().addOutput(700, OP_1).finalize());
		const relabeled = new Builder().addOutput(700, OP_1).setLabel("other").finalize();
		expect(relabeled.hashHex()).toBe(CHILD);
		expect(() => graph.add(relabeled)).toThrow(InvariantViolation);
	});
});

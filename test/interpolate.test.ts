import { describe, expect, it } from "vitest";
import { parseIni } from "#config/ini-reader";
import {
	createInterpolator,
	interpolateConfig,
	tokenize,
} from "#config/interpolate";
import { mergeSources } from "#config/merge";
import { buildScope } from "#config/scope";
import {
	ConfigSyntaxError,
	InterpolationCycleError,
	UnknownReferenceError,
} from "#core/errors";

const scope = buildScope("/ws", "/ws", "linux");

const mergedFrom = (...texts: string[]) =>
	mergeSources(
		texts.map((text, index) => ({
			path: `file${index}.ini`,
			optional: false,
			sections: parseIni(text, `file${index}.ini`),
		})),
	);

describe("tokenize", () => {
	it("splits text and references", () => {
		expect(tokenize("a${x}b${s:Y}$$", "sec", "opt")).toEqual([
			{ kind: "text", value: "a" },
			{ kind: "ref", raw: "${x}", section: null, option: "x" },
			{ kind: "text", value: "b" },
			{ kind: "ref", raw: "${s:Y}", section: "s", option: "y" },
			{ kind: "text", value: "$" },
		]);
	});

	it("rejects a bare dollar", () => {
		expect(() => tokenize("cost $5", "config", "price")).toThrow(ConfigSyntaxError);
		expect(() => tokenize("cost $5", "config", "price")).toThrow(
			"[config] price: '$' must be followed by '$' or '{', found: $5",
		);
	});

	it("rejects unterminated and malformed references", () => {
		expect(() => tokenize("${a", "s", "o")).toThrow("[s] o: Unterminated reference: ${a");
		expect(() => tokenize("${a:b:c}", "s", "o")).toThrow(
			"[s] o: Malformed reference: ${a:b:c}",
		);
		expect(() => tokenize("${}", "s", "o")).toThrow("[s] o: Malformed reference: ${}");
	});
});

describe("createInterpolator", () => {
	it("resolves local, cross-section and runtime references", () => {
		const merged = mergedFrom(
			[
				"[paths]",
				"base = ${root_dir}/data",
				"[config]",
				"data_dir = ${paths:base}/filestore",
				"logfile = ${data_dir}/odoo.log",
			].join("\n"),
		);
		const interpolator = createInterpolator(merged, scope);
		expect(interpolator.get("config", "logfile")).toBe("/ws/data/filestore/odoo.log");
	});

	it("falls back to DEFAULT and lets runtime variables replace user defaults", () => {
		const merged = mergedFrom(
			"[DEFAULT]\nroot_dir = /ignored\nowner = ops\n[config]\nx = ${owner}@${root_dir}\n",
		);
		expect(createInterpolator(merged, scope).get("config", "x")).toBe("ops@/ws");
	});

	it("lets a section override a runtime variable", () => {
		const merged = mergedFrom("[config]\nroot_dir = /custom\nx = ${root_dir}\n");
		expect(createInterpolator(merged, scope).get("config", "x")).toBe("/custom");
	});

	it("reports cycles with their chain", () => {
		const merged = mergedFrom("[a]\nx = ${b:y}\n[b]\ny = ${a:x}\n");
		const interpolator = createInterpolator(merged, scope);
		expect(() => interpolator.get("a", "x")).toThrow(InterpolationCycleError);
		expect(() => interpolator.get("a", "x")).toThrow(
			"Interpolation cycle detected: a:x -> b:y -> a:x",
		);
	});

	it("reports a self reference as a cycle", () => {
		const merged = mergedFrom("[a]\nx = ${x}\n");
		expect(() => createInterpolator(merged, scope).get("a", "x")).toThrow(
			"Interpolation cycle detected: a:x -> a:x",
		);
	});

	it("reports unknown sections and options", () => {
		const merged = mergedFrom("[a]\nx = ${nope:y}\nz = ${missing}\n");
		const interpolator = createInterpolator(merged, scope);
		expect(() => interpolator.get("a", "x")).toThrow(
			"Unknown section [nope] referenced by ${nope:y} in [a] x",
		);
		expect(() => interpolator.get("a", "z")).toThrow(UnknownReferenceError);
		expect(() => interpolator.get("a", "z")).toThrow(
			"Unknown option 'missing' in section [a] referenced by ${missing} in [a] z",
		);
	});

	it("unescapes $$ only once", () => {
		const merged = mergedFrom("[a]\nx = $$${y}\ny = $${z}\n");
		expect(createInterpolator(merged, scope).get("a", "x")).toBe("$${z}");
	});
});

describe("interpolateConfig", () => {
	it("resolves each section with the scope picked for it", () => {
		const merged = mergedFrom(
			"[include]\nfiles = ${ini_dir}/x.ini\n[odoo]\ndir = ${odoo_dir}\n[config]\ndir = ${odoo_dir}\n",
		);
		const deploy = buildScope("/srv/prod", "/ws", "linux");
		const resolved = interpolateConfig(
			merged,
			(section) => (section === "config" ? deploy : scope),
			["include"],
		);
		expect(resolved).toEqual({
			odoo: { dir: "/ws/odoo" },
			config: { dir: "/srv/prod/odoo" },
		});
	});

	it("keeps only options a section declares itself", () => {
		const merged = mergedFrom("[DEFAULT]\nshared = 1\n[a]\nown = ${shared}\n");
		expect(interpolateConfig(merged, () => scope)).toEqual({ a: { own: "1" } });
	});
});

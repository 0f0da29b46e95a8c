import { describe, expect, it } from "vitest";
import {
	formatIniValue,
	parseIni,
	splitIniList,
	splitIniLines,
} from "#config/ini-reader";
import { ConfigSyntaxError } from "#core/errors";

const optionsOf = (text: string, section: string) => {
	const found = parseIni(text, "test.ini").find((entry) => entry.name === section);
	return found ? Object.fromEntries(found.options) : null;
};

describe("parseIni", () => {
	it("reads sections in order and lower-cases option names", () => {
		const sections = parseIni(
			[
				"[odoo]",
				"Repo = https://example.com/odoo.git",
				"BRANCH: 17.0",
				"",
				"[config]",
				"db_name = demo",
			].join("\n"),
			"test.ini",
		);
		expect(sections.map((section) => section.name)).toEqual(["odoo", "config"]);
		expect(Object.fromEntries(sections[0]?.options ?? [])).toEqual({
			repo: "https://example.com/odoo.git",
			branch: "17.0",
		});
	});

	it("keeps section names case-sensitive", () => {
		const sections = parseIni("[Addons.Web]\nrepo = x\n", "test.ini");
		expect(sections[0]?.name).toBe("Addons.Web");
	});

	it("joins indented continuation lines and keeps inner blank lines", () => {
		const text = [
			"[virtualenv]",
			"requirements =",
			"    requests",
			"",
			"    lxml",
			"python_version = 3.11",
		].join("\n");
		expect(optionsOf(text, "virtualenv")).toEqual({
			requirements: "requests\n\nlxml",
			python_version: "3.11",
		});
	});

	it("skips comment lines and strips a BOM", () => {
		const text = "\uFEFF# leading\n[config]\n; note\nworkers = 2\n";
		expect(optionsOf(text, "config")).toEqual({ workers: "2" });
	});

	it("keeps an inline hash as part of the value", () => {
		expect(optionsOf("[config]\nlabel = a # b\n", "config")).toEqual({
			label: "a # b",
		});
	});

	it("accepts empty values", () => {
		expect(optionsOf("[config]\nlogfile =\n", "config")).toEqual({ logfile: "" });
	});

	it("rejects an option before any section", () => {
		expect(() => parseIni("key = value\n", "broken.ini")).toThrow(
			"broken.ini:1: Option found before any section header: key = value",
		);
	});

	it("rejects duplicate sections and options", () => {
		expect(() => parseIni("[a]\nx = 1\n[a]\n", "dup.ini")).toThrow(
			"dup.ini:3: Duplicate section [a]",
		);
		expect(() => parseIni("[a]\nx = 1\nX = 2\n", "dup.ini")).toThrow(
			"dup.ini:3: Duplicate option 'x' in section [a]",
		);
	});

	it("reports unparsable lines with their line number", () => {
		const error = (() => {
			try {
				parseIni("[a]\nnot an option\n", "bad.ini");
			} catch (caught) {
				return caught;
			}
			return null;
		})();
		expect(error).toBeInstanceOf(ConfigSyntaxError);
		expect(error).toMatchObject({ file: "bad.ini", line: 2, code: "CONFIG_SYNTAX" });
	});
});

describe("list helpers", () => {
	it("splits comma and newline separated lists", () => {
		expect(splitIniList("a, b\n c,,\n\nd")).toEqual(["a", "b", "c", "d"]);
	});

	it("splits one entry per line", () => {
		expect(splitIniLines("setuptools<70, wheel\n\n  cython ")).toEqual([
			"setuptools<70, wheel",
			"cython",
		]);
	});

	it("indents continuation lines when writing a value back", () => {
		expect(formatIniValue("one\ntwo")).toBe("one\n\ttwo");
	});
});

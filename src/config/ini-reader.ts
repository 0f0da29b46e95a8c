import { readFile } from "node:fs/promises";
import { ConfigSyntaxError, errorMessage } from "#core/errors";

export const DEFAULT_SECTION = "DEFAULT";

export type RawSection = {
	name: string;
	options: Map<string, string>;
};

export type ConfigSource = {
	path: string;
	optional: boolean;
	sections: RawSection[];
};

const SECTION_RE = /^\[(.+)\]\s*$/;
const OPTION_RE = /^([^=:]*?)\s*[=:]\s*(.*)$/;

const isComment = (trimmed: string) =>
	trimmed.startsWith("#") || trimmed.startsWith(";");

const indentOf = (line: string) => line.length - line.trimStart().length;

type PendingOption = {
	section: RawSection;
	key: string;
	lines: string[];
	indent: number;
	blanks: number;
};

/**
 * Parse INI text without interpolation. Option names are lower-cased,
 * indented lines continue the previous value and blank lines inside a
 * continued value are kept.
 */
export const parseIni = (text: string, file: string): RawSection[] => {
	const sections: RawSection[] = [];
	const seen = new Set<string>();
	let current: RawSection | null = null;
	let pending: PendingOption | null = null;

	const flush = () => {
		if (!pending) return;
		pending.section.options.set(pending.key, pending.lines.join("\n").trim());
		pending = null;
	};

	const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
	for (let index = 0; index < lines.length; index += 1) {
		const lineNo = index + 1;
		const line = lines[index];
		const trimmed = line.trim();

		if (trimmed.length === 0) {
			if (pending) pending.blanks += 1;
			continue;
		}
		if (isComment(trimmed)) {
			continue;
		}

		const indent = indentOf(line);
		if (pending && indent > pending.indent) {
			pending.lines.push(
				...Array.from({ length: pending.blanks }, () => ""),
				trimmed,
			);
			pending.blanks = 0;
			continue;
		}
		flush();

		const header = SECTION_RE.exec(trimmed);
		if (header) {
			const name = header[1].trim();
			if (seen.has(name)) {
				throw new ConfigSyntaxError(file, lineNo, `Duplicate section [${name}]`);
			}
			seen.add(name);
			current = { name, options: new Map() };
			sections.push(current);
			continue;
		}

		if (!current) {
			throw new ConfigSyntaxError(
				file,
				lineNo,
				`Option found before any section header: ${trimmed}`,
			);
		}

		const option = OPTION_RE.exec(trimmed);
		if (!option) {
			throw new ConfigSyntaxError(file, lineNo, `Unparsable line: ${trimmed}`);
		}
		const key = option[1].trim().toLowerCase();
		if (!key) {
			throw new ConfigSyntaxError(file, lineNo, "Empty option name");
		}
		if (current.options.has(key)) {
			throw new ConfigSyntaxError(
				file,
				lineNo,
				`Duplicate option '${key}' in section [${current.name}]`,
			);
		}
		pending = {
			section: current,
			key,
			lines: [option[2].trim()],
			indent,
			blanks: 0,
		};
	}
	flush();
	return sections;
};

export const readConfigSource = async (
	filePath: string,
	optional = false,
): Promise<ConfigSource> => {
	let text: string;
	try {
		text = await readFile(filePath, "utf8");
	} catch (error) {
		throw new ConfigSyntaxError(
			filePath,
			null,
			`Failed to read INI config: ${errorMessage(error)}`,
		);
	}
	return { path: filePath, optional, sections: parseIni(text, filePath) };
};

/** Split a multi-line and/or comma-separated value into trimmed entries. */
export const splitIniList = (value: string): string[] =>
	value
		.split(/\r?\n/)
		.flatMap((line) => line.split(","))
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);

/** Multi-line list: one entry per non-blank line. */
export const splitIniLines = (value: string): string[] =>
	value
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);

/** Indent continuation lines so the value reads back unchanged. */
export const formatIniValue = (value: string) => value.split("\n").join("\n\t");

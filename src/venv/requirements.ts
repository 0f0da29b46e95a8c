import { readFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage, ProvisioningError } from "#core/errors";
import { toPosixPath } from "#core/paths";

export const DEFAULT_REQUIREMENTS = [
	"pip",
	"setuptools",
	"wheel",
	"click-odoo-contrib",
] as const;

/** Python distribution names compare case-insensitively with `-_.` folded. */
export const canonicalizeName = (name: string) =>
	name.trim().toLowerCase().replace(/[-_.]+/g, "-");

/** Drop a trailing `# comment` (a `#` preceded by whitespace). */
export const stripInlineComment = (line: string) => {
	const match = /\s+#/.exec(line);
	return match ? line.slice(0, match.index).trimEnd() : line.trimEnd();
};

/** Best-effort project name of one requirement spec. */
export const requirementName = (spec: string): string | null => {
	const value = spec.trim();
	if (!value) return null;
	const egg = /[#&]egg=([^&]+)/.exec(value);
	if (egg) {
		return canonicalizeName(egg[1]);
	}
	const at = value.indexOf("@");
	if (at > 0) {
		const left = value.slice(0, at).trim();
		const right = value.slice(at + 1).trim();
		if (left && right) {
			return canonicalizeName(left);
		}
	}
	const plain = /^([A-Za-z0-9][A-Za-z0-9._-]*)/.exec(value);
	return plain ? canonicalizeName(plain[1]) : null;
};

const INCLUDE_RE = /^(?:-r|--requirement)\s+(.+)$/;
const EDITABLE_RE = /^(?:-e|--editable)\s+(.+)$/;

type ReadText = (filePath: string) => Promise<string>;

const readRequirements: ReadText = async (filePath) => {
	try {
		return await readFile(filePath, "utf8");
	} catch (error) {
		throw new ProvisioningError(
			`Failed to read requirements file: ${filePath} (${errorMessage(error)})`,
			{ cause: error },
		);
	}
};

/**
 * Lines of one requirements file with ignored projects commented out.
 * Nested `-r` files are inlined so the ignore list applies to them too.
 */
export const filterRequirementsFile = async (
	filePath: string,
	ignore: ReadonlySet<string>,
	options: { visited?: Set<string>; readText?: ReadText } = {},
): Promise<string[]> => {
	const visited = options.visited ?? new Set([filePath]);
	const readText = options.readText ?? readRequirements;
	const output: string[] = [];
	for (const raw of (await readText(filePath)).split(/\r?\n/)) {
		const trimmed = raw.trim();
		if (!trimmed || trimmed.startsWith("#")) {
			output.push(raw);
			continue;
		}
		const line = stripInlineComment(raw).trim();

		const include = INCLUDE_RE.exec(line);
		if (include) {
			const target = include[1].trim();
			const nested = path.resolve(path.dirname(filePath), target);
			output.push(`# begin include ${target}`);
			if (visited.has(nested)) {
				output.push(`# skipped recursive include ${target}`);
			} else {
				visited.add(nested);
				output.push(
					...(await filterRequirementsFile(nested, ignore, { visited, readText })),
				);
			}
			output.push(`# end include ${target}`);
			continue;
		}

		const editable = EDITABLE_RE.exec(line);
		const name = requirementName(editable ? editable[1] : line);
		if (name && ignore.has(name)) {
			output.push(`# skipped (ignored package '${name}'): ${raw}`);
			continue;
		}
		output.push(raw);
	}
	return output;
};

/**
 * Text of `all-requirements.in.txt`: base requirements first, then every
 * requirements file in order, each filtered by `ignore`.
 */
export const buildRequirementsInput = async (params: {
	root: string;
	baseRequirements: readonly string[];
	files: readonly string[];
	ignore: readonly string[];
	readText?: ReadText;
}) => {
	const ignore = new Set(
		params.ignore.filter((entry) => entry.trim()).map(canonicalizeName),
	);
	const lines = [
		"# Generated by odoo-workspace. Do not edit.",
		"# Core and addon requirements plus [virtualenv] requirements and defaults.",
		"",
	];
	if (params.baseRequirements.length > 0) {
		lines.push("# --- base requirements ---", ...params.baseRequirements, "");
	}
	for (const file of params.files) {
		const relative = path.relative(params.root, file);
		const label =
			relative && !relative.startsWith("..") && !path.isAbsolute(relative)
				? toPosixPath(relative)
				: file;
		lines.push(`# --- from ${label} ---`);
		lines.push(
			...(await filterRequirementsFile(file, ignore, {
				readText: params.readText,
			})),
		);
		lines.push("");
	}
	return `${lines.join("\n").replace(/\n+$/, "")}\n`;
};

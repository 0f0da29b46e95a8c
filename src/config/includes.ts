import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import {
	type ConfigSource,
	readConfigSource,
	splitIniList,
} from "#config/ini-reader";
import {
	ConfigSyntaxError,
	getErrnoCode,
	IncludeCycleError,
	IncludeNotFoundError,
} from "#core/errors";

export const INCLUDE_SECTION = "include";
export const INCLUDE_OPTION = "files";
const OPTIONAL_MARKER = "?";

type IncludeOptions = {
	/** Variables usable as `${name}` inside include paths (e.g. `ini_dir`). */
	variables?: Readonly<Record<string, string>>;
	env?: NodeJS.ProcessEnv;
	logger?: (message: string) => void;
};

const expandEnv = (value: string, env: NodeJS.ProcessEnv) =>
	value.replace(
		/\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
		(match, braced: string | undefined, bare: string | undefined) => {
			const name = braced ?? bare ?? "";
			return env[name] ?? match;
		},
	);

export const expandIncludeToken = (
	token: string,
	variables: Readonly<Record<string, string>> = {},
	env: NodeJS.ProcessEnv = process.env,
) => {
	let expanded = token;
	for (const [name, value] of Object.entries(variables)) {
		expanded = expanded.split(`\${${name}}`).join(value);
	}
	expanded = expandEnv(expanded, env);
	if (expanded === "~" || expanded.startsWith("~/")) {
		expanded = path.join(homedir(), expanded.slice(1));
	}
	return expanded;
};

export const parseIncludeToken = (
	token: string,
	baseDir: string,
	options: Pick<IncludeOptions, "variables" | "env"> = {},
) => {
	let raw = token.trim();
	const optional = raw.startsWith(OPTIONAL_MARKER);
	if (optional) {
		raw = raw.slice(OPTIONAL_MARKER.length).trim();
	}
	const expanded = expandIncludeToken(raw, options.variables, options.env);
	return {
		target: expanded,
		path: path.resolve(baseDir, expanded),
		optional,
	};
};

const statFile = async (filePath: string) => {
	try {
		return await stat(filePath);
	} catch (error) {
		const code = getErrnoCode(error);
		if (code === "ENOENT" || code === "ENOTDIR") {
			return null;
		}
		throw error;
	}
};

const includeListOf = (source: ConfigSource) => {
	const section = source.sections.find((entry) => entry.name === INCLUDE_SECTION);
	const value = section?.options.get(INCLUDE_OPTION);
	return value ? splitIniList(value) : [];
};

/**
 * Expand the include tree of `entryPath` into load order: every file's
 * includes (recursively, in declared order) come before the file itself, so
 * the entry file is always last.
 */
export const resolveIncludes = async (
	entryPath: string,
	options: IncludeOptions = {},
): Promise<ConfigSource[]> => {
	const ordered: ConfigSource[] = [];
	const loaded = new Set<string>();
	const stack: string[] = [];

	const load = async (filePath: string, optional: boolean) => {
		if (loaded.has(filePath)) {
			return;
		}
		if (stack.includes(filePath)) {
			throw new IncludeCycleError([...stack, filePath]);
		}
		const info = await statFile(filePath);
		if (!info) {
			if (optional) {
				options.logger?.(`Optional included INI not found (skipping): ${filePath}`);
				return;
			}
			throw new IncludeNotFoundError(
				filePath,
				stack.length === 0 ? "INI config not found" : "Included INI not found",
			);
		}
		if (!info.isFile()) {
			throw new IncludeNotFoundError(filePath, "Included INI path is not a file");
		}

		const source = await readConfigSource(filePath, optional);
		stack.push(filePath);
		const baseDir = path.dirname(filePath);
		for (const token of includeListOf(source)) {
			const include = parseIncludeToken(token, baseDir, options);
			if (include.target.length === 0) {
				throw new ConfigSyntaxError(filePath, null, "Empty include entry");
			}
			await load(include.path, include.optional);
		}
		stack.pop();

		loaded.add(filePath);
		ordered.push(source);
	};

	await load(path.resolve(entryPath), false);
	return ordered;
};

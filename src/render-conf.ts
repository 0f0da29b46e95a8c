import { mkdir, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import type { ResolvedSection } from "#config";
import { formatIniValue } from "#config/ini-reader";
import { ADDONS_PATH_OPTION, joinAddonsPath } from "#core/addons-path";
import { resolveUserPath } from "#core/paths";

export const DATA_DIR_OPTION = "data_dir";

/** `[config] data_dir` relative to the deploy root, else the layout default. */
export const resolveDataDir = (
	config: ResolvedSection,
	deployRoot: string,
	defaultDataDir: string,
	home: string = homedir(),
) => {
	const value = config[DATA_DIR_OPTION]?.trim();
	return value ? resolveUserPath(value, deployRoot, home) : defaultDataDir;
};

export const renderOdooConf = (
	config: ResolvedSection,
	addonsPath: readonly string[],
	dataDir: string,
) => {
	const lines = ["[options]"];
	for (const [key, value] of Object.entries(config)) {
		if (key === ADDONS_PATH_OPTION || key === DATA_DIR_OPTION) continue;
		lines.push(`${key} = ${formatIniValue(value)}`);
	}
	lines.push(`${ADDONS_PATH_OPTION} = ${joinAddonsPath(addonsPath)}`);
	lines.push(`${DATA_DIR_OPTION} = ${dataDir}`);
	return `${lines.join("\n")}\n`;
};

export const writeOdooConf = async (confPath: string, text: string) => {
	await mkdir(path.dirname(confPath), { recursive: true });
	await writeFile(confPath, text, "utf8");
};

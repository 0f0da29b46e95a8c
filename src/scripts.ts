import { chmod, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigValidationError } from "#core/errors";
import { exists } from "#core/fs-utils";

export const DB_NAME_PLACEHOLDER = "__DB_NAME__";

// Spliced verbatim into shell and batch templates.
const DB_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export const BASE_SCRIPTS = [
	"run",
	"instance",
	"test",
	"shell",
	"update",
	"update_all",
] as const;
export const DB_SCRIPTS = ["initdb", "backup", "restore", "restore_force"] as const;

export type ScriptName = (typeof BASE_SCRIPTS)[number] | (typeof DB_SCRIPTS)[number];

/** Windows has no detached `instance` helper. */
const POSIX_ONLY: readonly ScriptName[] = ["instance"];

export type WrittenScript = {
	name: ScriptName;
	path: string;
};

export const scriptExtension = (platform: NodeJS.Platform) =>
	platform === "win32" ? ".bat" : ".sh";

export const scriptNames = (
	platform: NodeJS.Platform,
	withDatabase: boolean,
): ScriptName[] => {
	const names: ScriptName[] = [...BASE_SCRIPTS, ...(withDatabase ? DB_SCRIPTS : [])];
	return platform === "win32"
		? names.filter((name) => !POSIX_ONLY.includes(name))
		: names;
};

/** Source tree keeps `templates/` one level up; bundled chunks may sit deeper. */
export const resolveTemplatesDir = async () => {
	const here = path.dirname(fileURLToPath(import.meta.url));
	const candidates = [
		path.resolve(here, "..", "templates"),
		path.resolve(here, "..", "..", "templates"),
	];
	for (const candidate of candidates) {
		if (await exists(candidate)) {
			return candidate;
		}
	}
	throw new Error(`Script templates not found (looked in ${candidates.join(", ")})`);
};

export const assertSafeDbName = (dbName: string) => {
	if (!DB_NAME_PATTERN.test(dbName)) {
		throw new ConfigValidationError(
			`Invalid 'db_name' in [config]: "${dbName}" (use letters, digits, '_', '.' and '-').`,
		);
	}
	return dbName;
};

export const renderScript = (
	template: string,
	platform: NodeJS.Platform,
	dbName?: string,
) => {
	const text = dbName ? template.split(DB_NAME_PLACEHOLDER).join(dbName) : template;
	return platform === "win32" ? text.replace(/\r?\n/g, "\r\n") : text;
};

/**
 * Write the helper scripts into `scriptsDir`. Database scripts need a
 * database name and are skipped without one.
 */
export const writeScripts = async (params: {
	scriptsDir: string;
	dbName?: string;
	platform?: NodeJS.Platform;
	templatesDir?: string;
	logger?: (message: string) => void;
}): Promise<WrittenScript[]> => {
	const platform = params.platform ?? process.platform;
	const dbName = params.dbName?.trim();
	if (dbName) {
		assertSafeDbName(dbName);
	} else {
		params.logger?.(
			"Missing or empty 'db_name' in [config]; database scripts (initdb/backup/restore/restore_force) are not generated.",
		);
	}
	const templatesDir = params.templatesDir ?? (await resolveTemplatesDir());
	const extension = scriptExtension(platform);
	await mkdir(params.scriptsDir, { recursive: true });

	const written: WrittenScript[] = [];
	for (const name of scriptNames(platform, Boolean(dbName))) {
		const template = await readFile(
			path.join(templatesDir, `${name}${extension}`),
			"utf8",
		);
		const target = path.join(params.scriptsDir, `${name}${extension}`);
		await writeFile(target, renderScript(template, platform, dbName), "utf8");
		if (platform !== "win32") {
			const { mode } = await stat(target);
			await chmod(target, mode | 0o111);
		}
		written.push({ name, path: target });
	}
	return written;
};

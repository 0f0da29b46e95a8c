import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import * as z from "zod";
import { getErrnoCode, isWorkspaceError, type WorkspaceError } from "#core/errors";
import { ExitCode } from "./exit-code";
import { CLI_NAME, parseArgs } from "./parse-args";
import { TaskReporter } from "./task-reporter";
import type { CliCommand, CliOptions } from "./types";
import { isSilentMode, setSilentMode, symbols, ui } from "./ui";

export { CLI_NAME };

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> <ini> [options]

Commands:
  sync    Converge repositories, virtualenv, config and scripts with the INI
  status  Show each repository's observed state against its declaration
  config  Print the resolved configuration with secrets masked

Sync options:
  --sync-odoo | --sync-addons | --sync-all
  --create-venv
  --rebuild-venv
  --create-wheelhouse
  --reuse-wheelhouse
  --clear-pip-wheel-cache
  --no-configs
  --no-scripts
  --no-data-dir

Global options:
  --root <path>
  --dest-root <path>
  --json
  --timeout-ms <n>
  --silent
  --verbose
  --help
  --version
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const writeJson = (value: unknown) => {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

const PackageJsonSchema = z.object({ version: z.string() });

/** `package.json` sits two levels up from the sources and one from `dist/`. */
const readVersion = async () => {
	const here = path.dirname(fileURLToPath(import.meta.url));
	for (const candidate of [
		path.resolve(here, "..", "package.json"),
		path.resolve(here, "..", "..", "package.json"),
	]) {
		try {
			const parsed = PackageJsonSchema.safeParse(
				JSON.parse(await readFile(candidate, "utf8")),
			);
			if (parsed.success) {
				return parsed.data.version;
			}
		} catch (error) {
			if (getErrnoCode(error) !== "ENOENT") {
				throw error;
			}
		}
	}
	return "unknown";
};

const verboseLogger = (options: CliOptions) =>
	options.verbose ? (message: string) => ui.debug(message) : undefined;

const runSyncCommand = async (ini: string, options: CliOptions) => {
	const { printSyncSummary, runSync } = await import("../sync");
	const reporter =
		!options.json && !isSilentMode() && process.stdout.isTTY
			? new TaskReporter()
			: null;
	try {
		const summary = await runSync(
			{
				iniPath: ini,
				root: options.root,
				deployRoot: options.destRoot,
				target: options.target,
				provision: options.provision,
				noConfigs: options.noConfigs,
				noScripts: options.noScripts,
				noDataDir: options.noDataDir,
				timeoutMs: options.timeoutMs,
			},
			{
				logger: verboseLogger(options),
				progressLogger: reporter
					? (line: string) => reporter.progress(line)
					: undefined,
				warn: (message: string) => ui.warn(message),
				hooks: reporter?.hooks(),
			},
		);
		if (summary.repositories.length > 0) {
			reporter?.finish();
		} else {
			reporter?.stop();
		}
		if (options.json) {
			writeJson(summary);
		} else {
			printSyncSummary(summary);
		}
	} catch (error) {
		reporter?.stop();
		throw error;
	}
};

const runCommand = async (parsed: CliCommand) => {
	if (parsed.command === "sync") {
		await runSyncCommand(parsed.ini, parsed.options);
		return;
	}
	if (parsed.command === "status") {
		const { getStatus, printStatus } = await import("../status");
		const status = await getStatus(
			{
				iniPath: parsed.ini,
				root: parsed.options.root,
				deployRoot: parsed.options.destRoot,
				timeoutMs: parsed.options.timeoutMs,
			},
			{ logger: verboseLogger(parsed.options) },
		);
		if (parsed.options.json) {
			writeJson(status);
		} else {
			printStatus(status);
		}
		return;
	}
	if (parsed.command === "config") {
		const { loadProjectConfig } = await import("#config");
		const { formatAuditIni, maskResolvedConfig } = await import(
			"#config/audit"
		);
		const { resolveBuildRoot } = await import("../sync");
		const root = await resolveBuildRoot(parsed.ini, parsed.options.root);
		const project = await loadProjectConfig(parsed.ini, {
			root,
			deployRoot: parsed.options.destRoot,
			logger: verboseLogger(parsed.options),
		});
		if (parsed.options.json) {
			writeJson({
				iniPath: project.iniPath,
				sources: project.sources,
				resolved: maskResolvedConfig(project.resolved),
			});
		} else {
			process.stdout.write(formatAuditIni(project.resolved));
		}
		return;
	}
	printHelp();
	process.exit(ExitCode.InvalidArgument);
};

const CONFIG_ERROR_CODES: ReadonlySet<WorkspaceError["code"]> = new Set([
	"CONFIG_SYNTAX",
	"INCLUDE_NOT_FOUND",
	"INCLUDE_CYCLE",
	"INTERPOLATION_CYCLE",
	"UNKNOWN_REFERENCE",
	"CONFIG_INVALID",
	"ROOT_NOT_FOUND",
]);

export const exitCodeFor = (error: unknown): ExitCode => {
	if (!isWorkspaceError(error)) {
		return ExitCode.FatalError;
	}
	if (CONFIG_ERROR_CODES.has(error.code)) {
		return ExitCode.ConfigError;
	}
	if (error.code === "DIRTY_WORKING_TREE") {
		return ExitCode.DirtyWorkingTree;
	}
	return ExitCode.FatalError;
};

/**
 * The main entry point of the CLI
 */
export async function main(): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseArgs();

		setSilentMode(parsed.options.silent);

		if (parsed.help) {
			printHelp();
			process.exit(ExitCode.Success);
		}

		if (parsed.version) {
			process.stdout.write(`${CLI_NAME} ${await readVersion()}\n`);
			process.exit(ExitCode.Success);
		}

		if (!parsed.command) {
			printHelp();
			process.exit(ExitCode.InvalidArgument);
		}

		await runCommand(parsed.parsed);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	printError(message || String(error));
	process.exit(exitCodeFor(error));
}

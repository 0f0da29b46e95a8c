import process from "node:process";

import cac from "cac";
import { ExitCode } from "#cli/exit-code";
import type { SyncTarget } from "#core/sync";
import { provisionFlagError } from "#venv/provision";
import type { CliCommand, CliOptions } from "./types";

export const CLI_NAME = "odoo-workspace";

const COMMANDS = ["sync", "status", "config"] as const;
type Command = (typeof COMMANDS)[number];

export type ParsedArgs = {
	command: Command | null;
	options: CliOptions;
	positionals: string[];
	rawArgs: string[];
	help: boolean;
	version: boolean;
	parsed: CliCommand;
};

const VALUE_FLAGS = new Set(["--root", "--dest-root", "--timeout-ms"]);
const GLOBAL_FLAGS = new Set([
	...VALUE_FLAGS,
	"--json",
	"--silent",
	"--verbose",
	"--help",
	"-h",
	"--version",
	"-v",
]);
const SYNC_ONLY_FLAGS = new Set([
	"--sync-odoo",
	"--sync-addons",
	"--sync-all",
	"--create-venv",
	"--rebuild-venv",
	"--create-wheelhouse",
	"--reuse-wheelhouse",
	"--clear-pip-wheel-cache",
	"--no-configs",
	"--no-scripts",
	"--no-data-dir",
]);

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const flagName = (arg: string) => arg.split("=")[0] ?? arg;

const findCommandIndex = (rawArgs: string[]) => {
	for (let index = 0; index < rawArgs.length; index += 1) {
		const arg = rawArgs[index] ?? "";
		if (arg.startsWith("-")) {
			if (VALUE_FLAGS.has(arg)) {
				index += 1;
			}
			continue;
		}
		return index;
	}
	return -1;
};

const parsePositionals = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	const tail = commandIndex === -1 ? [] : rawArgs.slice(commandIndex + 1);
	const positionals: string[] = [];
	for (let index = 0; index < tail.length; index += 1) {
		const arg = tail[index] ?? "";
		if (VALUE_FLAGS.has(arg)) {
			index += 1;
			continue;
		}
		if (arg.startsWith("-")) {
			continue;
		}
		positionals.push(arg);
	}
	return positionals;
};

const getCommandFromArgs = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	if (commandIndex === -1) {
		return null;
	}
	const command = rawArgs[commandIndex] ?? "";
	if (!isCommand(command)) {
		throw new Error(`Unknown command '${command}'.`);
	}
	return command;
};

const assertKnownFlags = (command: Command | null, rawArgs: string[]) => {
	for (const arg of rawArgs) {
		if (!arg.startsWith("-")) {
			continue;
		}
		const flag = flagName(arg);
		if (SYNC_ONLY_FLAGS.has(flag)) {
			if (command !== "sync") {
				throw new Error(`${flag} is only valid for sync.`);
			}
			continue;
		}
		if (!GLOBAL_FLAGS.has(flag)) {
			throw new Error(`Unknown option '${flag}'.`);
		}
	}
};

const optionalString = (value: unknown) =>
	value === undefined || value === null || value === true || value === false
		? undefined
		: String(value);

const resolveTarget = (options: Record<string, unknown>): SyncTarget => {
	const selected: SyncTarget[] = [];
	if (options.syncOdoo) selected.push("odoo");
	if (options.syncAddons) selected.push("addons");
	if (options.syncAll) selected.push("all");
	if (selected.length > 1) {
		throw new Error(
			"--sync-odoo, --sync-addons and --sync-all are mutually exclusive.",
		);
	}
	return selected[0] ?? "none";
};

const buildOptions = (result: ReturnType<ReturnType<typeof cac>["parse"]>) => {
	const raw: Record<string, unknown> = result.options;
	const options: CliOptions = {
		root: optionalString(raw.root),
		destRoot: optionalString(raw.destRoot),
		target: resolveTarget(raw),
		provision: {
			createVenv: Boolean(raw.createVenv),
			rebuildVenv: Boolean(raw.rebuildVenv),
			createWheelhouse: Boolean(raw.createWheelhouse),
			reuseWheelhouse: Boolean(raw.reuseWheelhouse),
			clearPipWheelCache: Boolean(raw.clearPipWheelCache),
		},
		// cac stores `--no-x` as `x: false`
		noConfigs: raw.configs === false,
		noScripts: raw.scripts === false,
		noDataDir: raw.dataDir === false,
		json: Boolean(raw.json),
		timeoutMs:
			raw.timeoutMs === undefined ? undefined : Number(raw.timeoutMs),
		silent: Boolean(raw.silent),
		verbose: Boolean(raw.verbose),
	};

	if (
		options.timeoutMs !== undefined &&
		(!Number.isFinite(options.timeoutMs) || options.timeoutMs < 1)
	) {
		throw new Error("--timeout-ms must be a positive number.");
	}
	const provisionError = provisionFlagError(options.provision);
	if (provisionError) {
		throw new Error(provisionError);
	}
	if ("root" in raw && !options.root) {
		throw new Error("--root expects a value.");
	}
	if ("destRoot" in raw && !options.destRoot) {
		throw new Error("--dest-root expects a value.");
	}

	return options;
};

const buildParsedCommand = (
	command: Command | null,
	options: CliOptions,
	positionals: string[],
): CliCommand => {
	if (command === null) {
		return { command: null, options };
	}
	const [ini, ...rest] = positionals;
	if (!ini) {
		throw new Error(`Usage: ${CLI_NAME} ${command} <ini> [options]`);
	}
	if (rest.length > 0) {
		throw new Error(`${CLI_NAME}: unexpected arguments: ${rest.join(" ")}`);
	}
	return { command, ini, options };
};

/** Parse without side effects; throws on invalid arguments. */
export const parseCliArgs = (argv: string[]): ParsedArgs => {
	const cli = cac(CLI_NAME);

	cli
		.option("--root <path>", "Workspace root (defaults to the INI directory)")
		.option("--dest-root <path>", "Deployment root used in generated files")
		.option("--json", "Output JSON")
		.option("--timeout-ms <n>", "Git network timeout in milliseconds")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Echo git and uv commands")
		.option("-h, --help", "Display help")
		.option("-v, --version", "Display version");

	cli
		.command("sync <ini>", "Converge the workspace with its INI")
		.option("--sync-odoo", "Clone or update the Odoo checkout")
		.option("--sync-addons", "Clone or update every addons repository")
		.option("--sync-all", "Sync Odoo and every addons repository")
		.option("--create-venv", "Create the virtualenv and install requirements")
		.option("--rebuild-venv", "Recreate the virtualenv from scratch")
		.option("--create-wheelhouse", "Build the lock file and wheelhouse only")
		.option("--reuse-wheelhouse", "Install offline from the existing wheelhouse")
		.option("--clear-pip-wheel-cache", "Purge pip's wheel cache before building")
		.option("--no-configs", "Do not write odoo-server.conf")
		.option("--no-scripts", "Do not write helper scripts")
		.option("--no-data-dir", "Do not create the data directory");
	cli.command("status <ini>", "Show each repository against its declaration");
	cli.command("config <ini>", "Print the resolved configuration, secrets masked");

	const result = cli.parse(argv, { run: false });
	const rawArgs = argv.slice(2);
	const command = getCommandFromArgs(rawArgs);
	assertKnownFlags(command, rawArgs);
	const help = Boolean(result.options.help);
	const version = Boolean(result.options.version);
	const options = buildOptions(result);
	const positionals = parsePositionals(rawArgs);
	const parsed =
		help || version
			? { command: null, options }
			: buildParsedCommand(command, options, positionals);
	return {
		command,
		options,
		positionals,
		rawArgs,
		help,
		version,
		parsed,
	};
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	try {
		return parseCliArgs(argv);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(message);
		process.exit(ExitCode.InvalidArgument);
	}
};

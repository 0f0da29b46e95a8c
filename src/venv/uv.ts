import { execa } from "execa";
import { errorMessage, getErrnoCode, ProvisioningError } from "#core/errors";

export const UV_COMMAND_ENV = "ODOO_WORKSPACE_UV_COMMAND";
const DEFAULT_TIMEOUT_MS = 60 * 60 * 1000;

export const SEED_PACKAGES = ["pip", "setuptools", "wheel"] as const;

/**
 * Python environment capability used by provisioning. The default
 * implementation drives `uv`, and the venv interpreter for pip-only steps.
 */
export type PythonEnvTool = {
	installPython: (version: string) => Promise<void>;
	createVenv: (params: {
		venvDir: string;
		pythonVersion: string;
		managedPython: boolean;
	}) => Promise<void>;
	installPackages: (
		venvPython: string,
		packages: readonly string[],
	) => Promise<void>;
	/** `uv pip install -U -r <file>` */
	installRequirements: (venvPython: string, requirementsPath: string) => Promise<void>;
	compileLock: (params: {
		venvPython: string;
		inputPath: string;
		outputPath: string;
		buildConstraintsPath: string | null;
	}) => Promise<void>;
	purgeWheelCache: (venvPython: string) => Promise<void>;
	buildWheels: (params: {
		venvPython: string;
		requirementsPath: string;
		wheelhouseDir: string;
	}) => Promise<void>;
	syncFromWheelhouse: (params: {
		venvPython: string;
		requirementsPath: string;
		wheelhouseDir: string;
	}) => Promise<void>;
	installEditable: (venvPython: string, projectDir: string) => Promise<void>;
};

export type UvToolOptions = {
	cwd: string;
	env?: NodeJS.ProcessEnv;
	platform?: NodeJS.Platform;
	timeoutMs?: number;
	logger?: (message: string) => void;
};

export const resolveUvCommand = (env: NodeJS.ProcessEnv = process.env) =>
	env[UV_COMMAND_ENV] || "uv";

/** uv's download key for a managed x86_64 interpreter. */
export const managedPythonTag = (
	version: string,
	platform: NodeJS.Platform = process.platform,
) =>
	platform === "win32"
		? `cpython-${version}-windows-x86_64-none`
		: `cpython-${version}-linux-x86_64-gnu`;

const failureDetail = (error: unknown) => {
	if (
		typeof error === "object" &&
		error !== null &&
		"stderr" in error &&
		typeof error.stderr === "string" &&
		error.stderr.trim()
	) {
		return error.stderr.trim();
	}
	return errorMessage(error);
};

export const createUvTool = (options: UvToolOptions): PythonEnvTool => {
	const uv = resolveUvCommand(options.env);

	const run = async (
		command: string,
		args: readonly string[],
		description: string,
	) => {
		options.logger?.(`${command} ${args.join(" ")}`);
		try {
			await execa(command, args, {
				cwd: options.cwd,
				env: options.env,
				timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
				stdout: "pipe",
				stderr: "pipe",
			});
		} catch (error) {
			if (getErrnoCode(error) === "ENOENT") {
				throw new ProvisioningError(
					`Required command not found in PATH: ${command}`,
					{ cause: error },
				);
			}
			throw new ProvisioningError(
				`${description}\nCommand: ${command} ${args.join(" ")}\n${failureDetail(error)}`,
				{ cause: error },
			);
		}
	};

	return {
		installPython: async (version) => {
			const tag = managedPythonTag(version, options.platform);
			await run(
				uv,
				["python", "install", tag],
				`Failed to install managed python ${version} with uv: ${tag}`,
			);
		},
		createVenv: async ({ venvDir, pythonVersion, managedPython }) => {
			await run(
				uv,
				[
					"venv",
					"-p",
					pythonVersion,
					venvDir,
					...(managedPython ? [] : ["--no-managed-python"]),
				],
				`Failed to create virtualenv at: ${venvDir}`,
			);
		},
		installPackages: async (venvPython, packages) => {
			await run(
				uv,
				["pip", "install", "-p", venvPython, ...packages],
				"Failed to install packages into venv.",
			);
		},
		installRequirements: async (venvPython, requirementsPath) => {
			await run(
				uv,
				["pip", "install", "-p", venvPython, "-U", "-r", requirementsPath],
				`Failed to install requirements into venv: ${requirementsPath}`,
			);
		},
		compileLock: async ({
			venvPython,
			inputPath,
			outputPath,
			buildConstraintsPath,
		}) => {
			await run(
				uv,
				[
					"pip",
					"compile",
					"-p",
					venvPython,
					inputPath,
					"-o",
					outputPath,
					...(buildConstraintsPath
						? ["--build-constraints", buildConstraintsPath]
						: []),
				],
				`Failed to compile requirements lock file.\nInput: ${inputPath}\nOutput: ${outputPath}`,
			);
		},
		purgeWheelCache: async (venvPython) => {
			await run(
				venvPython,
				["-m", "pip", "cache", "purge"],
				"Failed to clear pip's wheel cache.",
			);
		},
		buildWheels: async ({ venvPython, requirementsPath, wheelhouseDir }) => {
			await run(
				venvPython,
				[
					"-m",
					"pip",
					"wheel",
					"-r",
					requirementsPath,
					"-w",
					wheelhouseDir,
					"--no-deps",
				],
				"Failed to create wheelhouse.",
			);
		},
		syncFromWheelhouse: async ({
			venvPython,
			requirementsPath,
			wheelhouseDir,
		}) => {
			await run(
				uv,
				[
					"pip",
					"sync",
					"-p",
					venvPython,
					"--offline",
					"--no-index",
					"-f",
					wheelhouseDir,
					requirementsPath,
				],
				"Failed to install requirements from wheelhouse.",
			);
		},
		installEditable: async (venvPython, projectDir) => {
			await run(
				venvPython,
				[
					"-m",
					"pip",
					"install",
					"--no-deps",
					"--no-build-isolation",
					"-e",
					projectDir,
				],
				"Failed to install Odoo in editable mode.",
			);
		},
	};
};

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { ProjectConfig, VirtualenvConfig } from "#config";
import { ConfigValidationError, ProvisioningError } from "#core/errors";
import { exists, removeDir } from "#core/fs-utils";
import {
	BUILD_CONSTRAINTS_FILENAME,
	LOCK_FILENAME,
	REQUIREMENTS_IN_FILENAME,
	type WorkspaceLayout,
} from "#core/paths";
import {
	buildRequirementsInput,
	DEFAULT_REQUIREMENTS,
} from "#venv/requirements";
import { type PythonEnvTool, SEED_PACKAGES } from "#venv/uv";

export const REQUIREMENTS_FILENAME = "requirements.txt";

export type ProvisionFlags = {
	createVenv: boolean;
	rebuildVenv: boolean;
	createWheelhouse: boolean;
	reuseWheelhouse: boolean;
	clearPipWheelCache: boolean;
};

export type ProvisionDeps = {
	tool: PythonEnvTool;
	exists?: (target: string) => Promise<boolean>;
	removeDir?: (target: string) => Promise<void>;
	listWheels?: (wheelhouseDir: string) => Promise<string[]>;
	logger?: (message: string) => void;
};

export type ProvisionedEnvironment = {
	venvPython: string;
	lockPath: string | null;
	buildConstraintsPath: string | null;
};

export const isVenvEnabled = (flags: ProvisionFlags) =>
	flags.createVenv || flags.rebuildVenv;

export const isProvisioningEnabled = (flags: ProvisionFlags) =>
	isVenvEnabled(flags) || flags.createWheelhouse;

export const provisionFlagError = (flags: ProvisionFlags) => {
	if (flags.reuseWheelhouse && !isVenvEnabled(flags)) {
		return "--reuse-wheelhouse requires --create-venv (or --rebuild-venv).";
	}
	if (flags.createWheelhouse && flags.reuseWheelhouse) {
		return "--create-wheelhouse can not be used with --reuse-wheelhouse.";
	}
	return null;
};

/** `[virtualenv]` with a python version, required once provisioning is on. */
export const requireVirtualenv = (
	project: Pick<ProjectConfig, "virtualenv">,
): VirtualenvConfig & { python_version: string } => {
	const { virtualenv } = project;
	if (!virtualenv) {
		throw new ConfigValidationError("Missing INI section: [virtualenv]");
	}
	const pythonVersion = virtualenv.python_version;
	if (!pythonVersion) {
		throw new ConfigValidationError(
			"Missing option 'python_version' in section [virtualenv].",
		);
	}
	return { ...virtualenv, python_version: pythonVersion };
};

const listWheels = (wheelhouseDir: string) =>
	fg("*.whl", { cwd: wheelhouseDir, onlyFiles: true });

/**
 * Reset the venv and wheelhouse as the flags ask, then make sure an
 * interpreter exists. Runs before repositories are synced.
 */
export const prepareEnvironment = async (
	params: {
		layout: WorkspaceLayout;
		virtualenv: VirtualenvConfig & { python_version: string };
		flags: ProvisionFlags;
	},
	deps: ProvisionDeps,
) => {
	const { layout, virtualenv, flags } = params;
	const check = deps.exists ?? exists;
	const remove = deps.removeDir ?? removeDir;

	if ((flags.rebuildVenv || flags.createWheelhouse) && (await check(layout.venvDir))) {
		deps.logger?.(`Rebuilding venv: removing ${layout.venvDir}`);
		await remove(layout.venvDir);
	}

	if (flags.reuseWheelhouse) {
		if (!(await check(layout.wheelhouseDir))) {
			throw new ProvisioningError(
				`--reuse-wheelhouse set but wheelhouse dir not found: ${layout.wheelhouseDir}`,
			);
		}
	} else {
		if (await check(layout.wheelhouseDir)) {
			deps.logger?.(`Rebuilding wheelhouse: removing ${layout.wheelhouseDir}`);
			await remove(layout.wheelhouseDir);
		}
		await mkdir(layout.wheelhouseDir, { recursive: true });
	}

	if (!(await check(layout.venvDir))) {
		if (virtualenv.managed_python) {
			deps.logger?.(`Installing managed python ${virtualenv.python_version}`);
			await deps.tool.installPython(virtualenv.python_version);
		}
		deps.logger?.(`Creating virtualenv: ${layout.venvDir}`);
		await deps.tool.createVenv({
			venvDir: layout.venvDir,
			pythonVersion: virtualenv.python_version,
			managedPython: virtualenv.managed_python,
		});
		if (!flags.reuseWheelhouse) {
			await deps.tool.installPackages(layout.venvPython, SEED_PACKAGES);
		}
	}

	if (!(await check(layout.venvPython))) {
		throw new ProvisioningError(
			`venv python not found at expected path: ${layout.venvPython}`,
		);
	}
	return layout.venvPython;
};

/** Existing `requirements.txt` files: core first, then addons in order. */
export const collectRequirementFiles = async (
	project: Pick<ProjectConfig, "odoo" | "addons">,
	check: (target: string) => Promise<boolean> = exists,
) => {
	const files: string[] = [];
	for (const repo of [project.odoo, ...project.addons]) {
		const candidate = path.join(repo.dir, REQUIREMENTS_FILENAME);
		if (await check(candidate)) {
			files.push(candidate);
		}
	}
	return files;
};

/**
 * Compile one lock for every repository, build the wheelhouse and install
 * from it offline, or only install when the wheelhouse is reused.
 */
export const installRequirements = async (
	params: {
		layout: WorkspaceLayout;
		virtualenv: VirtualenvConfig;
		flags: ProvisionFlags;
		venvPython: string;
		requirementFiles: readonly string[];
	},
	deps: ProvisionDeps,
): Promise<ProvisionedEnvironment> => {
	const { layout, virtualenv, flags, venvPython } = params;
	const check = deps.exists ?? exists;
	const lockPath = path.join(layout.wheelhouseDir, LOCK_FILENAME);
	const inputPath = path.join(layout.wheelhouseDir, REQUIREMENTS_IN_FILENAME);
	const buildConstraintsPath = path.join(
		layout.wheelhouseDir,
		BUILD_CONSTRAINTS_FILENAME,
	);

	if (!(await check(layout.odooDir))) {
		throw new ProvisioningError(
			`Odoo directory not found: ${layout.odooDir}. Run with --sync-odoo/--sync-all first (or ensure ROOT/odoo exists).`,
		);
	}

	if (flags.reuseWheelhouse) {
		const wheels = await (deps.listWheels ?? listWheels)(layout.wheelhouseDir);
		if (wheels.length === 0) {
			throw new ProvisioningError(
				`Wheelhouse looks empty (no .whl files): ${layout.wheelhouseDir}`,
			);
		}
		if (!(await check(lockPath))) {
			throw new ProvisioningError(
				`--reuse-wheelhouse set but lock file not found: ${lockPath}`,
			);
		}
		if (virtualenv.build_constraints.length > 0 && !(await check(buildConstraintsPath))) {
			throw new ProvisioningError(
				`--reuse-wheelhouse set but build constraints file not found: ${buildConstraintsPath}`,
			);
		}
		await deps.tool.syncFromWheelhouse({
			venvPython,
			requirementsPath: lockPath,
			wheelhouseDir: layout.wheelhouseDir,
		});
	} else {
		if (virtualenv.build_constraints.length > 0) {
			await writeFile(
				buildConstraintsPath,
				`${virtualenv.build_constraints.join("\n")}\n`,
				"utf8",
			);
		}
		const coreRequirements = path.join(layout.odooDir, REQUIREMENTS_FILENAME);
		if (!(await check(coreRequirements))) {
			throw new ProvisioningError(
				`Odoo requirements file not found: ${coreRequirements}`,
			);
		}
		await writeFile(
			inputPath,
			await buildRequirementsInput({
				root: layout.root,
				baseRequirements: [...DEFAULT_REQUIREMENTS, ...virtualenv.requirements],
				files: params.requirementFiles,
				ignore: virtualenv.requirements_ignore,
			}),
			"utf8",
		);
		const constraints = (await check(buildConstraintsPath))
			? buildConstraintsPath
			: null;
		deps.logger?.(`Compiling lock file: ${inputPath} -> ${lockPath}`);
		await deps.tool.compileLock({
			venvPython,
			inputPath,
			outputPath: lockPath,
			buildConstraintsPath: constraints,
		});
		if (flags.clearPipWheelCache) {
			await deps.tool.purgeWheelCache(venvPython);
		}
		if (constraints) {
			await deps.tool.installRequirements(venvPython, constraints);
		}
		deps.logger?.(`Creating wheelhouse: ${lockPath} -> ${layout.wheelhouseDir}`);
		await deps.tool.buildWheels({
			venvPython,
			requirementsPath: lockPath,
			wheelhouseDir: layout.wheelhouseDir,
		});
		if (isVenvEnabled(flags)) {
			await deps.tool.syncFromWheelhouse({
				venvPython,
				requirementsPath: lockPath,
				wheelhouseDir: layout.wheelhouseDir,
			});
		}
	}

	if (isVenvEnabled(flags)) {
		deps.logger?.(`Installing Odoo in editable mode: ${layout.odooDir}`);
		await deps.tool.installEditable(venvPython, layout.odooDir);
	}

	return {
		venvPython,
		lockPath: (await check(lockPath)) ? lockPath : null,
		buildConstraintsPath: (await check(buildConstraintsPath))
			? buildConstraintsPath
			: null,
	};
};

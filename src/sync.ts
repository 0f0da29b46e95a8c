import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import pc from "picocolors";
import { symbols, ui } from "#cli/ui";
import { loadProjectConfig, type ProjectConfig, type RepoSpec } from "#config";
import { resolveAddonsPath } from "#core/addons-path";
import {
	getErrnoCode,
	ProvisioningError,
	RootNotFoundError,
} from "#core/errors";
import { createLayout, type WorkspaceLayout } from "#core/paths";
import { renderOdooConf, resolveDataDir, writeOdooConf } from "#core/render-conf";
import {
	assertSafeDbName,
	type WrittenScript,
	writeScripts,
} from "#core/scripts";
import { createGitClient, type GitClient } from "#git/client";
import {
	type RepoSyncHooks,
	type RepoSyncResult,
	syncRepositories,
} from "#git/repo-sync";
import {
	collectRequirementFiles,
	installRequirements,
	isProvisioningEnabled,
	prepareEnvironment,
	type ProvisionedEnvironment,
	type ProvisionFlags,
	provisionFlagError,
	requireVirtualenv,
} from "#venv/provision";
import { createUvTool, type PythonEnvTool } from "#venv/uv";

export type SyncTarget = "none" | "odoo" | "addons" | "all";

export type SyncOptions = {
	iniPath: string;
	root?: string;
	deployRoot?: string;
	target: SyncTarget;
	provision: ProvisionFlags;
	noConfigs: boolean;
	noScripts: boolean;
	noDataDir: boolean;
	timeoutMs?: number;
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
};

export type SyncDeps = {
	git?: GitClient;
	pythonTool?: PythonEnvTool;
	templatesDir?: string;
	logger?: (message: string) => void;
	progressLogger?: (message: string) => void;
	warn?: (message: string) => void;
	hooks?: RepoSyncHooks;
};

export type SyncSummary = {
	iniPath: string;
	sources: string[];
	root: string;
	deployRoot: string;
	synced: { odoo: boolean; addons: boolean };
	repositories: RepoSyncResult[];
	layout: WorkspaceLayout;
	dataDir: string | null;
	confPath: string | null;
	scripts: WrittenScript[] | null;
	environment: ProvisionedEnvironment | null;
};

export const syncsCore = (target: SyncTarget) =>
	target === "odoo" || target === "all";
export const syncsAddons = (target: SyncTarget) =>
	target === "addons" || target === "all";

/** Repositories a run touches, core first, then addons in declaration order. */
export const selectRepositories = (
	project: Pick<ProjectConfig, "odoo" | "addons">,
	target: SyncTarget,
): RepoSpec[] => [
	...(syncsCore(target) ? [project.odoo] : []),
	...(syncsAddons(target) ? project.addons : []),
];

export const resolveBuildRoot = async (iniPath: string, root?: string) => {
	const resolved = path.resolve(root ?? path.dirname(path.resolve(iniPath)));
	try {
		const info = await stat(resolved);
		if (!info.isDirectory()) {
			throw new RootNotFoundError(resolved, "Workspace root is not a directory");
		}
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			throw new RootNotFoundError(resolved);
		}
		throw error;
	}
	return resolved;
};

/**
 * One convergence run: resolve the configuration (read-only), prepare the
 * Python environment, sync repositories, install requirements, then write
 * the runtime config and helper scripts.
 */
export const runSync = async (
	options: SyncOptions,
	deps: SyncDeps = {},
): Promise<SyncSummary> => {
	const flagError = provisionFlagError(options.provision);
	if (flagError) {
		throw new ProvisioningError(flagError);
	}
	const platform = options.platform ?? process.platform;
	const root = await resolveBuildRoot(options.iniPath, options.root);
	const project = await loadProjectConfig(options.iniPath, {
		root,
		deployRoot: options.deployRoot,
		platform,
		env: options.env,
		logger: deps.logger,
	});
	const provisioning = isProvisioningEnabled(options.provision);
	const virtualenv = provisioning ? requireVirtualenv(project) : null;
	const dbName = project.config.db_name?.trim();
	if (!options.noScripts && dbName) {
		assertSafeDbName(dbName);
	}

	const layout = createLayout(project.scopes.build.root_dir, platform);
	const deployLayout = createLayout(project.scopes.deploy.root_dir, platform);
	const dataDir = resolveDataDir(
		project.config,
		deployLayout.root,
		deployLayout.dataDir,
	);
	if (dataDir !== deployLayout.dataDir) {
		deps.warn?.(
			`data_dir override via [config]: from=${deployLayout.dataDir}, to=${dataDir}`,
		);
	}

	const tool =
		deps.pythonTool ??
		createUvTool({
			cwd: layout.root,
			env: options.env,
			platform,
			logger: deps.logger,
		});
	let venvPython: string | null = null;
	if (virtualenv) {
		venvPython = await prepareEnvironment(
			{ layout, virtualenv, flags: options.provision },
			{ tool, logger: deps.logger },
		);
		if (options.provision.reuseWheelhouse && options.target !== "none") {
			deps.warn?.(
				"--reuse-wheelhouse is set together with repo sync targets; the lock and wheelhouse are not rebuilt. Re-run without --reuse-wheelhouse if requirements changed.",
			);
		}
	}

	await mkdir(layout.configsDir, { recursive: true });
	await mkdir(layout.addonsDir, { recursive: true });
	await mkdir(layout.scriptsDir, { recursive: true });
	await mkdir(layout.backupsDir, { recursive: true });
	// The data dir is a deploy-side path; it is only created on this machine
	// when deploy and build roots match.
	const createDataDir = !options.noDataDir && deployLayout.root === layout.root;
	if (createDataDir) {
		await mkdir(dataDir, { recursive: true });
	}

	const git =
		deps.git ??
		createGitClient({
			timeoutMs: options.timeoutMs,
			env: options.env,
			logger: deps.logger,
			progressLogger: deps.progressLogger,
		});
	const specs = selectRepositories(project, options.target);
	if (syncsAddons(options.target) && project.addons.length === 0) {
		deps.logger?.("No [addons.*] sections configured; skipping addons sync.");
	}
	const repositories = await syncRepositories(
		specs,
		{ git, logger: deps.warn },
		deps.hooks,
	);

	let environment: ProvisionedEnvironment | null = null;
	if (virtualenv && venvPython) {
		environment = await installRequirements(
			{
				layout,
				virtualenv,
				flags: options.provision,
				venvPython,
				requirementFiles: await collectRequirementFiles(project),
			},
			{ tool, logger: deps.logger },
		);
	}

	let confPath: string | null = null;
	if (options.noConfigs) {
		deps.logger?.("Skipping config generation (--no-configs).");
	} else {
		const addonsPath = await resolveAddonsPath(project);
		await writeOdooConf(
			layout.confPath,
			renderOdooConf(project.config, addonsPath, dataDir),
		);
		confPath = layout.confPath;
	}

	let scripts: WrittenScript[] | null = null;
	if (options.noScripts) {
		deps.logger?.("Skipping script generation (--no-scripts).");
	} else {
		scripts = await writeScripts({
			scriptsDir: layout.scriptsDir,
			dbName: project.config.db_name,
			platform,
			templatesDir: deps.templatesDir,
			logger: deps.warn,
		});
	}

	return {
		iniPath: project.iniPath,
		sources: project.sources,
		root: layout.root,
		deployRoot: deployLayout.root,
		synced: {
			odoo: syncsCore(options.target),
			addons: syncsAddons(options.target),
		},
		repositories,
		layout,
		dataDir: options.noDataDir ? null : dataDir,
		confPath,
		scripts,
		environment,
	};
};

export const printSyncSummary = (summary: SyncSummary) => {
	const synced = [
		summary.synced.odoo ? "odoo" : null,
		summary.synced.addons ? "addons" : null,
	].filter((entry): entry is string => entry !== null);
	const generated = [
		summary.confPath ? "configs" : null,
		summary.scripts ? "scripts" : null,
	].filter((entry): entry is string => entry !== null);
	const syncedLabel = synced.length > 0 ? synced.join(", ") : "none";
	const generatedLabel =
		generated.length > 0
			? `(generated: ${generated.join(", ")})`
			: "(no configs and scripts generated)";

	ui.line(`${symbols.success} ${pc.bold("Workspace ready")}`);
	ui.header("Synced", `${syncedLabel} ${pc.dim(generatedLabel)}`);
	ui.header("Root", ui.path(summary.root));
	if (summary.deployRoot !== summary.root) {
		ui.header("Dest root", summary.deployRoot);
	}
	ui.header("Odoo", ui.path(summary.layout.odooDir));
	ui.header("Addons", ui.path(summary.layout.addonsDir));
	ui.header("Backups", ui.path(summary.layout.backupsDir));
	ui.header("Data", summary.dataDir ?? pc.dim("skipped (--no-data-dir)"));
	ui.header(
		"Config",
		summary.confPath
			? ui.path(summary.confPath)
			: pc.dim(`skipped (--no-configs) [${ui.path(summary.layout.confPath)}]`),
	);
	if (summary.environment) {
		ui.header("Venv", ui.path(summary.layout.venvDir));
		if (summary.environment.lockPath) {
			ui.header("Lock", ui.path(summary.environment.lockPath));
			ui.header("Wheelhouse", ui.path(summary.layout.wheelhouseDir));
		}
		if (summary.environment.buildConstraintsPath) {
			ui.header("Constraints", ui.path(summary.environment.buildConstraintsPath));
		}
	}
	if (!summary.scripts) {
		ui.header("Scripts", pc.dim("skipped (--no-scripts)"));
		return;
	}
	ui.header("Scripts", `${summary.scripts.length} written`);
	for (const script of summary.scripts) {
		ui.item(symbols.info, script.name, ui.path(script.path));
	}
};

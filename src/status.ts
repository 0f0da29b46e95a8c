import pc from "picocolors";
import { symbols, ui } from "#cli/ui";
import { loadProjectConfig, type RepoSpec } from "#config";
import { errorMessage, isWorkspaceError } from "#core/errors";
import { exists } from "#core/fs-utils";
import { createLayout } from "#core/paths";
import { resolveBuildRoot } from "#core/sync";
import { createGitClient, type GitClient } from "#git/client";
import {
	observeRepoState,
	type RepoState,
	type RepoStateDeps,
} from "#git/repo-state";
import { planRepoSync, type RepoAction } from "#git/repo-sync";

type StatusOptions = {
	iniPath: string;
	root?: string;
	deployRoot?: string;
	timeoutMs?: number;
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
};

type StatusDeps = Omit<RepoStateDeps, "git"> & {
	git?: GitClient;
	logger?: (message: string) => void;
};

export type RepoStatus = {
	name: string;
	dir: string;
	repo: string;
	branch: string;
	shallow: boolean;
	observed: RepoState | null;
	/** What a sync would do, or `blocked` when it would refuse. */
	action: RepoAction | "blocked";
	error: string | null;
};

const describeRepo = async (
	spec: RepoSpec,
	deps: RepoStateDeps,
): Promise<RepoStatus> => {
	const base = {
		name: spec.name,
		dir: spec.dir,
		repo: spec.repo,
		branch: spec.branch,
		shallow: spec.shallow,
	};
	try {
		const observed = await observeRepoState(spec.dir, deps);
		if (observed.dirty) {
			return {
				...base,
				observed,
				action: "blocked",
				error: `local changes (${observed.changes.length} paths)`,
			};
		}
		return {
			...base,
			observed,
			action: planRepoSync(observed.kind, spec).action,
			error: null,
		};
	} catch (error) {
		if (!isWorkspaceError(error)) {
			throw error;
		}
		return { ...base, observed: null, action: "blocked", error: errorMessage(error) };
	}
};

/** Read-only view of the workspace against its configuration. */
export const getStatus = async (
	options: StatusOptions,
	deps: StatusDeps = {},
) => {
	const platform = options.platform ?? process.platform;
	const root = await resolveBuildRoot(options.iniPath, options.root);
	const project = await loadProjectConfig(options.iniPath, {
		root,
		deployRoot: options.deployRoot,
		platform,
		env: options.env,
		logger: deps.logger,
	});
	const layout = createLayout(project.scopes.build.root_dir, platform);
	const git =
		deps.git ??
		createGitClient({ timeoutMs: options.timeoutMs, env: options.env });

	const repositories: RepoStatus[] = [];
	for (const spec of [project.odoo, ...project.addons]) {
		repositories.push(
			await describeRepo(spec, {
				git,
				listDir: deps.listDir,
				exists: deps.exists,
			}),
		);
	}

	return {
		iniPath: project.iniPath,
		sources: project.sources,
		root: layout.root,
		deployRoot: project.scopes.deploy.root_dir,
		confPath: layout.confPath,
		confExists: await exists(layout.confPath),
		venvDir: layout.venvDir,
		venvExists: await exists(layout.venvPython),
		repositories,
	};
};

export type WorkspaceStatus = Awaited<ReturnType<typeof getStatus>>;

export const printStatus = (status: WorkspaceStatus) => {
	const state = (present: boolean) =>
		present ? pc.green("present") : pc.yellow("missing");
	ui.header("Config", ui.path(status.iniPath));
	ui.header("Root", ui.path(status.root));
	if (status.deployRoot !== status.root) {
		ui.header("Dest root", status.deployRoot);
	}
	ui.header("Conf", `${ui.path(status.confPath)} (${state(status.confExists)})`);
	ui.header("Venv", `${ui.path(status.venvDir)} (${state(status.venvExists)})`);
	ui.line();
	for (const repo of status.repositories) {
		const observed = repo.observed
			? `${repo.observed.kind}${repo.observed.branch ? ` ${repo.observed.branch}` : ""} ${ui.hash(repo.observed.head)}`
			: "unknown";
		const desired = `${repo.shallow ? "shallow" : "full"} ${repo.branch}`;
		if (repo.error) {
			ui.item(symbols.error, repo.name, `${observed} -> ${desired}: ${repo.error}`);
			continue;
		}
		const icon =
			repo.action === "update-full" || repo.action === "update-shallow"
				? symbols.success
				: symbols.warn;
		ui.item(icon, repo.name, `${observed} -> ${desired} (${repo.action})`);
	}
};

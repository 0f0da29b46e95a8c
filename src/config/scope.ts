import path from "node:path";
import { createLayout } from "#core/paths";

export const SCOPE_VARIABLES = [
	"ini_dir",
	"root_dir",
	"odoo_dir",
	"addons_dir",
	"backups_dir",
	"configs_dir",
	"config_path",
	"scripts_dir",
	"venv_python",
] as const;

export type ScopeVariable = (typeof SCOPE_VARIABLES)[number];

export type VariableScope = Readonly<Record<ScopeVariable, string>>;

export type ScopePair = {
	build: VariableScope;
	deploy: VariableScope;
};

export const buildScope = (
	root: string,
	iniDir: string,
	platform: NodeJS.Platform = process.platform,
): VariableScope => {
	const layout = createLayout(root, platform);
	return Object.freeze({
		ini_dir: iniDir,
		root_dir: layout.root,
		odoo_dir: layout.odooDir,
		addons_dir: layout.addonsDir,
		backups_dir: layout.backupsDir,
		configs_dir: layout.configsDir,
		config_path: layout.confPath,
		scripts_dir: layout.scriptsDir,
		venv_python: layout.venvPython,
	});
};

/**
 * Resolve the deployment root: relative paths are anchored at the build
 * root, and a missing value means "same as the build root".
 */
export const resolveDeployRoot = (buildRoot: string, deployRoot?: string) =>
	deployRoot ? path.resolve(buildRoot, deployRoot) : buildRoot;

/**
 * Build and deploy scopes for one run. `ini_dir` always comes from the build
 * side, so both scopes share it.
 */
export const buildScopes = (params: {
	root: string;
	iniDir: string;
	deployRoot?: string;
	platform?: NodeJS.Platform;
}): ScopePair => {
	const build = buildScope(params.root, params.iniDir, params.platform);
	const deployRoot = resolveDeployRoot(params.root, params.deployRoot);
	if (deployRoot === params.root) {
		return { build, deploy: build };
	}
	return {
		build,
		deploy: buildScope(deployRoot, build.ini_dir, params.platform),
	};
};

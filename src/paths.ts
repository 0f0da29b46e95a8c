import path from "node:path";

export const CONF_FILENAME = "odoo-server.conf";
export const LOCK_FILENAME = "all-requirements.lock.txt";
export const REQUIREMENTS_IN_FILENAME = "all-requirements.in.txt";
export const BUILD_CONSTRAINTS_FILENAME = "build-constraints.txt";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

export type WorkspaceLayout = {
	root: string;
	odooDir: string;
	addonsDir: string;
	backupsDir: string;
	configsDir: string;
	confPath: string;
	dataDir: string;
	scriptsDir: string;
	venvDir: string;
	venvPython: string;
	wheelhouseDir: string;
};

export const venvPythonPath = (
	venvDir: string,
	platform: NodeJS.Platform = process.platform,
) =>
	platform === "win32"
		? path.join(venvDir, "Scripts", "python.exe")
		: path.join(venvDir, "bin", "python");

export const createLayout = (
	root: string,
	platform: NodeJS.Platform = process.platform,
): WorkspaceLayout => {
	const configsDir = path.join(root, "odoo-configs");
	const venvDir = path.join(root, "venv");
	return {
		root,
		odooDir: path.join(root, "odoo"),
		addonsDir: path.join(root, "odoo-addons"),
		backupsDir: path.join(root, "odoo-backups"),
		configsDir,
		confPath: path.join(configsDir, CONF_FILENAME),
		dataDir: path.join(root, "odoo-data"),
		scriptsDir: path.join(root, "odoo-scripts"),
		venvDir,
		venvPython: venvPythonPath(venvDir, platform),
		wheelhouseDir: path.join(root, "wheelhouse"),
	};
};

/**
 * Anchor a user-supplied path at `root`: `~` is the home directory and
 * relative values are resolved against the root.
 */
export const resolveUserPath = (value: string, root: string, home: string) => {
	const trimmed = value.trim();
	const expanded =
		trimmed === "~" || trimmed.startsWith("~/")
			? path.join(home, trimmed.slice(1))
			: trimmed;
	return path.resolve(root, expanded);
};

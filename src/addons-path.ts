import { homedir } from "node:os";
import path from "node:path";
import type { ProjectConfig } from "#config";
import { splitIniList } from "#config/ini-reader";
import { exists } from "#core/fs-utils";
import { resolveUserPath } from "#core/paths";

export const ADDONS_PATH_OPTION = "addons_path";

/** Addons directories Odoo ships, relative to the core checkout. */
export const CORE_ADDONS_DIRS = [
	["addons"],
	["odoo", "addons"],
] as const;

/**
 * Base entries first, then user entries in the order given. Relative user
 * entries are anchored at `root`; the first occurrence of a path wins.
 */
export const mergeAddonsPath = (
	base: readonly string[],
	userValue: string | undefined,
	root: string,
	home: string = homedir(),
) => {
	const user = userValue
		? splitIniList(userValue).map((entry) => resolveUserPath(entry, root, home))
		: [];
	const merged: string[] = [];
	const seen = new Set<string>();
	for (const entry of [...base, ...user]) {
		const normalized = path.resolve(entry);
		if (seen.has(normalized)) continue;
		seen.add(normalized);
		merged.push(normalized);
	}
	return merged;
};

/** Odoo reads `addons_path` as a comma-separated list. */
export const joinAddonsPath = (entries: readonly string[]) => entries.join(",");

/**
 * Core addons directories are probed in the build-side checkout but
 * reported under the deploy root, like every other entry.
 */
export const resolveAddonsPath = async (
	project: Pick<ProjectConfig, "scopes" | "addons" | "config">,
	deps: { exists?: (target: string) => Promise<boolean>; home?: string } = {},
) => {
	const { build, deploy } = project.scopes;
	const check = deps.exists ?? exists;
	const base: string[] = [];
	for (const segments of CORE_ADDONS_DIRS) {
		if (await check(path.join(build.odoo_dir, ...segments))) {
			base.push(path.join(deploy.odoo_dir, ...segments));
		}
	}
	for (const addon of project.addons) {
		base.push(path.join(deploy.addons_dir, addon.name));
	}
	return mergeAddonsPath(
		base,
		project.config[ADDONS_PATH_OPTION],
		deploy.root_dir,
		deps.home,
	);
};

import { readdir } from "node:fs/promises";
import path from "node:path";
import { getErrnoCode, RepositoryOperationError } from "#core/errors";
import { exists } from "#core/fs-utils";
import type { GitClient } from "#git/client";

export type RepoKind = "absent" | "full" | "shallow";

export type RepoState = {
	kind: RepoKind;
	dirty: boolean;
	/** Porcelain status lines behind `dirty`. */
	changes: string[];
	branch: string | null;
	head: string | null;
};

export type RepoStateDeps = {
	git: GitClient;
	/** Entries of `dir`, or null when it does not exist. */
	listDir?: (dir: string) => Promise<string[] | null>;
	exists?: (target: string) => Promise<boolean>;
};

const absentState = (): RepoState => ({
	kind: "absent",
	dirty: false,
	changes: [],
	branch: null,
	head: null,
});

export const listDir = async (dir: string) => {
	try {
		return await readdir(dir);
	} catch (error) {
		const code = getErrnoCode(error);
		if (code === "ENOENT") {
			return null;
		}
		if (code === "ENOTDIR") {
			throw new RepositoryOperationError(
				`sync ${dir}`,
				"Path exists and is not a directory",
			);
		}
		throw error;
	}
};

/**
 * Observe one checkout directory. A missing or empty directory is absent; a
 * non-empty directory without `.git` is not ours to touch.
 */
export const observeRepoState = async (
	dir: string,
	deps: RepoStateDeps,
): Promise<RepoState> => {
	const entries = await (deps.listDir ?? listDir)(dir);
	if (entries === null || entries.length === 0) {
		return absentState();
	}
	if (!(await (deps.exists ?? exists)(path.join(dir, ".git")))) {
		throw new RepositoryOperationError(
			`sync ${dir}`,
			"Directory exists, is not empty and is not a git repository",
		);
	}
	const changes = await deps.git.status(dir);
	return {
		kind: (await deps.git.isShallow(dir)) ? "shallow" : "full",
		dirty: changes.length > 0,
		changes,
		branch: await deps.git.currentBranch(dir),
		head: await deps.git.head(dir),
	};
};

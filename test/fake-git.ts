import path from "node:path";
import { FULL_REFSPEC, type GitClient } from "#git/client";
import type { RepoStateDeps } from "#git/repo-state";

export type FakeRepo = {
	shallow: boolean;
	changes: string[];
	branch: string | null;
	head: string | null;
	refspecs: string[];
};

/**
 * In-memory stand-in for git checkouts. Mutating calls are recorded in
 * `calls`; queries are not.
 */
export const createFakeGit = () => {
	const repos = new Map<string, FakeRepo>();
	const plainDirs = new Map<string, string[]>();
	const calls: string[] = [];
	let commit = 0;

	const repoAt = (dir: string) => {
		const repo = repos.get(dir);
		if (!repo) {
			throw new Error(`not a repository: ${dir}`);
		}
		return repo;
	};

	const git: GitClient = {
		clone: async ({ dir, branch, shallow }) => {
			calls.push(`clone ${dir} ${shallow ? "shallow" : "full"} ${branch}`);
			commit += 1;
			repos.set(dir, {
				shallow,
				changes: [],
				branch,
				head: `c${commit}`,
				refspecs: shallow
					? [`+refs/heads/${branch}:refs/remotes/origin/${branch}`]
					: [FULL_REFSPEC],
			});
		},
		isShallow: async (dir) => repoAt(dir).shallow,
		status: async (dir) => [...repoAt(dir).changes],
		currentBranch: async (dir) => repoAt(dir).branch,
		head: async (dir) => repoAt(dir).head,
		fetchRefspecs: async (dir) => [...repoAt(dir).refspecs],
		replaceFetchRefspecs: async (dir, refspec) => {
			calls.push(`set-refspec ${dir}`);
			repoAt(dir).refspecs = [refspec];
		},
		fetch: async (dir, mode) => {
			calls.push(`fetch ${dir} ${mode.kind}`);
			if (mode.kind === "unshallow") {
				repoAt(dir).shallow = false;
			}
		},
		checkout: async (dir, branch, startPoint) => {
			calls.push(`checkout ${dir} ${branch} ${startPoint}`);
			repoAt(dir).branch = branch;
		},
		resetHard: async (dir, ref) => {
			calls.push(`reset ${dir} ${ref}`);
		},
	};

	const deps: RepoStateDeps = {
		git,
		listDir: async (dir) => {
			if (repos.has(dir)) return [".git"];
			return plainDirs.get(dir) ?? null;
		},
		exists: async (target) =>
			path.basename(target) === ".git" && repos.has(path.dirname(target)),
	};

	const addRepo = (dir: string, repo: Partial<FakeRepo> = {}) => {
		repos.set(dir, {
			shallow: false,
			changes: [],
			branch: "17.0",
			head: "c0",
			refspecs: [FULL_REFSPEC],
			...repo,
		});
	};

	const addPlainDir = (dir: string, entries: string[]) => {
		plainDirs.set(dir, entries);
	};

	return { git, deps, repos, calls, addRepo, addPlainDir };
};

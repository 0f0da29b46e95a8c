import type { RepoSpec } from "#config";
import { DirtyWorkingTreeError } from "#core/errors";
import { type FetchMode, FULL_REFSPEC } from "#git/client";
import {
	observeRepoState,
	type RepoKind,
	type RepoState,
	type RepoStateDeps,
} from "#git/repo-state";

export type RepoAction =
	| "clone-full"
	| "clone-shallow"
	| "update-full"
	| "update-shallow"
	| "unshallow"
	| "keep-full";

export type SyncStep =
	| { kind: "clone"; shallow: boolean }
	| { kind: "widen-refspec" }
	| { kind: "fetch"; mode: FetchMode }
	| { kind: "checkout" }
	| { kind: "reset" };

export type RepoSyncPlan = {
	action: RepoAction;
	steps: SyncStep[];
	warning: string | null;
};

export type RepoSyncResult = {
	name: string;
	dir: string;
	action: RepoAction;
	before: RepoState;
	head: string | null;
	warning: string | null;
};

export type RepoSyncDeps = RepoStateDeps & {
	logger?: (message: string) => void;
};

export type RepoSyncHooks = {
	onStart?: (spec: RepoSpec) => void;
	onDone?: (result: RepoSyncResult) => void;
	onError?: (spec: RepoSpec, error: unknown) => void;
};

const fullUpdateSteps = (): SyncStep[] => [
	{ kind: "widen-refspec" },
	{ kind: "fetch", mode: { kind: "all" } },
	{ kind: "checkout" },
	{ kind: "reset" },
];

/** Transition from the observed kind to the declared one. Pure. */
export const planRepoSync = (
	observed: RepoKind,
	spec: Pick<RepoSpec, "branch" | "shallow">,
): RepoSyncPlan => {
	if (observed === "absent") {
		return {
			action: spec.shallow ? "clone-shallow" : "clone-full",
			steps: [{ kind: "clone", shallow: spec.shallow }],
			warning: null,
		};
	}
	if (observed === "shallow" && spec.shallow) {
		return {
			action: "update-shallow",
			steps: [
				{ kind: "fetch", mode: { kind: "branch", branch: spec.branch } },
				{ kind: "checkout" },
				{ kind: "reset" },
			],
			warning: null,
		};
	}
	if (observed === "shallow") {
		return {
			action: "unshallow",
			steps: [
				{ kind: "widen-refspec" },
				{ kind: "fetch", mode: { kind: "unshallow" } },
				...fullUpdateSteps(),
			],
			warning: null,
		};
	}
	if (spec.shallow) {
		return {
			action: "keep-full",
			steps: fullUpdateSteps(),
			warning:
				"shallow_clone is set but the checkout has full history; it is kept as a full clone",
		};
	}
	return { action: "update-full", steps: fullUpdateSteps(), warning: null };
};

const runStep = async (
	step: SyncStep,
	spec: RepoSpec,
	deps: RepoSyncDeps,
) => {
	const remoteRef = `origin/${spec.branch}`;
	switch (step.kind) {
		case "clone":
			await deps.git.clone({
				repo: spec.repo,
				dir: spec.dir,
				branch: spec.branch,
				shallow: step.shallow,
			});
			return;
		case "widen-refspec": {
			const refspecs = await deps.git.fetchRefspecs(spec.dir);
			if (!refspecs.includes(FULL_REFSPEC)) {
				await deps.git.replaceFetchRefspecs(spec.dir, FULL_REFSPEC);
			}
			return;
		}
		case "fetch":
			await deps.git.fetch(spec.dir, step.mode);
			return;
		case "checkout":
			await deps.git.checkout(spec.dir, spec.branch, remoteRef);
			return;
		case "reset":
			await deps.git.resetHard(spec.dir, remoteRef);
			return;
	}
};

/**
 * Converge one checkout. The working tree is inspected right before the
 * first mutating step; local changes abort without touching it.
 */
export const syncRepository = async (
	spec: RepoSpec,
	deps: RepoSyncDeps,
): Promise<RepoSyncResult> => {
	const before = await observeRepoState(spec.dir, deps);
	if (before.dirty) {
		throw new DirtyWorkingTreeError(spec.dir, before.changes);
	}
	const plan = planRepoSync(before.kind, spec);
	if (plan.warning) {
		deps.logger?.(`${spec.name}: ${plan.warning}`);
	}
	for (const step of plan.steps) {
		await runStep(step, spec, deps);
	}
	return {
		name: spec.name,
		dir: spec.dir,
		action: plan.action,
		before,
		head: await deps.git.head(spec.dir),
		warning: plan.warning,
	};
};

/**
 * Sync in the given order, one at a time. The first failure stops the run;
 * repositories already synced are left as they are.
 */
export const syncRepositories = async (
	specs: readonly RepoSpec[],
	deps: RepoSyncDeps,
	hooks: RepoSyncHooks = {},
) => {
	const results: RepoSyncResult[] = [];
	for (const spec of specs) {
		hooks.onStart?.(spec);
		try {
			const result = await syncRepository(spec, deps);
			results.push(result);
			hooks.onDone?.(result);
		} catch (error) {
			hooks.onError?.(spec, error);
			throw error;
		}
	}
	return results;
};

import { describe, expect, it } from "vitest";
import type { RepoSpec } from "#config";
import { DirtyWorkingTreeError, RepositoryOperationError } from "#core/errors";
import { FULL_REFSPEC } from "#git/client";
import {
	planRepoSync,
	syncRepositories,
	syncRepository,
} from "#git/repo-sync";
import { createFakeGit } from "./fake-git";

const spec = (overrides: Partial<RepoSpec> = {}): RepoSpec => ({
	name: "odoo",
	repo: "https://git.example.com/odoo.git",
	branch: "17.0",
	shallow: false,
	dir: "/ws/odoo",
	...overrides,
});

const UPDATE_CALLS = [
	"fetch /ws/odoo all",
	"checkout /ws/odoo 17.0 origin/17.0",
	"reset /ws/odoo origin/17.0",
];

describe("planRepoSync", () => {
	it("maps every observed/declared pair to one action", () => {
		const actions = (["absent", "shallow", "full"] as const).flatMap((kind) =>
			[false, true].map((shallow) => [
				kind,
				shallow,
				planRepoSync(kind, { branch: "17.0", shallow }).action,
			]),
		);
		expect(actions).toEqual([
			["absent", false, "clone-full"],
			["absent", true, "clone-shallow"],
			["shallow", false, "unshallow"],
			["shallow", true, "update-shallow"],
			["full", false, "update-full"],
			["full", true, "keep-full"],
		]);
	});

	it("warns only when a full checkout is declared shallow", () => {
		expect(planRepoSync("full", { branch: "main", shallow: true }).warning).toBe(
			"shallow_clone is set but the checkout has full history; it is kept as a full clone",
		);
		expect(planRepoSync("full", { branch: "main", shallow: false }).warning).toBeNull();
	});
});

describe("syncRepository", () => {
	it("clones a missing checkout", async () => {
		const fake = createFakeGit();
		const result = await syncRepository(spec({ shallow: true }), fake.deps);
		expect(fake.calls).toEqual(["clone /ws/odoo shallow 17.0"]);
		expect(result).toMatchObject({
			name: "odoo",
			action: "clone-shallow",
			before: { kind: "absent", dirty: false },
			head: "c1",
			warning: null,
		});
	});

	it("treats an empty directory as absent", async () => {
		const fake = createFakeGit();
		fake.addPlainDir("/ws/odoo", []);
		const result = await syncRepository(spec(), fake.deps);
		expect(result.action).toBe("clone-full");
		expect(fake.calls).toEqual(["clone /ws/odoo full 17.0"]);
	});

	it("updates a full checkout to the remote branch", async () => {
		const fake = createFakeGit();
		fake.addRepo("/ws/odoo");
		const result = await syncRepository(spec(), fake.deps);
		expect(result.action).toBe("update-full");
		expect(fake.calls).toEqual(UPDATE_CALLS);
	});

	it("fetches only the branch for a shallow checkout", async () => {
		const fake = createFakeGit();
		fake.addRepo("/ws/odoo", {
			shallow: true,
			refspecs: ["+refs/heads/17.0:refs/remotes/origin/17.0"],
		});
		await syncRepository(spec({ shallow: true }), fake.deps);
		expect(fake.calls).toEqual([
			"fetch /ws/odoo branch",
			"checkout /ws/odoo 17.0 origin/17.0",
			"reset /ws/odoo origin/17.0",
		]);
	});

	it("widens the refspec before converting shallow to full", async () => {
		const fake = createFakeGit();
		fake.addRepo("/ws/odoo", {
			shallow: true,
			refspecs: ["+refs/heads/17.0:refs/remotes/origin/17.0"],
		});
		const result = await syncRepository(spec(), fake.deps);
		expect(result.action).toBe("unshallow");
		expect(fake.calls).toEqual([
			"set-refspec /ws/odoo",
			"fetch /ws/odoo unshallow",
			...UPDATE_CALLS,
		]);
		expect(fake.repos.get("/ws/odoo")).toMatchObject({
			shallow: false,
			refspecs: [FULL_REFSPEC],
		});
	});

	it("keeps full history when shallow is requested later", async () => {
		const fake = createFakeGit();
		fake.addRepo("/ws/odoo");
		const messages: string[] = [];
		const result = await syncRepository(spec({ shallow: true }), {
			...fake.deps,
			logger: (message) => messages.push(message),
		});
		expect(result.action).toBe("keep-full");
		expect(fake.calls).toEqual(UPDATE_CALLS);
		expect(messages).toEqual([
			"odoo: shallow_clone is set but the checkout has full history; it is kept as a full clone",
		]);
	});

	it("refuses to touch a dirty working tree", async () => {
		const fake = createFakeGit();
		fake.addRepo("/ws/odoo", { changes: [" M odoo/release.py"] });
		const error = await syncRepository(spec(), fake.deps).catch(
			(caught: unknown) => caught,
		);
		expect(error).toBeInstanceOf(DirtyWorkingTreeError);
		expect(error).toMatchObject({
			repoDir: "/ws/odoo",
			changes: [" M odoo/release.py"],
		});
		expect(fake.calls).toEqual([]);
	});

	it("refuses a non-empty directory that is not a checkout", async () => {
		const fake = createFakeGit();
		fake.addPlainDir("/ws/odoo", ["README.md"]);
		await expect(syncRepository(spec(), fake.deps)).rejects.toThrow(
			new RepositoryOperationError(
				"sync /ws/odoo",
				"Directory exists, is not empty and is not a git repository",
			).message,
		);
		expect(fake.calls).toEqual([]);
	});

	it("is idempotent once converged", async () => {
		const fake = createFakeGit();
		await syncRepository(spec({ shallow: true }), fake.deps);
		const before = { ...fake.repos.get("/ws/odoo") };
		fake.calls.length = 0;
		const second = await syncRepository(spec({ shallow: true }), fake.deps);
		expect(second.action).toBe("update-shallow");
		expect(fake.repos.get("/ws/odoo")).toEqual(before);
	});
});

describe("syncRepositories", () => {
	it("runs in order and stops at the first failure", async () => {
		const fake = createFakeGit();
		fake.addRepo("/ws/odoo");
		fake.addRepo("/ws/odoo-addons/a", { changes: ["?? new.py"] });
		const events: string[] = [];
		const specs = [
			spec(),
			spec({ name: "a", dir: "/ws/odoo-addons/a" }),
			spec({ name: "b", dir: "/ws/odoo-addons/b" }),
		];
		await expect(
			syncRepositories(specs, fake.deps, {
				onStart: (entry) => events.push(`start ${entry.name}`),
				onDone: (result) => events.push(`done ${result.name} ${result.action}`),
				onError: (entry) => events.push(`error ${entry.name}`),
			}),
		).rejects.toBeInstanceOf(DirtyWorkingTreeError);
		expect(events).toEqual([
			"start odoo",
			"done odoo update-full",
			"start a",
			"error a",
		]);
		expect(fake.repos.has("/ws/odoo-addons/b")).toBe(false);
		expect(fake.calls).toEqual(UPDATE_CALLS);
	});
});

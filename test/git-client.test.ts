import { writeFile } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { execa } from "execa";
import { describe, expect, it } from "vitest";
import type { RepoSpec } from "#config";
import { DirtyWorkingTreeError } from "#core/errors";
import { createGitClient, FULL_REFSPEC } from "#git/client";
import { syncRepository } from "#git/repo-sync";
import { makeTempDir } from "./support";

const BRANCH = "17.0";

const git = async (cwd: string, args: string[]) => {
	const result = await execa(
		"git",
		[
			"-c",
			"user.name=Test",
			"-c",
			"user.email=test@example.com",
			"-c",
			"commit.gpgsign=false",
			...args,
		],
		{ cwd },
	);
	return result.stdout.trim();
};

const commit = async (repo: string, file: string, content: string) => {
	await writeFile(path.join(repo, file), content, "utf8");
	await git(repo, ["add", file]);
	await git(repo, ["commit", "-q", "-m", `update ${file}`]);
	return git(repo, ["rev-parse", "HEAD"]);
};

/** Upstream repository with two commits on the tracked branch. */
const createUpstream = async () => {
	const root = await makeTempDir();
	const upstream = path.join(root, "upstream");
	await execa("git", ["init", "-q", upstream]);
	await git(upstream, ["symbolic-ref", "HEAD", `refs/heads/${BRANCH}`]);
	await commit(upstream, "README.md", "first\n");
	const head = await commit(upstream, "README.md", "second\n");
	return {
		upstream,
		head,
		spec: (shallow: boolean): RepoSpec => ({
			name: "odoo",
			// file:// so that --depth is honoured for a local remote
			repo: pathToFileURL(upstream).href,
			branch: BRANCH,
			shallow,
			dir: path.join(root, "ws", "odoo"),
		}),
	};
};

describe("syncRepository with the git client", () => {
	it("clones shallow and updates without moving an unchanged head", async () => {
		const { head, spec } = await createUpstream();
		const deps = { git: createGitClient() };

		const cloned = await syncRepository(spec(true), deps);
		expect(cloned.action).toBe("clone-shallow");
		expect(cloned.head).toBe(head);
		const dir = spec(true).dir;
		expect(await git(dir, ["rev-parse", "--is-shallow-repository"])).toBe("true");
		expect(await git(dir, ["rev-list", "--count", "HEAD"])).toBe("1");

		const updated = await syncRepository(spec(true), deps);
		expect(updated.action).toBe("update-shallow");
		expect(updated.before.kind).toBe("shallow");
		expect(updated.head).toBe(head);
		expect(await git(dir, ["rev-parse", "--is-shallow-repository"])).toBe("true");
	});

	it("converts a shallow checkout to full history", async () => {
		const { head, spec } = await createUpstream();
		const deps = { git: createGitClient() };
		await syncRepository(spec(true), deps);

		const result = await syncRepository(spec(false), deps);
		const dir = spec(false).dir;
		expect(result.action).toBe("unshallow");
		expect(result.head).toBe(head);
		expect(await git(dir, ["rev-parse", "--is-shallow-repository"])).toBe("false");
		expect(await git(dir, ["config", "--get-all", "remote.origin.fetch"])).toBe(
			FULL_REFSPEC,
		);
		expect(await git(dir, ["rev-list", "--count", "HEAD"])).toBe("2");
		expect(await git(dir, ["branch", "--show-current"])).toBe(BRANCH);
	});

	it("refuses to sync over an untracked file even when git hides them", async () => {
		const { upstream, head, spec } = await createUpstream();
		const deps = { git: createGitClient() };
		const dir = spec(false).dir;
		await syncRepository(spec(false), deps);
		await writeFile(path.join(dir, "untracked.txt"), "local work\n", "utf8");
		await git(dir, ["config", "status.showUntrackedFiles", "no"]);
		await commit(upstream, "CHANGELOG.md", "third\n");

		const error = await syncRepository(spec(false), deps).catch(
			(caught: unknown) => caught,
		);
		expect(error).toBeInstanceOf(DirtyWorkingTreeError);
		expect(await git(dir, ["rev-parse", "HEAD"])).toBe(head);
	});
});

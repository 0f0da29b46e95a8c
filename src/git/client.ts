import { execa } from "execa";
import { errorMessage, RepositoryOperationError } from "#core/errors";
import { buildGitEnv, resolveGitCommand } from "#git/git-env";
import { redactCredentials } from "#git/redact";

export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const STATUS_TIMEOUT_MS = 60 * 1000;
export const FULL_REFSPEC = "+refs/heads/*:refs/remotes/origin/*";

const GIT_CONFIGS = ["-c", "protocol.ext.allow=never"];

export type FetchMode =
	| { kind: "all" }
	| { kind: "branch"; branch: string }
	| { kind: "unshallow" };

/**
 * Everything the sync engine needs from git. The default implementation runs
 * the git binary; tests substitute an in-memory repository model.
 */
export type GitClient = {
	clone: (params: {
		repo: string;
		dir: string;
		branch: string;
		shallow: boolean;
	}) => Promise<void>;
	isShallow: (dir: string) => Promise<boolean>;
	/**
	 * `status --porcelain` lines, untracked files included whatever
	 * `status.showUntrackedFiles` says; empty means clean.
	 */
	status: (dir: string) => Promise<string[]>;
	currentBranch: (dir: string) => Promise<string | null>;
	head: (dir: string) => Promise<string | null>;
	fetchRefspecs: (dir: string) => Promise<string[]>;
	replaceFetchRefspecs: (dir: string, refspec: string) => Promise<void>;
	fetch: (dir: string, mode: FetchMode) => Promise<void>;
	checkout: (dir: string, branch: string, startPoint: string) => Promise<void>;
	resetHard: (dir: string, ref: string) => Promise<void>;
};

export type GitClientOptions = {
	timeoutMs?: number;
	env?: NodeJS.ProcessEnv;
	logger?: (message: string) => void;
	progressLogger?: (message: string) => void;
	progressThrottleMs?: number;
};

const isProgressLine = (line: string) =>
	line.includes("Receiving objects") ||
	line.includes("Resolving deltas") ||
	line.includes("Compressing objects") ||
	line.includes("Updating files") ||
	line.includes("Counting objects");

const shouldEmitProgress = (
	line: string,
	now: number,
	lastProgressAt: number,
	throttleMs: number,
) =>
	now - lastProgressAt >= throttleMs ||
	line.includes("100%") ||
	line.includes("done");

const attachLoggers = (
	subprocess: ReturnType<typeof execa>,
	commandLabel: string,
	options: GitClientOptions,
) => {
	if (!options.logger && !options.progressLogger) {
		return;
	}
	let lastProgressAt = 0;
	const forward = (stream: NodeJS.ReadableStream | null) => {
		if (!stream) return;
		stream.on("data", (chunk) => {
			const text =
				chunk instanceof Buffer ? chunk.toString("utf8") : String(chunk);
			// git redraws progress with carriage returns
			for (const line of text.split(/\r\n|\r|\n/)) {
				if (!line) continue;
				options.logger?.(`${commandLabel} | ${redactCredentials(line)}`);
				if (!options.progressLogger || !isProgressLine(line)) continue;
				const now = Date.now();
				const throttleMs = options.progressThrottleMs ?? 120;
				if (shouldEmitProgress(line, now, lastProgressAt, throttleMs)) {
					lastProgressAt = now;
					options.progressLogger(line);
				}
			}
		});
	};
	forward(subprocess.stdout);
	forward(subprocess.stderr);
};

const failureDetail = (error: unknown) => {
	if (
		typeof error === "object" &&
		error !== null &&
		"stderr" in error &&
		typeof error.stderr === "string" &&
		error.stderr.trim()
	) {
		return error.stderr.trim();
	}
	return errorMessage(error);
};

export const createGitClient = (options: GitClientOptions = {}): GitClient => {
	const command = resolveGitCommand(options.env);
	const env = buildGitEnv(options.env);

	const git = async (
		args: string[],
		params: { cwd?: string; timeoutMs?: number; progress?: boolean } = {},
	) => {
		const commandArgs = [
			...GIT_CONFIGS,
			...args,
			...(params.progress && options.progressLogger ? ["--progress"] : []),
		];
		const commandLabel = redactCredentials(`git ${args.join(" ")}`);
		options.logger?.(params.cwd ? `${commandLabel} (in ${params.cwd})` : commandLabel);
		const subprocess = execa(command, commandArgs, {
			cwd: params.cwd,
			timeout: params.timeoutMs ?? options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			maxBuffer: 10 * 1024 * 1024,
			stdout: "pipe",
			stderr: "pipe",
			env,
			extendEnv: false,
		});
		attachLoggers(subprocess, commandLabel, options);
		try {
			const result = await subprocess;
			return typeof result.stdout === "string" ? result.stdout : "";
		} catch (error) {
			throw new RepositoryOperationError(
				commandLabel,
				redactCredentials(failureDetail(error)),
				{ cause: error },
			);
		}
	};

	const query = (dir: string, args: string[]) =>
		git(args, { cwd: dir, timeoutMs: STATUS_TIMEOUT_MS });

	const fetchRefspecs = async (dir: string) => {
		try {
			return (await query(dir, ["config", "--get-all", "remote.origin.fetch"]))
				.split(/\r?\n/)
				.map((line) => line.trim())
				.filter(Boolean);
		} catch (error) {
			// `config --get-all` exits 1 when the key is unset.
			if (error instanceof RepositoryOperationError) {
				return [];
			}
			throw error;
		}
	};

	return {
		clone: async ({ repo, dir, branch, shallow }) => {
			const args = shallow
				? ["clone", "--depth", "1", "--branch", branch, "--single-branch"]
				: ["clone", "--branch", branch];
			await git([...args, repo, dir], { progress: true });
		},
		isShallow: async (dir) =>
			(await query(dir, ["rev-parse", "--is-shallow-repository"])).trim() ===
			"true",
		status: async (dir) =>
			(
				await query(dir, ["status", "--porcelain", "--untracked-files=all"])
			)
				.split(/\r?\n/)
				.filter((line) => line.trim().length > 0),
		currentBranch: async (dir) => {
			const branch = (await query(dir, ["branch", "--show-current"])).trim();
			return branch || null;
		},
		head: async (dir) => {
			try {
				return (await query(dir, ["rev-parse", "HEAD"])).trim() || null;
			} catch (error) {
				// A clone with no commits yet has no HEAD.
				if (error instanceof RepositoryOperationError) {
					return null;
				}
				throw error;
			}
		},
		fetchRefspecs,
		replaceFetchRefspecs: async (dir, refspec) => {
			if ((await fetchRefspecs(dir)).length > 0) {
				await git(["config", "--unset-all", "remote.origin.fetch"], { cwd: dir });
			}
			await git(["config", "--add", "remote.origin.fetch", refspec], { cwd: dir });
		},
		fetch: async (dir, mode) => {
			const args =
				mode.kind === "all"
					? ["fetch", "--all", "--tags", "--prune"]
					: mode.kind === "unshallow"
						? ["fetch", "--unshallow", "--tags", "origin"]
						: [
								"fetch",
								"--prune",
								"--depth",
								"1",
								"origin",
								`+refs/heads/${mode.branch}:refs/remotes/origin/${mode.branch}`,
							];
			await git(args, { cwd: dir, progress: true });
		},
		checkout: async (dir, branch, startPoint) => {
			await git(["checkout", "-B", branch, startPoint], { cwd: dir });
		},
		resetHard: async (dir, ref) => {
			await git(["reset", "--hard", ref], { cwd: dir });
		},
	};
};

import pc from "picocolors";
import type { RepoSpec } from "#config";
import { errorMessage } from "#core/errors";
import type { RepoAction, RepoSyncHooks, RepoSyncResult } from "#git/repo-sync";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { symbols, ui } from "./ui";

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

const ACTION_LABELS: Record<RepoAction, string> = {
	"clone-full": "cloned",
	"clone-shallow": "cloned (shallow)",
	"update-full": "updated",
	"update-shallow": "updated (shallow)",
	unshallow: "converted to full clone",
	"keep-full": "updated (kept full history)",
};

export const describeSyncResult = (result: RepoSyncResult) =>
	`${ACTION_LABELS[result.action]} ${ui.hash(result.head)}`;

export type TaskReporterOptions = {
	maxLiveLines?: number;
	output?: LiveOutput;
	isTTY?: boolean;
};

/**
 * Live view of a sync run: finished repositories stay on screen, the running
 * one shows its latest git progress lines below.
 */
export class TaskReporter {
	private readonly output: LiveOutput;
	private readonly maxLiveLines: number;
	private readonly startTime = Date.now();
	private readonly results: string[] = [];
	private readonly liveLines: string[] = [];
	private readonly hasTty: boolean;
	private running: string | null = null;
	private timer: NodeJS.Timeout | null = null;
	private warnings = 0;
	private errors = 0;

	constructor(options: TaskReporterOptions = {}) {
		this.output = options.output ?? createLiveOutput();
		this.maxLiveLines = options.maxLiveLines ?? 4;
		this.hasTty = options.isTTY ?? Boolean(process.stdout.isTTY);
		this.startTimer();
	}

	/** Hooks for `syncRepositories`. */
	hooks(): RepoSyncHooks {
		return {
			onStart: (spec: RepoSpec) => this.start(spec.name),
			onDone: (result) => {
				if (result.warning) {
					this.warn(result.name, result.warning);
				}
				this.success(result.name, describeSyncResult(result));
			},
			onError: (spec, error) => this.error(spec.name, errorMessage(error)),
		};
	}

	start(label: string) {
		this.running = label;
		this.liveLines.length = 0;
		this.render();
	}

	warn(label: string, details?: string) {
		this.warnings += 1;
		this.results.push(this.formatLine(symbols.warn, label, details));
		this.render();
	}

	error(label: string, details?: string) {
		this.errors += 1;
		this.running = null;
		this.results.push(this.formatLine(symbols.error, label, details));
		this.render();
	}

	success(label: string, details?: string) {
		this.running = null;
		this.results.push(this.formatLine(symbols.success, label, details));
		this.liveLines.length = 0;
		this.render();
	}

	progress(text: string) {
		this.liveLines.push(pc.dim(text));
		if (this.liveLines.length > this.maxLiveLines) {
			this.liveLines.splice(0, this.liveLines.length - this.maxLiveLines);
		}
		this.render();
	}

	finish() {
		this.running = null;
		this.liveLines.length = 0;
		const parts = [
			`Synced in ${formatDuration(Date.now() - this.startTime)}`,
			this.warnings
				? `${this.warnings} warning${this.warnings === 1 ? "" : "s"}`
				: null,
			this.errors ? `${this.errors} error${this.errors === 1 ? "" : "s"}` : null,
		].filter((part): part is string => part !== null);
		this.output.persist(this.composeView([`${symbols.info} ${parts.join(" · ")}`]));
		this.stopTimer();
	}

	stop() {
		this.output.stop();
		this.stopTimer();
	}

	private render() {
		if (!this.hasTty) return;
		this.output.render(this.composeView());
	}

	private startTimer() {
		if (!this.hasTty) return;
		this.timer = setInterval(() => {
			if (this.running) {
				this.render();
			}
		}, 250);
		this.timer.unref();
	}

	private stopTimer() {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	private composeView(footer: string[] = []) {
		const running = this.running ? [`${pc.cyan("→")} ${this.running}`] : [];
		const elapsed = this.running
			? [pc.dim(`time: ${formatDuration(Date.now() - this.startTime)}`)]
			: [];
		const lines = [
			...this.results,
			...running,
			...this.liveLines,
			...elapsed,
			...footer,
		];
		return lines.length > 0 ? lines : [" "];
	}

	private formatLine(icon: string, label: string, details?: string) {
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		return `  ${icon} ${partLabel} ${partDetails}`.trimEnd();
	}
}

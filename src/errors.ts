export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	error instanceof Error && "code" in error;

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export type WorkspaceErrorCode =
	| "CONFIG_SYNTAX"
	| "INCLUDE_NOT_FOUND"
	| "INCLUDE_CYCLE"
	| "INTERPOLATION_CYCLE"
	| "UNKNOWN_REFERENCE"
	| "CONFIG_INVALID"
	| "ROOT_NOT_FOUND"
	| "DIRTY_WORKING_TREE"
	| "REPOSITORY_OPERATION"
	| "PROVISIONING";

export class WorkspaceError extends Error {
	readonly code: WorkspaceErrorCode;

	constructor(
		code: WorkspaceErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Malformed INI text. */
export class ConfigSyntaxError extends WorkspaceError {
	readonly file: string;
	readonly line: number | null;

	constructor(file: string, line: number | null, detail: string) {
		super(
			"CONFIG_SYNTAX",
			line === null ? `${file}: ${detail}` : `${file}:${line}: ${detail}`,
		);
		this.file = file;
		this.line = line;
	}
}

export class IncludeNotFoundError extends WorkspaceError {
	readonly path: string;

	constructor(filePath: string, detail = "Included INI not found") {
		super("INCLUDE_NOT_FOUND", `${detail}: ${filePath}`);
		this.path = filePath;
	}
}

export class IncludeCycleError extends WorkspaceError {
	readonly chain: string[];

	constructor(chain: string[]) {
		super("INCLUDE_CYCLE", `INI include cycle detected: ${chain.join(" -> ")}`);
		this.chain = chain;
	}
}

export class InterpolationCycleError extends WorkspaceError {
	readonly chain: string[];

	constructor(chain: string[]) {
		super(
			"INTERPOLATION_CYCLE",
			`Interpolation cycle detected: ${chain.join(" -> ")}`,
		);
		this.chain = chain;
	}
}

export class UnknownReferenceError extends WorkspaceError {
	readonly section: string;
	readonly option: string | null;

	constructor(reference: string, section: string, option: string | null) {
		super(
			"UNKNOWN_REFERENCE",
			option === null
				? `Unknown section [${section}] referenced by ${reference}`
				: `Unknown option '${option}' in section [${section}] referenced by ${reference}`,
		);
		this.section = section;
		this.option = option;
	}
}

export class ConfigValidationError extends WorkspaceError {
	constructor(message: string) {
		super("CONFIG_INVALID", message);
	}
}

export class RootNotFoundError extends WorkspaceError {
	readonly root: string;

	constructor(root: string, detail = "Workspace root does not exist") {
		super("ROOT_NOT_FOUND", `${detail}: ${root}`);
		this.root = root;
	}
}

export class DirtyWorkingTreeError extends WorkspaceError {
	readonly repoDir: string;
	readonly changes: string[];

	constructor(repoDir: string, changes: string[]) {
		super(
			"DIRTY_WORKING_TREE",
			[
				`Local changes detected in repository: ${repoDir}`,
				"Commit and push your local changes (or clean the working tree) before syncing.",
				"Hint: run `git status` to inspect, then commit/push or stash/clean as appropriate.",
			].join("\n"),
		);
		this.repoDir = repoDir;
		this.changes = changes;
	}
}

export class RepositoryOperationError extends WorkspaceError {
	readonly command: string;

	constructor(command: string, detail: string, options?: { cause?: unknown }) {
		super("REPOSITORY_OPERATION", `${command} failed: ${detail}`, options);
		this.command = command;
	}
}

export class ProvisioningError extends WorkspaceError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("PROVISIONING", message, options);
	}
}

export const isWorkspaceError = (error: unknown): error is WorkspaceError =>
	error instanceof WorkspaceError;

export const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

import type { SyncTarget } from "#core/sync";
import type { ProvisionFlags } from "#venv/provision";

export type CliOptions = {
	root?: string;
	destRoot?: string;
	target: SyncTarget;
	provision: ProvisionFlags;
	noConfigs: boolean;
	noScripts: boolean;
	noDataDir: boolean;
	json: boolean;
	timeoutMs?: number;
	silent: boolean;
	verbose: boolean;
};

export type CliCommand =
	| { command: "sync"; ini: string; options: CliOptions }
	| { command: "status"; ini: string; options: CliOptions }
	| { command: "config"; ini: string; options: CliOptions }
	| { command: null; options: CliOptions };

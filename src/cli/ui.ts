import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "#core/paths";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const isSilentMode = () => _silentMode;

export const ui = {
	// Formatters
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		const selected = rel.length > 0 && rel.length < value.length ? rel : value;
		return toPosixPath(selected);
	},
	hash: (value: string | null | undefined) => {
		return value ? value.slice(0, 7) : "-";
	},

	// Components
	line: (text = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	header: (label: string, value: string) => {
		if (_silentMode) return;
		process.stdout.write(`${symbols.info} ${label.padEnd(11)} ${value}\n`);
	},

	item: (icon: string, label: string, details?: string) => {
		if (_silentMode) return;
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		process.stdout.write(`  ${icon} ${partLabel} ${partDetails}\n`);
	},

	warn: (message: string) => {
		if (_silentMode) return;
		process.stderr.write(`${symbols.warn} ${message}\n`);
	},

	debug: (message: string) => {
		if (_silentMode) return;
		process.stderr.write(`${pc.dim(message)}\n`);
	},
};

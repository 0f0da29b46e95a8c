import path from "node:path";
import type * as z from "zod";
import {
	AddonNameSchema,
	REPO_OPTIONS,
	RepoSectionSchema,
	VIRTUALENV_OPTIONS,
	type VirtualenvConfig,
	VirtualenvSectionSchema,
} from "#config/config-schema";
import { formatAuditIni } from "#config/audit";
import { INCLUDE_SECTION, resolveIncludes } from "#config/includes";
import {
	createInterpolator,
	type Interpolator,
	interpolateConfig,
	type ResolvedConfig,
	type ResolvedSection,
} from "#config/interpolate";
import { hasOption, type MergedConfig, mergeSources } from "#config/merge";
import { buildScopes, type ScopePair } from "#config/scope";
import { ConfigValidationError } from "#core/errors";

export type { ResolvedConfig, ResolvedSection, ScopePair, VirtualenvConfig };

export const CORE_SECTION = "odoo";
export const ADDON_SECTION_PREFIX = "addons.";
export const CONFIG_SECTION = "config";
export const VIRTUALENV_SECTION = "virtualenv";

export type RepoSpec = {
	name: string;
	repo: string;
	branch: string;
	shallow: boolean;
	/** Build-side checkout directory. */
	dir: string;
};

export type ProjectConfig = {
	iniPath: string;
	/** Every INI file that contributed, in load order. */
	sources: string[];
	scopes: ScopePair;
	virtualenv: VirtualenvConfig | null;
	odoo: RepoSpec;
	addons: RepoSpec[];
	/** `[config]` options resolved with the deploy scope. */
	config: ResolvedSection;
	resolved: ResolvedConfig;
};

export type LoadProjectConfigOptions = {
	root?: string;
	deployRoot?: string;
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
	logger?: (message: string) => void;
};

/** Section scope rule: `[config]` describes the deployment, the rest builds. */
export const scopeForSection = (scopes: ScopePair) => (section: string) =>
	section === CONFIG_SECTION ? scopes.deploy : scopes.build;

/** Resolved values of `names` visible from `section`, DEFAULT included. */
const pickOptions = (
	merged: MergedConfig,
	interpolator: Interpolator,
	section: string,
	names: readonly string[],
) => {
	const picked: Record<string, string> = {};
	for (const name of names) {
		if (hasOption(merged, section, name)) {
			picked[name] = interpolator.get(section, name);
		}
	}
	return picked;
};

const parseSection = <T extends z.ZodTypeAny>(
	schema: T,
	section: string,
	input: unknown,
): z.output<T> => {
	const parsed = schema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || section} ${issue.message}`)
			.join("; ");
		throw new ConfigValidationError(`Invalid section [${section}]: ${details}.`);
	}
	return parsed.data;
};

const requireSection = (merged: MergedConfig, section: string) => {
	if (!merged.sections.has(section)) {
		throw new ConfigValidationError(`Missing INI section: [${section}]`);
	}
};

const toRepoSpec = (
	merged: MergedConfig,
	interpolator: Interpolator,
	section: string,
	name: string,
	dir: string,
): RepoSpec => {
	const parsed = parseSection(
		RepoSectionSchema,
		section,
		pickOptions(merged, interpolator, section, REPO_OPTIONS),
	);
	return {
		name,
		repo: parsed.repo,
		branch: parsed.branch,
		shallow: parsed.shallow_clone,
		dir,
	};
};

export const addonSections = (merged: MergedConfig) =>
	[...merged.sections.keys()].filter((section) =>
		section.startsWith(ADDON_SECTION_PREFIX),
	);

/**
 * Read the entry INI with its includes, resolve every value against the
 * build and deploy scopes and validate the sections the workspace needs.
 * Touches the filesystem only to read INI files.
 */
export const loadProjectConfig = async (
	iniPath: string,
	options: LoadProjectConfigOptions = {},
): Promise<ProjectConfig> => {
	const entry = path.resolve(iniPath);
	const iniDir = path.dirname(entry);
	const scopes = buildScopes({
		root: options.root ? path.resolve(options.root) : iniDir,
		iniDir,
		deployRoot: options.deployRoot,
		platform: options.platform,
	});

	const sources = await resolveIncludes(entry, {
		variables: scopes.build,
		env: options.env,
		logger: options.logger,
	});
	options.logger?.(
		`Loaded INI stack from ${entry}:\n${sources.map((source) => `  - ${source.path}`).join("\n")}`,
	);

	const merged = mergeSources(sources);
	const resolved = interpolateConfig(merged, scopeForSection(scopes), [
		INCLUDE_SECTION,
	]);
	options.logger?.(
		`Merged INI (resolved):\n${formatAuditIni(resolved).trimEnd()}`,
	);
	const build = createInterpolator(merged, scopes.build);

	requireSection(merged, CORE_SECTION);
	requireSection(merged, CONFIG_SECTION);

	const odoo = toRepoSpec(
		merged,
		build,
		CORE_SECTION,
		CORE_SECTION,
		scopes.build.odoo_dir,
	);
	const addons = addonSections(merged).map((section) => {
		const name = parseSection(
			AddonNameSchema,
			section,
			section.slice(ADDON_SECTION_PREFIX.length),
		);
		return toRepoSpec(
			merged,
			build,
			section,
			name,
			path.join(scopes.build.addons_dir, name),
		);
	});

	const virtualenv = merged.sections.has(VIRTUALENV_SECTION)
		? parseSection(
				VirtualenvSectionSchema,
				VIRTUALENV_SECTION,
				pickOptions(merged, build, VIRTUALENV_SECTION, VIRTUALENV_OPTIONS),
			)
		: null;

	return {
		iniPath: entry,
		sources: sources.map((source) => source.path),
		scopes,
		virtualenv,
		odoo,
		addons,
		config: resolved[CONFIG_SECTION] ?? {},
		resolved,
	};
};

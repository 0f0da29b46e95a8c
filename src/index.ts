export { ADDON_SECTION_PREFIX, CORE_SECTION, loadProjectConfig } from "#config";
export type {
	LoadProjectConfigOptions,
	ProjectConfig,
	RepoSpec,
	ResolvedConfig,
	ResolvedSection,
} from "#config";
export { formatAuditIni, maskResolvedConfig } from "#config/audit";
export { resolveIncludes } from "#config/includes";
export { parseIni, readConfigSource } from "#config/ini-reader";
export { createInterpolator, interpolateConfig } from "#config/interpolate";
export { mergeSources } from "#config/merge";
export { buildScopes, SCOPE_VARIABLES } from "#config/scope";
export { mergeAddonsPath, resolveAddonsPath } from "#core/addons-path";
export * from "#core/errors";
export { createLayout } from "#core/paths";
export type { WorkspaceLayout } from "#core/paths";
export { renderOdooConf, resolveDataDir } from "#core/render-conf";
export { writeScripts } from "#core/scripts";
export { getStatus } from "#core/status";
export type { RepoStatus, WorkspaceStatus } from "#core/status";
export { runSync } from "#core/sync";
export type { SyncOptions, SyncSummary, SyncTarget } from "#core/sync";
export { createGitClient } from "#git/client";
export type { GitClient } from "#git/client";
export { observeRepoState } from "#git/repo-state";
export { planRepoSync, syncRepositories, syncRepository } from "#git/repo-sync";
export type { RepoAction, RepoSyncResult } from "#git/repo-sync";
export { createUvTool } from "#venv/uv";
export type { PythonEnvTool } from "#venv/uv";

export const GIT_COMMAND_ENV = "ODOO_WORKSPACE_GIT_COMMAND";

export const resolveGitCommand = (env: NodeJS.ProcessEnv = process.env) =>
	env[GIT_COMMAND_ENV] || "git";

/**
 * Environment for git child processes: the caller's environment with a
 * normalized PATH, and no interactive credential prompt.
 */
export const buildGitEnv = (
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
): NodeJS.ProcessEnv => {
	const pathValue = env.PATH ?? env.Path;
	const pathExtValue =
		env.PATHEXT ?? (platform === "win32" ? ".COM;.EXE;.BAT;.CMD" : undefined);
	return {
		...env,
		...(pathValue ? { PATH: pathValue, Path: pathValue } : {}),
		...(pathExtValue ? { PATHEXT: pathExtValue } : {}),
		GIT_TERMINAL_PROMPT: "0",
	};
};

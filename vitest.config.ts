import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^#cli\/(.*)$/, replacement: path.resolve(root, "src/cli/$1") },
			{
				find: /^#config\/(.*)$/,
				replacement: path.resolve(root, "src/config/$1"),
			},
			{ find: /^#config$/, replacement: path.resolve(root, "src/config/index") },
			{ find: /^#core\/(.*)$/, replacement: path.resolve(root, "src/$1") },
			{ find: /^#git\/(.*)$/, replacement: path.resolve(root, "src/git/$1") },
			{ find: /^#venv\/(.*)$/, replacement: path.resolve(root, "src/venv/$1") },
		],
	},
	test: {
		include: ["test/**/*.test.ts"],
		environment: "node",
	},
});

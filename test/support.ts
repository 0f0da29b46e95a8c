import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach } from "vitest";

const created: string[] = [];

/** Fresh temp directory, removed after the current test. */
export const makeTempDir = async () => {
	const dir = await mkdtemp(path.join(tmpdir(), "odoo-workspace-"));
	created.push(dir);
	return dir;
};

afterEach(async () => {
	while (created.length > 0) {
		const dir = created.pop();
		if (dir) {
			await rm(dir, { recursive: true, force: true });
		}
	}
});

export const writeFiles = async (
	root: string,
	files: Record<string, string>,
) => {
	for (const [relative, content] of Object.entries(files)) {
		const target = path.join(root, relative);
		await mkdir(path.dirname(target), { recursive: true });
		await writeFile(target, content, "utf8");
	}
};

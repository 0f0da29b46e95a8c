import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigValidationError } from "#core/errors";
import { exists } from "#core/fs-utils";
import { renderScript, scriptNames, writeScripts } from "#core/scripts";
import { makeTempDir } from "./support";

describe("scriptNames", () => {
	it("lists database scripts only with a database name", () => {
		expect(scriptNames("linux", false)).toEqual([
			"run",
			"instance",
			"test",
			"shell",
			"update",
			"update_all",
		]);
		expect(scriptNames("win32", true)).toEqual([
			"run",
			"test",
			"shell",
			"update",
			"update_all",
			"initdb",
			"backup",
			"restore",
			"restore_force",
		]);
	});
});

describe("renderScript", () => {
	it("fills in the database name", () => {
		expect(renderScript('db="__DB_NAME__"\n', "linux", "demo")).toBe('db="demo"\n');
	});

	it("uses CRLF line endings on Windows", () => {
		expect(renderScript("@echo off\r\nset A=1\n", "win32")).toBe(
			"@echo off\r\nset A=1\r\n",
		);
	});
});

describe("writeScripts", () => {
	it("writes executable shell scripts with the database name", async () => {
		const root = await makeTempDir();
		const scriptsDir = path.join(root, "odoo-scripts");
		const written = await writeScripts({
			scriptsDir,
			dbName: " demo ",
			platform: "linux",
		});
		expect(written.map((script) => path.basename(script.path))).toEqual([
			"run.sh",
			"instance.sh",
			"test.sh",
			"shell.sh",
			"update.sh",
			"update_all.sh",
			"initdb.sh",
			"backup.sh",
			"restore.sh",
			"restore_force.sh",
		]);
		const backup = await readFile(path.join(scriptsDir, "backup.sh"), "utf8");
		expect(backup).toContain('BACKUP_FILENAME="demo_${TODAY}_${TIME}.zip"');
		expect(backup).not.toContain("__DB_NAME__");
		const { mode } = await stat(path.join(scriptsDir, "run.sh"));
		expect(mode & 0o111).toBe(0o111);
	});

	it("skips database scripts and warns without a database name", async () => {
		const root = await makeTempDir();
		const messages: string[] = [];
		const written = await writeScripts({
			scriptsDir: path.join(root, "odoo-scripts"),
			platform: "win32",
			logger: (message) => messages.push(message),
		});
		expect(written.map((script) => script.name)).toEqual([
			"run",
			"test",
			"shell",
			"update",
			"update_all",
		]);
		expect(messages).toEqual([
			"Missing or empty 'db_name' in [config]; database scripts (initdb/backup/restore/restore_force) are not generated.",
		]);
		const run = await readFile(path.join(root, "odoo-scripts", "run.bat"), "utf8");
		expect(run.startsWith("@echo off\r\n")).toBe(true);
	});

	it("refuses a database name that would break the scripts", async () => {
		const root = await makeTempDir();
		const scriptsDir = path.join(root, "odoo-scripts");
		await expect(
			writeScripts({ scriptsDir, dbName: 'demo"; rm -rf $HOME', platform: "linux" }),
		).rejects.toThrow(
			new ConfigValidationError(
				`Invalid 'db_name' in [config]: "demo"; rm -rf $HOME" (use letters, digits, '_', '.' and '-').`,
			),
		);
		await expect(
			writeScripts({ scriptsDir, dbName: "100%", platform: "win32" }),
		).rejects.toBeInstanceOf(ConfigValidationError);
		expect(await exists(scriptsDir)).toBe(false);
	});
});

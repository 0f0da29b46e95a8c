import { describe, expect, it } from "vitest";
import {
	formatAuditIni,
	isSensitiveOption,
	MASK,
	maskResolvedConfig,
} from "#config/audit";

describe("audit output", () => {
	it("flags secret-looking option names", () => {
		expect(isSensitiveOption("admin_passwd")).toBe(true);
		expect(isSensitiveOption("DB_PASSWORD")).toBe(true);
		expect(isSensitiveOption("github_token")).toBe(true);
		expect(isSensitiveOption("db_name")).toBe(false);
	});

	it("masks secrets without touching other values", () => {
		expect(
			maskResolvedConfig({
				config: { admin_passwd: "test-secret", db_name: "demo" },
			}),
		).toEqual({ config: { admin_passwd: MASK, db_name: "demo" } });
	});

	it("renders sections as INI text", () => {
		expect(
			formatAuditIni({
				odoo: { repo: "r", branch: "17.0" },
				config: { db_password: "test-secret", notes: "a\nb" },
			}),
		).toBe(
			"[odoo]\nrepo = r\nbranch = 17.0\n\n[config]\ndb_password = ******\nnotes = a\n\tb\n",
		);
	});

	it("renders nothing for an empty configuration", () => {
		expect(formatAuditIni({})).toBe("");
	});
});

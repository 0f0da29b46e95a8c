import * as z from "zod";
import { assertSafeAddonName } from "#core/addon-name";
import { splitIniLines } from "#config/ini-reader";

const TRUE_VALUES = new Set(["1", "yes", "true", "on"]);
const FALSE_VALUES = new Set(["0", "no", "false", "off"]);

export const BooleanOptionSchema = z
	.string()
	.trim()
	.toLowerCase()
	.transform((value, ctx) => {
		if (TRUE_VALUES.has(value)) return true;
		if (FALSE_VALUES.has(value)) return false;
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: "expected a boolean like true/false",
		});
		return z.NEVER;
	});

const ListOptionSchema = z.string().transform((value) => splitIniLines(value));

export const RepoSectionSchema = z.object({
	repo: z
		.string({ required_error: "is required" })
		.trim()
		.min(1, { message: "must not be empty" }),
	branch: z
		.string({ required_error: "is required" })
		.trim()
		.min(1, { message: "must not be empty" }),
	shallow_clone: BooleanOptionSchema.default("false"),
});

export const VirtualenvSectionSchema = z.object({
	python_version: z
		.string()
		.trim()
		.optional()
		.transform((value) => (value ? value : undefined)),
	build_constraints: ListOptionSchema.default(""),
	requirements: ListOptionSchema.default(""),
	requirements_ignore: ListOptionSchema.default(""),
	managed_python: BooleanOptionSchema.default("true"),
});

export const AddonNameSchema = z
	.string()
	.min(1, { message: "must not be empty" })
	.superRefine((value, ctx) => {
		try {
			assertSafeAddonName(value, "addon name");
		} catch (error) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: error instanceof Error ? error.message : "Invalid addon name.",
			});
		}
	});

export type RepoSection = z.infer<typeof RepoSectionSchema>;
export type VirtualenvConfig = z.infer<typeof VirtualenvSectionSchema>;

export const REPO_OPTIONS = Object.keys(RepoSectionSchema.shape);
export const VIRTUALENV_OPTIONS = Object.keys(VirtualenvSectionSchema.shape);

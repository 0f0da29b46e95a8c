import { rm, stat } from "node:fs/promises";
import { getErrnoCode } from "#core/errors";

const DEFAULT_RM_RETRIES = 3;
const DEFAULT_RM_BACKOFF_MS = 100;

export const exists = async (target: string) => {
	try {
		await stat(target);
		return true;
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return false;
		}
		throw error;
	}
};

/** Recursive remove, retried while Windows still holds handles in the tree. */
export const removeDir = async (dirPath: string, retries = DEFAULT_RM_RETRIES) => {
	for (let attempt = 0; attempt <= retries; attempt += 1) {
		try {
			await rm(dirPath, { recursive: true, force: true });
			return;
		} catch (error) {
			const code = getErrnoCode(error);
			if (code !== "ENOTEMPTY" && code !== "EBUSY" && code !== "EPERM") {
				throw error;
			}
			if (attempt === retries) {
				throw error;
			}
			await new Promise((resolve) =>
				setTimeout(resolve, DEFAULT_RM_BACKOFF_MS * (attempt + 1)),
			);
		}
	}
};

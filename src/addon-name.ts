const INVALID_NAME_PATTERN = /[<>:"/\\|?*]/;
const TRAILING_DOT_SPACE_PATTERN = /[.\s]+$/;
const MAX_NAME_LENGTH = 200;
const RESERVED_NAMES = new Set([
	".",
	"..",
	"CON",
	"PRN",
	"AUX",
	"NUL",
	"COM1",
	"LPT1",
]);

/**
 * An addon name becomes a directory under `odoo-addons/`, so it must be a
 * single portable path segment.
 */
export const assertSafeAddonName = (value: string, label: string): string => {
	if (value.trim().length === 0) {
		throw new Error(`${label} must not be blank.`);
	}
	if (value.length > MAX_NAME_LENGTH) {
		throw new Error(`${label} exceeds maximum length of ${MAX_NAME_LENGTH}.`);
	}
	for (const char of value) {
		const code = char.codePointAt(0);
		if (code !== undefined && (code <= 0x1f || code === 0x7f)) {
			throw new Error(`${label} must not contain control characters.`);
		}
	}
	if (TRAILING_DOT_SPACE_PATTERN.test(value)) {
		throw new Error(`${label} must not end with dots or spaces.`);
	}
	if (INVALID_NAME_PATTERN.test(value)) {
		throw new Error(
			`${label} must not contain path separators or reserved characters (< > : " / \\ | ? *).`,
		);
	}
	if (RESERVED_NAMES.has(value.toUpperCase())) {
		throw new Error(`${label} uses reserved name '${value}'.`);
	}
	return value;
};

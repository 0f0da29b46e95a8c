import { formatIniValue } from "#config/ini-reader";
import type { ResolvedConfig } from "#config/interpolate";

const SENSITIVE_KEYS = [
	"password",
	"passwd",
	"secret",
	"token",
	"api_key",
	"apikey",
	"private_key",
];
export const MASK = "******";

export const isSensitiveOption = (option: string) => {
	const lowered = option.toLowerCase();
	return SENSITIVE_KEYS.some((key) => lowered.includes(key));
};

export const maskResolvedConfig = (resolved: ResolvedConfig): ResolvedConfig =>
	Object.fromEntries(
		Object.entries(resolved).map(([section, options]) => [
			section,
			Object.fromEntries(
				Object.entries(options).map(([option, value]) => [
					option,
					isSensitiveOption(option) ? MASK : value,
				]),
			),
		]),
	);

/** Resolved configuration as INI text with secrets masked. */
export const formatAuditIni = (resolved: ResolvedConfig) => {
	const blocks = Object.entries(maskResolvedConfig(resolved)).map(
		([section, options]) =>
			[
				`[${section}]`,
				...Object.entries(options).map(
					([option, value]) => `${option} = ${formatIniValue(value)}`,
				),
			].join("\n"),
	);
	return blocks.length > 0 ? `${blocks.join("\n\n")}\n` : "";
};

import { type ConfigSource, DEFAULT_SECTION } from "#config/ini-reader";

export type MergedConfig = {
	defaults: ReadonlyMap<string, string>;
	/** Section order is order of first appearance across all sources. */
	sections: ReadonlyMap<string, ReadonlyMap<string, string>>;
};

/**
 * Fold sources in load order. For every (section, option) the last source
 * that defines it wins; nothing is ever removed.
 */
export const mergeSources = (sources: readonly ConfigSource[]): MergedConfig => {
	const defaults = new Map<string, string>();
	const sections = new Map<string, Map<string, string>>();
	for (const source of sources) {
		for (const section of source.sections) {
			let target = defaults;
			if (section.name !== DEFAULT_SECTION) {
				const existing = sections.get(section.name);
				target = existing ?? new Map<string, string>();
				if (!existing) {
					sections.set(section.name, target);
				}
			}
			for (const [option, value] of section.options) {
				target.set(option, value);
			}
		}
	}
	return { defaults, sections };
};

/**
 * Layer runtime variables into DEFAULT after the user's own defaults. A
 * same-named user default is replaced; section options still win over both.
 */
export const withDefaults = (
	merged: MergedConfig,
	variables: Readonly<Record<string, string>>,
): MergedConfig => {
	const defaults = new Map(merged.defaults);
	for (const [name, value] of Object.entries(variables)) {
		defaults.set(name, value);
	}
	return { defaults, sections: merged.sections };
};

export const hasOption = (
	merged: MergedConfig,
	section: string,
	option: string,
) =>
	(merged.sections.get(section)?.has(option) ?? false) ||
	merged.defaults.has(option);

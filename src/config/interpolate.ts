import { DEFAULT_SECTION } from "#config/ini-reader";
import { type MergedConfig, withDefaults } from "#config/merge";
import type { VariableScope } from "#config/scope";
import {
	ConfigSyntaxError,
	InterpolationCycleError,
	UnknownReferenceError,
} from "#core/errors";

export type ResolvedSection = Readonly<Record<string, string>>;

/** Section → option → final string. Only options a section declares itself. */
export type ResolvedConfig = Readonly<Record<string, ResolvedSection>>;

type Token =
	| { kind: "text"; value: string }
	| { kind: "ref"; raw: string; section: string | null; option: string };

const describe = (section: string, option: string) => `[${section}] ${option}`;

/**
 * Split a raw value into literal text and `${...}` references. `$$` is an
 * escaped dollar; any other `$` is malformed.
 */
export const tokenize = (
	value: string,
	section: string,
	option: string,
): Token[] => {
	const tokens: Token[] = [];
	let text = "";
	let index = 0;
	const fail = (detail: string): never => {
		throw new ConfigSyntaxError(describe(section, option), null, detail);
	};
	while (index < value.length) {
		const next = value.indexOf("$", index);
		if (next === -1) {
			text += value.slice(index);
			break;
		}
		text += value.slice(index, next);
		const marker = value[next + 1];
		if (marker === "$") {
			text += "$";
			index = next + 2;
			continue;
		}
		if (marker !== "{") {
			fail(`'$' must be followed by '$' or '{', found: ${value.slice(next)}`);
		}
		const close = value.indexOf("}", next + 2);
		if (close === -1) {
			fail(`Unterminated reference: ${value.slice(next)}`);
		}
		const raw = value.slice(next, close + 1);
		const parts = value.slice(next + 2, close).split(":");
		if (parts.length > 2 || parts.some((part) => part.trim().length === 0)) {
			fail(`Malformed reference: ${raw}`);
		}
		if (text) {
			tokens.push({ kind: "text", value: text });
			text = "";
		}
		tokens.push(
			parts.length === 2
				? {
						kind: "ref",
						raw,
						section: parts[0].trim(),
						option: parts[1].trim().toLowerCase(),
					}
				: { kind: "ref", raw, section: null, option: parts[0].trim().toLowerCase() },
		);
		index = close + 1;
	}
	if (text) {
		tokens.push({ kind: "text", value: text });
	}
	return tokens;
};

/**
 * Resolver bound to one scope. Each (section, option) is resolved at most
 * once; nodes still being resolved are kept on a stack and a revisit is a
 * cycle.
 */
export const createInterpolator = (merged: MergedConfig, scope: VariableScope) => {
	const config = withDefaults(merged, scope);
	const done = new Map<string, string>();
	const stack: string[] = [];

	const rawValue = (section: string, option: string, reference: string) => {
		if (section === DEFAULT_SECTION) {
			const value = config.defaults.get(option);
			if (value === undefined) {
				throw new UnknownReferenceError(reference, section, option);
			}
			return value;
		}
		const options = config.sections.get(section);
		if (!options) {
			throw new UnknownReferenceError(reference, section, null);
		}
		const value = options.get(option) ?? config.defaults.get(option);
		if (value === undefined) {
			throw new UnknownReferenceError(reference, section, option);
		}
		return value;
	};

	const resolve = (section: string, option: string, reference: string): string => {
		const key = `${section}:${option}`;
		const cached = done.get(key);
		if (cached !== undefined) {
			return cached;
		}
		const start = stack.indexOf(key);
		if (start !== -1) {
			throw new InterpolationCycleError([...stack.slice(start), key]);
		}
		const raw = rawValue(section, option, reference);
		stack.push(key);
		let result = "";
		try {
			for (const token of tokenize(raw, section, option)) {
				result +=
					token.kind === "text"
						? token.value
						: resolve(
								token.section ?? section,
								token.option,
								`${token.raw} in ${describe(section, option)}`,
							);
			}
		} finally {
			stack.pop();
		}
		done.set(key, result);
		return result;
	};

	return {
		get: (section: string, option: string) =>
			resolve(section, option.toLowerCase(), describe(section, option)),
		section: (section: string): ResolvedSection => {
			const options = config.sections.get(section);
			if (!options) {
				throw new UnknownReferenceError("the project configuration", section, null);
			}
			return Object.fromEntries(
				[...options.keys()].map((option) => [
					option,
					resolve(section, option, describe(section, option)),
				]),
			);
		},
	};
};

export type Interpolator = ReturnType<typeof createInterpolator>;

/**
 * Resolve every section of `merged`, picking the scope per section. All
 * values are resolved eagerly so a broken reference fails before anything
 * acts on the configuration.
 */
export const interpolateConfig = (
	merged: MergedConfig,
	scopeFor: (section: string) => VariableScope,
	exclude: readonly string[] = [],
): ResolvedConfig => {
	const interpolators = new Map<VariableScope, Interpolator>();
	const resolved: Record<string, ResolvedSection> = {};
	for (const section of merged.sections.keys()) {
		if (exclude.includes(section)) {
			continue;
		}
		const scope = scopeFor(section);
		let interpolator = interpolators.get(scope);
		if (!interpolator) {
			interpolator = createInterpolator(merged, scope);
			interpolators.set(scope, interpolator);
		}
		resolved[section] = interpolator.section(section);
	}
	return resolved;
};

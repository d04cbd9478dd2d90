import type { PlatformDescriptor, RuleClause } from "../../../Types/Core/Version.js";

function matchesPlatform(rule: RuleClause, platform: PlatformDescriptor): boolean {
	if (rule.os?.name !== undefined && rule.os.name === platform.name) return true;
	if (rule.os?.arch !== undefined && rule.os.arch === platform.architecture) return true;
	return false;
}

/**
 * Every clause is a constraint: an `allow` that does not match, or a
 * `disallow` that does, excludes the library and stops evaluation.
 * Libraries without rules are always included.
 */
export function isLibraryIncluded(rules: readonly RuleClause[] | undefined, platform: PlatformDescriptor): boolean {
	if (!rules || rules.length === 0) return true;
	for (const rule of rules) {
		const match = matchesPlatform(rule, platform);
		if (rule.action === "allow" && !match) return false;
		if (rule.action === "disallow" && match) return false;
	}
	return true;
}

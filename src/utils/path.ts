/**
 * Returns the root directory for runtime files (configuration, records,
 * logs). `IDLE_REALM_HOME` overrides the current working directory.
 */
export function getSafeRootDirectory(): string {
	const home = process.env.IDLE_REALM_HOME;
	if (home) return home;
	return process.cwd();
}

import { spawn } from "node:child_process";

import { LauncherLogger, silentLogger } from "../../Logger/LauncherLogger.js";
import type { LaunchResult, ProcessLaunchOptions } from "./Types/Arguments.js";

/**
 * Starts the runtime with the parent's standard streams and returns at once.
 * The exit code is never observed; spawn errors (missing binary, bad cwd)
 * arrive asynchronously and are only logged.
 */
export function launchProcess(
	binaryPath: string,
	args: readonly string[],
	options: ProcessLaunchOptions,
	logger: LauncherLogger = silentLogger,
): LaunchResult {
	const log = logger.child("Process");
	log.info(`Launching ${binaryPath} with ${args.length} arguments in ${options.cwd}`);

	const child = spawn(binaryPath, args, {
		cwd: options.cwd,
		env: options.env ?? process.env,
		stdio: "inherit",
		windowsHide: false,
	});

	child.on("error", (error) => {
		log.error(`Could not start ${binaryPath}: ${error.message}`);
	});
	child.on("spawn", () => {
		log.debug(`Runtime started with pid ${child.pid}`);
	});

	return { pid: child.pid };
}

export interface LaunchIdentity {
	/** Offline player name, "Player" by default */
	username?: string | undefined;
	brand?: string | undefined;
	launcherVersion?: string | undefined;
}

export interface LaunchArguments {
	classpath: string;
	/** Everything after the java binary, in launch order */
	arguments: string[];
}

export interface LaunchResult {
	pid: number | undefined;
}

export interface ProcessLaunchOptions {
	cwd: string;
	env?: NodeJS.ProcessEnv | undefined;
}

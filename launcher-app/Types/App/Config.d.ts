export type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigObject;

export type ConfigObject = { [key: string]: ConfigValue };

export interface ConfigOptions {
	/** Create the parent directory when it does not exist */
	createDirs?: boolean;
	prettyPrint?: boolean;
	encoding?: BufferEncoding;
	/** Values used for every key the file does not set */
	defaultConfig?: ConfigObject;
	/** Never write the file back */
	readOnly?: boolean;
}

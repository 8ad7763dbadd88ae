export interface StoreConfig {
	/** Path to JSON file */
	filePath: string;
}

export interface VersionedFile<T> {
	version: number;
	data: T;
}

export const STORE_FILE_VERSION = 1;

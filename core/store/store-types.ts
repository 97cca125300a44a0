export interface StoreConfig {
	/** Path to JSON file */
	filePath: string;
	/** Permission bits for newly written files (default 0o644) */
	fileMode?: number;
}

export interface FileLockOptions {
	/** Give up waiting after this long and proceed unlocked */
	timeoutMs: number;
	/** A lock file older than this is left over from a dead process */
	staleMs: number;
	/** Poll interval while another process holds the lock */
	retryMs: number;
}

/**
 * Options of the sync command as commander hands them over:
 * - local / template: file paths
 * - set: comma-separated KEY=value pairs applied after the merge
 * - dryRun: print instead of write
 * - silent / verbose: log level (verbose counts repeated -v)
 */
export interface SyncOptions {
	local?: string;
	template?: string;
	set?: string;
	dryRun?: boolean;
	silent?: boolean;
	verbose?: number;
}

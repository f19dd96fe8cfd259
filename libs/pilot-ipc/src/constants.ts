/**
 * Constants for debpilot
 */

/** Program name, also the base name of the log and lock files */
export const PROGRAM_NAME = 'debpilot';

/** Log file suffix appended to the program name */
export const LOG_SUFFIX = '.log';

/** Lock file suffix appended to the program name */
export const LOCK_SUFFIX = '.lock';

/** Config file looked up beside the program */
export const CONFIG_FILE = 'debpilot.config.json';

/** Default managed package */
export const DEFAULT_PACKAGE = 'jenkins';

/** Default systemd unit backing the package */
export const DEFAULT_SERVICE = 'jenkins';

/** Upstream directory holding one binary archive per released version */
export const DEFAULT_MIRROR_URL = 'https://pkg.jenkins.io/debian/binary/';

/** Where apt keeps downloaded archives */
export const APT_ARCHIVES_DIR = '/var/cache/apt/archives';

/** Backups directory name, relative to the log directory */
export const BACKUPS_DIR = 'backups';

/** Wait after start/stop so systemd can converge before the next check */
export const DEFAULT_SETTLE_DELAY_MS = 3_000;

/** Architecture suffix of the upstream archives */
export const ARCHIVE_ARCH = 'all';

/** Line written before the first entry of a new log file */
export const LOG_HEADER_MESSAGE = 'File created.';

/** Separator written at the start of every run */
export const RUN_SEPARATOR = '================================';

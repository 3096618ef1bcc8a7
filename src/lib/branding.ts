export const CLI_NAME = 'stackctl';

export const CONFIG_FILE_NAME = 'stackctl.config.json';

/** Prefix of every environment override (STACKCTL_DB_PATH, ...). */
export const ENV_PREFIX = 'STACKCTL_';

export const MANIFEST_SUFFIX = '.manifest.json';
export const TMP_SUFFIX = '.tmp';

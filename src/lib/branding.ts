export const CLI_NAME = 'rosdeb';

export const CONFIG_FILE_NAME = 'rosdeb.config.json';

/** Working directory used when none is configured, relative to the current directory */
export const DEFAULT_WORKING_DIR = 'bloom-build';

/** Identity recorded in the git repositories bloom inspects */
export const GIT_AUTHOR_NAME = 'rosdeb release bot';
export const GIT_AUTHOR_EMAIL = 'rosdeb@localhost';

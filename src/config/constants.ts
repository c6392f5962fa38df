/**
 * Completion-wide constants for token handling, shells and logging
 *
 * These values are for internal use and maintenance - they are not exposed
 * to users through the configuration system (see defaults.ts for that).
 */

// ===========================================
// TOKENS
// ===========================================

/**
 * Word-break character some shells split out of `--opt=value` tokens
 */
export const WORDBREAK = '=';

/**
 * Sentinel ending option processing; everything after it is positional
 */
export const END_OF_OPTIONS = '--';

/**
 * Prefixes recognised as the start of an option
 */
export const OPTION_PREFIXES: ReadonlySet<string> = new Set(['-', '--']);

/**
 * Marks a variadic parameter (`nargs`)
 */
export const UNBOUNDED_NARGS = -1;

// ===========================================
// HELP TEXT
// ===========================================

export const HELP_OPTION = {
  /** Spelling of the automatic help flag */
  FLAG: '--help',

  /** Description shown beside the help flag */
  DESCRIPTION: 'Show this message and exit.',
} as const;

/**
 * Maximum length of a command's derived short help
 */
export const SHORT_HELP_LIMIT = 45;

// ===========================================
// SHELLS
// ===========================================

/**
 * Shell used when an instruction names none (`source`, `complete`)
 */
export const DEFAULT_SHELL = 'bash';

/**
 * Oldest bash release whose `complete` builtin supports `-o nosort`
 */
export const MIN_BASH_VERSION: readonly [major: number, minor: number] = [4, 4];

/**
 * Environment variables exported by the activation scripts
 */
export const COMPLETION_ENV = {
  /** Full command line, space separated and shell quoted */
  WORDS: 'COMP_WORDS',

  /** Index of the word under the cursor (the word itself for fish) */
  CWORD: 'COMP_CWORD',
} as const;

/**
 * Candidate type tags understood by the bash and fish scripts.
 * Only NONE is produced; DIR and FILE are reserved for path completion.
 */
export const CANDIDATE_TYPES = {
  NONE: 'none',
  DIR: 'dir',
  FILE: 'file',
} as const;

/**
 * Placeholder emitted by zsh when a candidate has no description
 */
export const ZSH_NO_DESCRIPTION = '_';

/**
 * Placeholders substituted into the activation templates
 */
export const TEMPLATE_PLACEHOLDERS = {
  COMPLETE_FUNC: '{complete_func}',
  SCRIPT_NAMES: '{script_names}',
  COMPLETE_VAR: '{complete_var}',
} as const;

// ===========================================
// TIMEOUTS
// ===========================================

export const API_TIMEOUTS = {
  /** `bash --version` probe timeout (2 seconds) */
  VERSION_CHECK: 2000,
} as const;

// ===========================================
// BUFFER SIZES
// ===========================================

export const BUFFER_SIZES = {
  /** Maximum number of log entries kept in memory */
  MAX_LOG_BUFFER_SIZE: 1000,

  /** Maximum length of a single stored log message (10KB) */
  MAX_LOG_MESSAGE_LENGTH: 10 * 1024,
} as const;

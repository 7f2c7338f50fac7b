/**
 * How a backend spells its paths.
 *
 * Output is always canonical (`/`-separated); these settings only decide
 * what raw input is understood.
 */
export interface PathConventions {
  /** Single-character separators accepted on input */
  readonly separators: readonly string[];
  /** Accept a leading `X:` drive letter as the root */
  readonly driveLetters: boolean;
  /** Accept a leading `scheme://authority` as the root */
  readonly schemes: boolean;
}

export const POSIX_CONVENTIONS: PathConventions = {
  separators: ['/'],
  driveLetters: false,
  schemes: false,
};

export const WINDOWS_CONVENTIONS: PathConventions = {
  separators: ['\\', '/'],
  driveLetters: true,
  schemes: false,
};

export const URL_CONVENTIONS: PathConventions = {
  separators: ['/'],
  driveLetters: false,
  schemes: true,
};

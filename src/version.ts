/**
 * Current labelbook release. Bump MAJOR when the report or CSV layout changes
 * incompatibly.
 */
export const LABELBOOK_VERSION = {
  major: 1,
  minor: 0,
  patch: 0,
  string: '1.0.0',
} as const;

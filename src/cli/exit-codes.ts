export const EXIT_CODES = {
  PASSED: 0,
  FAILED: 1,
  ERROR: 2
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

export const EXIT_CODE_OK = 0 as const;
export const EXIT_CODE_USAGE_ERROR = 1 as const;
export const EXIT_CODE_CONFIG_ERROR = 2 as const;
export const EXIT_CODE_INTERNAL_ERROR = 3 as const;

export type ExitCode =
  | typeof EXIT_CODE_OK
  | typeof EXIT_CODE_USAGE_ERROR
  | typeof EXIT_CODE_CONFIG_ERROR
  | typeof EXIT_CODE_INTERNAL_ERROR;

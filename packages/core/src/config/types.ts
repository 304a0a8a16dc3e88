/**
 * Error categories for configuration loading.
 */
export type ConfigErrorCode =
  | "FILE_NOT_FOUND"
  | "PARSE_ERROR"
  | "VALIDATION_ERROR"
  | "READ_ERROR"
  | "SOURCE_ERROR";

export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  /** File path or URL the error relates to */
  path?: string;
  /** One entry per schema or reference problem */
  issues?: string[];
  cause?: unknown;
}

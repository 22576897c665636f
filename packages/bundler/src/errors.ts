/**
 * Fatal configuration failures. Unlike diagnostics these abort the task that
 * hit them and everything awaiting it.
 */
export const ConfigErrorCode = {
  CUSTOM_MODULE_TYPE: "CONFIG_CUSTOM_MODULE_TYPE",
  INVALID_MODULE_TYPE_EFFECT: "CONFIG_INVALID_MODULE_TYPE_EFFECT",
  INVALID_OPTIONS: "CONFIG_INVALID_OPTIONS",
} as const;

export type ConfigErrorCodeType = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCodeType,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

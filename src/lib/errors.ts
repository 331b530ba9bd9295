/**
 * The desired configuration file or the live running configuration could not
 * be fetched or marked. Fatal: the run exits with code 1.
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    readonly source: string,
    readonly exitCode: number | null = null,
    readonly stderr?: string
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

/**
 * The settings file exists but cannot be read or does not validate.
 */
export class SettingsError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "SettingsError";
  }
}

/**
 * The reload log cannot be created or appended to. Raised before the device
 * is touched.
 */
export class LogFileError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "LogFileError";
  }
}

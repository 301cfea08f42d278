export type LabErrorCode =
  | "usage"
  | "config"
  | "resolution"
  | "missing_file"
  | "missing_remote_file"
  | "discovery"
  | "transfer"
  | "credential_missing"
  | "command";

export class LabError extends Error {
  readonly code: LabErrorCode;

  constructor(code: LabErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UsageError extends LabError {
  constructor(message: string) {
    super("usage", message);
  }
}

export class ConfigError extends LabError {
  constructor(message: string) {
    super("config", message);
  }
}

/** A `../` path whose directory does not exist relative to the working directory. */
export class ResolutionError extends LabError {
  readonly input: string;
  readonly directory: string;

  constructor(input: string, directory: string) {
    super("resolution", `Could not resolve directory "${directory}" for path: ${input}`);
    this.input = input;
    this.directory = directory;
  }
}

export class MissingFileError extends LabError {
  readonly label: string;
  readonly path: string;

  constructor(label: string, filePath: string) {
    super("missing_file", `${label} not found: ${filePath}`);
    this.label = label;
    this.path = filePath;
  }
}

export class MissingRemoteFileError extends LabError {
  readonly host: string;
  readonly path: string;

  constructor(host: string, remotePath: string) {
    super("missing_remote_file", `Output file not found on ${host}: ${remotePath}`);
    this.host = host;
    this.path = remotePath;
  }
}

export class DiscoveryError extends LabError {
  readonly candidate: string;
  readonly fallback: string;

  constructor(candidate: string, fallback: string) {
    super(
      "discovery",
      [
        `No adapter_config.json found for adapter path "${candidate}".`,
        "Checked:",
        `  - ${candidate}`,
        `  - ${fallback}`,
        "  - the latest checkpoint-* subdirectory of each location",
      ].join("\n"),
    );
    this.candidate = candidate;
    this.fallback = fallback;
  }
}

export class TransferError extends LabError {
  readonly host: string;
  readonly detail: string;

  constructor(host: string, detail: string) {
    super("transfer", `File transfer to ${host} failed: ${detail}`);
    this.host = host;
    this.detail = detail;
  }
}

export class CredentialMissingError extends LabError {
  readonly variable: string;

  constructor(variable: string, remediation: string) {
    super("credential_missing", `${variable} is required but not set. ${remediation}`);
    this.variable = variable;
  }
}

export class CommandError extends LabError {
  readonly command: string;
  readonly exitCode: number;
  readonly detail: string;

  constructor(command: string, exitCode: number, detail: string) {
    super("command", `${command} failed: ${detail}`);
    this.command = command;
    this.exitCode = exitCode;
    this.detail = detail;
  }
}

export class TemporalMarkerError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidMetadataError extends TemporalMarkerError {
  constructor(message: string) {
    super("INVALID_METADATA", message);
  }
}

export class ConfigError extends TemporalMarkerError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super("INVALID_CONFIG", details.length ? `${message}: ${details.join("; ")}` : message);
    this.details = details;
  }
}

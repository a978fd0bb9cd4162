import { CommandError } from "./exec";

export type CliErrorKind = "validation" | "not_found" | "dependency" | "runtime";

interface CliErrorOptions {
  kind: CliErrorKind;
  message: string;
  hint?: string;
  detail?: string;
  exitCode?: number;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly exitCode: number;

  constructor(options: CliErrorOptions) {
    super(options.message);
    this.name = "CliError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
  }
}

export type ConfigurationErrorCode =
  | "invalid_document"
  | "invalid_service"
  | "unknown_network"
  | "invalid_port"
  | "duplicate_host_port"
  | "invalid_device_reservation"
  | "duplicate_device"
  | "invalid_volume"
  | "duplicate_host_path"
  | "duplicate_container_name"
  | "invalid_restart"
  | "invalid_shm_size"
  | "invalid_command"
  | "unreachable_endpoint";

interface ConfigurationErrorOptions {
  code: ConfigurationErrorCode;
  message: string;
  /** Every service the violation involves; empty for document-level errors. */
  services?: string[];
  source?: string;
}

/**
 * A malformed or self-contradictory deployment document. Raised before any
 * instance is created, scoped to the services it names.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  readonly services: string[];
  readonly source?: string;

  constructor(options: ConfigurationErrorOptions) {
    super(options.message);
    this.name = "ConfigurationError";
    this.code = options.code;
    this.services = options.services ?? [];
    this.source = options.source;
  }

  get service(): string | undefined {
    return this.services[0];
  }
}

export class InvalidDeviceReservationError extends ConfigurationError {
  constructor(service: string, message: string, source?: string) {
    super({ code: "invalid_device_reservation", message, services: [service], source });
    this.name = "InvalidDeviceReservation";
  }
}

interface RuntimeFailureOptions {
  service: string;
  message: string;
  detail?: string;
}

abstract class RuntimeFailure extends Error {
  readonly service: string;
  readonly detail?: string;

  constructor(options: RuntimeFailureOptions) {
    super(options.message);
    this.service = options.service;
    this.detail = options.detail;
  }
}

/** The host cannot satisfy a device, port or mount claim. */
export class ResourceUnavailableError extends RuntimeFailure {
  constructor(options: RuntimeFailureOptions) {
    super(options);
    this.name = "ResourceUnavailableError";
  }
}

export class ImageResolutionError extends RuntimeFailure {
  readonly image: string;

  constructor(options: RuntimeFailureOptions & { image: string }) {
    super(options);
    this.name = "ImageResolutionError";
    this.image = options.image;
  }
}

/** The process inside the container exited before the instance became ready. */
export class RuntimeStartupError extends RuntimeFailure {
  readonly exitCode?: number;

  constructor(options: RuntimeFailureOptions & { exitCode?: number }) {
    super(options);
    this.name = "RuntimeStartupError";
    this.exitCode = options.exitCode;
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof ConfigurationError) {
    return new CliError({
      kind: "validation",
      message: formatConfigurationError(error),
      hint: error.source ? `Fix ${error.source} and re-run \`deckhand validate\`.` : undefined
    });
  }

  if (error instanceof ResourceUnavailableError) {
    return new CliError({
      kind: "dependency",
      message: `[${error.service}] ${error.message}`,
      hint: "Free the resource on the host or change the claim in the document.",
      detail: error.detail
    });
  }

  if (error instanceof ImageResolutionError) {
    return new CliError({
      kind: "dependency",
      message: `[${error.service}] ${error.message}`,
      hint: `Build or pull '${error.image}' on this host first.`,
      detail: error.detail
    });
  }

  if (error instanceof RuntimeStartupError) {
    return new CliError({
      kind: "runtime",
      message: `[${error.service}] ${error.message}`,
      hint: `Inspect the output with \`deckhand logs ${error.service}\`.`,
      detail: error.detail
    });
  }

  if (error instanceof CommandError) {
    const detail = [error.stdout, error.stderr].filter(Boolean).join("\n");
    return new CliError({
      kind: "runtime",
      message: error.message,
      detail: detail || undefined
    });
  }

  if (error instanceof Error) {
    return new CliError({
      kind: "runtime",
      message: error.message
    });
  }

  return new CliError({
    kind: "runtime",
    message: String(error)
  });
}

export function formatConfigurationError(error: ConfigurationError): string {
  const scope = error.services.length > 0 ? `[${error.services.join(", ")}] ` : "";
  const origin = error.source ? `${error.source}: ` : "";
  return `${origin}${scope}${error.message} (${error.code})`;
}

export function renderCliError(error: CliError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}

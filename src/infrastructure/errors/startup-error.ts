/**
 * Errors raised while assembling routes or binding the server. None of these
 * are ever turned into an HTTP response; they stop the process from serving.
 */

export class InvalidTemplateError extends Error {
  public readonly template: string;
  public readonly reason: string;

  constructor(template: string, reason: string) {
    super(`Invalid route template "${template}": ${reason}`);
    this.name = 'InvalidTemplateError';
    this.template = template;
    this.reason = reason;
  }
}

export class RegistryBuildError extends Error {
  public readonly method: string;
  public readonly template: string;

  constructor(method: string, template: string, cause: Error) {
    super(`Failed to register ${method} ${template}: ${cause.message}`);
    this.name = 'RegistryBuildError';
    this.method = method;
    this.template = template;
    this.cause = cause;
  }
}

export class RegistryFrozenError extends Error {
  constructor(action: string) {
    super(`Route registry is frozen; cannot ${action}`);
    this.name = 'RegistryFrozenError';
  }
}

export class InvalidBindAddressError extends Error {
  public readonly address: string;

  constructor(address: string) {
    super(`Invalid bind address "${address}"; expected host:port`);
    this.name = 'InvalidBindAddressError';
    this.address = address;
  }
}

export class AppError extends Error {
  constructor(
    public message: string,
    public code?: string,
    public exitCode = 1
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class CertificateError extends AppError {
  constructor(message: string) {
    super(message, 'CERTIFICATE_ERROR');
    Object.setPrototypeOf(this, CertificateError.prototype);
  }
}

export class CredentialError extends AppError {
  constructor(message: string) {
    super(message, 'CREDENTIAL_ERROR');
    Object.setPrototypeOf(this, CredentialError.prototype);
  }
}

export class ConfigRenderError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_RENDER_ERROR');
    Object.setPrototypeOf(this, ConfigRenderError.prototype);
  }
}

export class UnsupportedArchitectureError extends AppError {
  constructor(public arch: string) {
    super(`Unsupported architecture: ${arch}`, 'UNSUPPORTED_ARCHITECTURE', 2);
    Object.setPrototypeOf(this, UnsupportedArchitectureError.prototype);
  }
}

export class DownloadError extends AppError {
  constructor(message: string, public url: string) {
    super(message, 'DOWNLOAD_ERROR', 3);
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}

export class LaunchError extends AppError {
  constructor(message: string) {
    super(message, 'LAUNCH_ERROR');
    Object.setPrototypeOf(this, LaunchError.prototype);
  }
}

/**
 * Lookup failures are absorbed by the caller and never abort provisioning.
 */
export class NetworkError extends AppError {
  constructor(message: string) {
    super(message, 'NETWORK_ERROR');
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

/**
 * An error that ends the bootstrap. `main` prints the message (and the
 * helper text, when present) once and exits with `exitCode`.
 */
export class FatalError extends Error {
  readonly exitCode: number;
  readonly helperText?: string;

  constructor(message: string, exitCode = 1, helperText?: string) {
    super(message);
    this.name = 'FatalError';
    this.exitCode = exitCode;
    this.helperText = helperText;
  }
}

/** Invalid or conflicting command line arguments. */
export class FatalArgumentError extends FatalError {
  constructor(message: string) {
    super(message, 2);
    this.name = 'FatalArgumentError';
  }
}

/** An unusable presentation setting or theme. */
export class FatalConfigError extends FatalError {
  constructor(message: string, helperText?: string) {
    super(message, 1, helperText);
    this.name = 'FatalConfigError';
  }
}

/** The zuliprc is missing, insecure, unreadable or could not be written. */
export class FatalCredentialsError extends FatalError {
  constructor(message: string, helperText?: string) {
    super(message, 1, helperText);
    this.name = 'FatalCredentialsError';
  }
}

/** The server rejected the login identifier and password. */
export class InvalidCredentialsError extends FatalError {
  constructor(message = 'Incorrect Email(or Username) or Password!') {
    super(message, 1);
    this.name = 'InvalidCredentialsError';
  }
}

/**
 * The Zulip server could not be reached or answered with something other
 * than the expected API response.
 */
export class ServerConnectionFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServerConnectionFailure';
  }
}

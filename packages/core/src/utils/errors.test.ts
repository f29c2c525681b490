/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  FatalArgumentError,
  FatalConfigError,
  FatalCredentialsError,
  FatalError,
  InvalidCredentialsError,
  getErrorMessage,
  isNodeError,
} from './errors.js';

describe('getErrorMessage', () => {
  it('returns the message of an Error', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
  });
});

describe('isNodeError', () => {
  it('recognises errors carrying an errno code', () => {
    const error = Object.assign(new Error('exists'), { code: 'EEXIST' });
    expect(isNodeError(error)).toBe(true);
    expect(isNodeError(new Error('no code'))).toBe(false);
    expect(isNodeError({ code: 'EEXIST' })).toBe(false);
  });
});

describe('FatalError hierarchy', () => {
  it.each([
    [new FatalArgumentError('bad flag'), 2],
    [new FatalConfigError('bad theme'), 1],
    [new FatalCredentialsError('insecure'), 1],
    [new InvalidCredentialsError(), 1],
  ])('%s exits with %i', (error, exitCode) => {
    expect(error).toBeInstanceOf(FatalError);
    expect(error.exitCode).toBe(exitCode);
  });

  it('keeps helper text for the caller to print', () => {
    const error = new FatalConfigError('Invalid theme', 'Try zt_dark');
    expect(error.helperText).toBe('Try zt_dark');
    expect(error.name).toBe('FatalConfigError');
  });

  it('uses the login failure message by default', () => {
    expect(new InvalidCredentialsError().message).toBe(
      'Incorrect Email(or Username) or Password!',
    );
  });
});

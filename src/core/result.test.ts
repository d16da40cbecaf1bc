import { describe, it, expect } from 'vitest';
import { ValidationError } from './errors.js';
import { err, isErr, isOk, ok, unwrap } from './result.js';
import type { Result } from './result.js';

describe('Result', () => {
  it('narrows with isOk and isErr', () => {
    const success: Result<number, string> = ok(1);
    const failure: Result<number, string> = err('nope');

    expect(isOk(success) && success.value).toBe(1);
    expect(isErr(failure) && failure.error).toBe('nope');
    expect(isOk(failure)).toBe(false);
  });

  it('unwraps values and rethrows errors', () => {
    expect(unwrap(ok('value'))).toBe('value');
    expect(() => unwrap(err(new ValidationError('bad')))).toThrow(ValidationError);
    expect(() => unwrap(err('plain'))).toThrow('plain');
  });
});

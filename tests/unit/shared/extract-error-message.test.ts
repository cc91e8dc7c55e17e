/**
 * extractErrorMessage Tests
 */

import { describe, it, expect } from 'vitest';
import { extractErrorMessage } from '../../../src/shared/errors/index.js';

describe('extractErrorMessage', () => {
  it('should use the message of an Error', () => {
    expect(extractErrorMessage(new TypeError('Cannot read property'))).toBe('Cannot read property');
  });

  it('should fall back to the error name, then a placeholder', () => {
    const named = new Error('');
    named.name = 'TargetCloseError';
    const bare = new Error('');
    bare.name = '';

    expect(extractErrorMessage(named)).toBe('TargetCloseError');
    expect(extractErrorMessage(bare)).toBe('Unknown Error');
  });

  it('should return strings as they are', () => {
    expect(extractErrorMessage('net::ERR_ABORTED')).toBe('net::ERR_ABORTED');
  });

  it('should read message, error or reason from plain objects in that order', () => {
    expect(extractErrorMessage({ message: 'first', error: 'second' })).toBe('first');
    expect(extractErrorMessage({ error: 'second', reason: 'third' })).toBe('second');
    expect(extractErrorMessage({ reason: 'third' })).toBe('third');
  });

  it('should serialize other objects', () => {
    expect(extractErrorMessage({ status: 503 })).toBe('{"status":503}');
    expect(extractErrorMessage({ message: 42 })).toBe('{"message":42}');
  });

  it('should describe objects that serialize to nothing', () => {
    expect(extractErrorMessage({})).toBe('Unknown error object: empty');
  });

  it('should survive circular objects', () => {
    const error: Record<string, unknown> = { kind: 'loop' };
    error.self = error;

    expect(extractErrorMessage(error)).toBe('Non-serializable error: [object Object]');
  });

  it('should stringify primitives', () => {
    expect(extractErrorMessage(null)).toBe('null');
    expect(extractErrorMessage(undefined)).toBe('undefined');
    expect(extractErrorMessage(404)).toBe('404');
  });
});

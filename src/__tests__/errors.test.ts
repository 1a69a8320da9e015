// ═══════════════════════════════════════════════════════════
// TERMSAGE — Error Taxonomy Tests
// ═══════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  BackendError,
  ConfigError,
  EmptyOutputError,
  TermsageError,
  TransportError,
  describeError,
  isModelClientError,
} from '../core/errors.js';

describe('TermsageError subclasses', () => {
  it('should carry a stable code per transport kind', () => {
    expect(new TransportError('timeout', 'x').code).toBe('TRANSPORT_TIMEOUT');
    expect(new TransportError('connection_failed', 'x').code).toBe('TRANSPORT_CONNECTION_FAILED');
  });

  it('should keep the class name and base class', () => {
    const error = new BackendError('model not found', 404);
    expect(error).toBeInstanceOf(TermsageError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('BackendError');
    expect(error.status).toBe(404);
  });

  it('should give empty output a default message', () => {
    expect(new EmptyOutputError().message).toBe('Empty response from the model');
  });
});

describe('isModelClientError', () => {
  it('should accept only the model client taxonomy', () => {
    expect(isModelClientError(new TransportError('timeout', 'slow'))).toBe(true);
    expect(isModelClientError(new BackendError('bad'))).toBe(true);
    expect(isModelClientError(new EmptyOutputError())).toBe(true);
    expect(isModelClientError(new ConfigError('nope'))).toBe(false);
    expect(isModelClientError(new Error('plain'))).toBe(false);
  });
});

describe('describeError', () => {
  it('should prefix transport and backend errors', () => {
    expect(describeError(new TransportError('timeout', 'Ollama may be busy.')))
      .toBe('Request timed out. Ollama may be busy.');
    expect(describeError(new TransportError('connection_failed', 'Is it running?')))
      .toBe('Connection failed. Is it running?');
    expect(describeError(new BackendError('model "x" not found')))
      .toBe('Model server error: model "x" not found');
  });

  it('should fall back to the message or string form', () => {
    expect(describeError(new ConfigError('Unknown configuration key'))).toBe('Unknown configuration key');
    expect(describeError(42)).toBe('42');
  });
});

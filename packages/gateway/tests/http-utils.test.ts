import { describe, it, expect } from 'vitest';
import {
  AgentTransportError,
  InvalidQueryError,
  ProviderUnavailableError,
  TimeoutError,
  UnknownAgentError,
} from '@agentnet/core';
import { HttpError, parseFields, parseQueryBody, statusForError } from '../src/http-utils.js';

describe('statusForError', () => {
  it('maps error types to HTTP statuses', () => {
    expect(statusForError(new HttpError(413, 'PAYLOAD_TOO_LARGE', 'too big'))).toBe(413);
    expect(statusForError(new InvalidQueryError())).toBe(400);
    expect(statusForError(new UnknownAgentError('poet'))).toBe(404);
    expect(statusForError(new AgentTransportError('poet', 'down'))).toBe(502);
    expect(statusForError(new ProviderUnavailableError())).toBe(503);
    expect(statusForError(new TimeoutError(10))).toBe(504);
    expect(statusForError(new Error('boom'))).toBe(500);
  });
});

describe('parseQueryBody', () => {
  it('returns the query and fields', () => {
    expect(parseQueryBody({ query: 'hello', fields: { target_language: 'German' } })).toEqual({
      query: 'hello',
      fields: { target_language: 'German' },
    });
  });

  it('rejects blank or missing queries', () => {
    expect(() => parseQueryBody({ query: '   ' })).toThrow(InvalidQueryError);
    expect(() => parseQueryBody('hello')).toThrow(InvalidQueryError);
  });
});

describe('parseFields', () => {
  it('accepts string values only', () => {
    expect(parseFields(undefined)).toBeUndefined();
    expect(() => parseFields(['a'])).toThrow('"fields" must be an object of strings');
    expect(() => parseFields({ schema: 3 })).toThrow('"fields.schema" must be a string');
  });
});

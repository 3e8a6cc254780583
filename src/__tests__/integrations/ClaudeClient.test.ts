/**
 * Claude response parsing
 */

import { describe, it, expect } from '@jest/globals';
import { ExternalServiceError } from '../../domain/errors.js';
import { parseJsonResponse } from '../../integrations/llm/ClaudeClient.js';

describe('parseJsonResponse', () => {
  it('should read a bare JSON object', () => {
    expect(parseJsonResponse({ content: ' {"score": 0.8} ' })).toEqual({ score: 0.8 });
  });

  it('should strip a fenced code block', () => {
    expect(parseJsonResponse({ content: '```json\n{"score": 0.4}\n```' })).toEqual({ score: 0.4 });
    expect(parseJsonResponse({ content: '```\n{"ok": true}\n```' })).toEqual({ ok: true });
  });

  it('should reject text that is not JSON as a malformed response', () => {
    let caught: unknown;
    try {
      parseJsonResponse({ content: 'The candidate looks strong.' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExternalServiceError);
    expect(caught).toMatchObject({ service: 'llm', reason: 'malformed_response' });
  });

  it('should reject JSON arrays', () => {
    expect(() => parseJsonResponse({ content: '[1, 2]' })).toThrow('Model returned JSON that is not an object');
  });
});

import { describe, it, expect } from 'vitest';
import {
  REDACTED,
  maskCredentials,
  sanitizeError,
  sanitizeForLogging,
} from '../../src/utils/sanitize.js';

describe('sanitize', () => {
  describe('maskCredentials', () => {
    it('should mask OpenAI keys keeping a short prefix', () => {
      expect(maskCredentials('key sk-test0000000000000000000000 rejected')).toBe(
        `key sk-...${REDACTED} rejected`
      );
    });

    it('should mask Anthropic keys', () => {
      expect(maskCredentials('sk-ant-REDACTED')).toBe(`sk-...${REDACTED}`);
    });

    it('should mask bearer tokens', () => {
      expect(maskCredentials('Authorization: Bearer test-secret')).toBe(
        `Authorization: Bea...${REDACTED}`
      );
    });

    it('should mask 32 character hex keys', () => {
      expect(maskCredentials(`api-key ${'0123456789abcdef'.repeat(2)}`)).toBe(
        `api-key 012...${REDACTED}`
      );
    });

    it('should leave ordinary text alone', () => {
      expect(maskCredentials('Summarized chunk 3 of 12')).toBe('Summarized chunk 3 of 12');
    });
  });

  describe('sanitizeForLogging', () => {
    it('should redact sensitive keys at any depth', () => {
      expect(
        sanitizeForLogging({
          provider: 'azure',
          azureApiKey: 'test-secret',
          nested: { password: 'test-secret', items: [{ accessToken: 'test-secret' }] },
        })
      ).toEqual({
        provider: 'azure',
        azureApiKey: REDACTED,
        nested: { password: REDACTED, items: [{ accessToken: REDACTED }] },
      });
    });

    it('should keep token counts that are not credentials', () => {
      expect(sanitizeForLogging({ maxOutputTokens: 1000, estimatedTokens: 420 })).toEqual({
        maxOutputTokens: 1000,
        estimatedTokens: 420,
      });
    });

    it('should pass primitives through', () => {
      expect(sanitizeForLogging(42)).toBe(42);
      expect(sanitizeForLogging(null)).toBeNull();
      expect(sanitizeForLogging(undefined)).toBeUndefined();
    });
  });

  describe('sanitizeError', () => {
    it('should mask credentials in the message and redact sensitive fields', () => {
      const error = Object.assign(new Error('invalid key sk-test0000000000000000000000'), {
        apiKey: 'test-secret',
        status: 401,
      });

      expect(sanitizeError(error)).toMatchObject({
        name: 'Error',
        message: `invalid key sk-...${REDACTED}`,
        apiKey: REDACTED,
        status: 401,
      });
    });
  });
});

import { ExternalServiceError, toExternalServiceError, toQueryErrorInfo } from '../utils/errors';

describe('Errors', () => {
  describe('toExternalServiceError', () => {
    it('should classify server error statuses as transient', () => {
      expect(toExternalServiceError(new Error('Request failed with status 503'))).toMatchObject({
        kind: 'transient',
        reason: 'serverError',
      });
      expect(toExternalServiceError(new Error('504 Gateway Timeout')).reason).toBe('timeout');
    });

    it('should not mistake larger numbers for status codes', () => {
      expect(toExternalServiceError(new Error('Prompt exceeds max 5000 tokens'))).toMatchObject({
        kind: 'permanent',
        reason: 'unknown',
      });
      expect(toExternalServiceError(new Error('Limit of 14290 requests per day')).kind).toBe('permanent');
    });

    it('should classify rate limits and resets', () => {
      expect(toExternalServiceError(new Error('HTTP 429 Too Many Requests')).reason).toBe('rateLimit');
      expect(toExternalServiceError(new Error('read ECONNRESET')).reason).toBe('network');
    });

    it('should return classified errors unchanged', () => {
      const error = new ExternalServiceError('permanent', 'badRequest', 'bad');
      expect(toExternalServiceError(error)).toBe(error);
    });
  });

  describe('toQueryErrorInfo', () => {
    it('should describe exhausted retries', () => {
      const error = new ExternalServiceError('transient', 'rateLimit', 'Rate limit reached').withAttempts(3, true);

      expect(toQueryErrorInfo(error)).toEqual({
        kind: 'retryExhausted',
        reason: 'rateLimit',
        message: 'Reasoning service failed after 3 attempts: Rate limit reached',
        attempts: 3,
      });
    });
  });
});

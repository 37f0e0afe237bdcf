import { describe, it, expect } from 'vitest';
import { GrammyError, HttpError } from 'grammy';
import { classifyDeliveryError } from './messenger.js';

function telegramError(code: number, description: string): GrammyError {
  return new GrammyError(
    `Call to 'sendMessage' failed! (${code}: ${description})`,
    { ok: false, error_code: code, description },
    'sendMessage',
    {},
  );
}

describe('classifyDeliveryError', () => {
  it('treats a bot blocked by the user as unreachable', () => {
    expect(classifyDeliveryError(telegramError(403, 'Forbidden: bot was blocked by the user'))).toBe('unreachable');
  });

  it('treats deactivated accounts and unknown chats as unreachable', () => {
    expect(classifyDeliveryError(telegramError(403, 'Forbidden: user is deactivated'))).toBe('unreachable');
    expect(classifyDeliveryError(telegramError(400, 'Bad Request: chat not found'))).toBe('unreachable');
  });

  it('keeps other Telegram errors as failures', () => {
    expect(classifyDeliveryError(telegramError(400, "Bad Request: can't parse entities"))).toBe('other');
    expect(classifyDeliveryError(telegramError(429, 'Too Many Requests: retry after 5'))).toBe('other');
  });

  it('keeps network errors as failures', () => {
    expect(classifyDeliveryError(new HttpError('Network request failed', new Error('ECONNRESET')))).toBe('other');
  });
});

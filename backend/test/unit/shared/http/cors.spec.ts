import { describe, it, expect } from 'vitest';
import { isOriginAllowed } from '../../../../src/shared/http/cors';

describe('isOriginAllowed', () => {
  it('matches listed origins exactly', () => {
    const allowed = ['http://localhost:3000'];
    expect(isOriginAllowed('http://localhost:3000', allowed)).toBe(true);
    expect(isOriginAllowed('http://localhost:3001', allowed)).toBe(false);
  });

  it('accepts any origin when the list contains *', () => {
    expect(isOriginAllowed('https://anywhere.example.com', ['*'])).toBe(true);
  });
});

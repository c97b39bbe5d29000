import { describe, it, expect } from 'vitest';

import { isOriginAllowed } from '../cors.middleware.js';

describe('isOriginAllowed', () => {
  it('allows any localhost port when localhost is whitelisted', () => {
    const allowed = ['http://localhost:8080'];
    expect(isOriginAllowed('http://localhost:5173', allowed)).toBe(true);
    expect(isOriginAllowed('http://127.0.0.1:5173', allowed)).toBe(false);
  });

  it('allows exact origins and their subdomains', () => {
    const allowed = ['https://chess.test'];
    expect(isOriginAllowed('https://chess.test', allowed)).toBe(true);
    expect(isOriginAllowed('https://app.chess.test', allowed)).toBe(true);
    expect(isOriginAllowed('https://notchess.test', allowed)).toBe(false);
  });
});

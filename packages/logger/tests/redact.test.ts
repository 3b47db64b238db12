import { describe, it, expect } from 'vitest';
import { redactUrl } from '../src/index.js';

describe('redactUrl', () => {
  it('should mask basic auth parameters', () => {
    expect(redactUrl('https://api.trello.com/1/members/me?key=abc&token=def')).toBe(
      'https://api.trello.com/1/members/me?key=%5BREDACTED%5D&token=%5BREDACTED%5D',
    );
  });

  it('should leave URLs without credentials untouched', () => {
    const url = 'https://api.trello.com/1/boards/b1/cards?filter=open';
    expect(redactUrl(url)).toBe(url);
  });

  it('should return unparseable input as is', () => {
    expect(redactUrl('/boards/b1?token=t')).toBe('/boards/b1?token=t');
  });
});
